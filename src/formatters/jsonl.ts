import type { GapRange, Transcript } from "../transcription/types.js";

export type TranscriptJsonlLine =
  | {
      type: "segment";
      index: number;
      startSeconds: number;
      endSeconds: number;
      speaker?: string;
      text: string;
    }
  | {
      type: "text";
      index: 1;
      text: string;
    }
  | {
      type: "gap";
      chunkIndex: number;
      startSeconds: number;
      endSeconds: number;
      error: string;
    };

export function formatJsonl(
  transcript: Transcript,
  gaps: readonly GapRange[] = []
): string {
  const lines: TranscriptJsonlLine[] = [];

  if (transcript.segments.length > 0) {
    transcript.segments.forEach((s, idx) => {
      lines.push({
        type: "segment",
        index: idx + 1,
        startSeconds: s.start,
        endSeconds: s.end,
        speaker: s.speaker,
        text: s.text,
      });
    });
  } else {
    lines.push({ type: "text", index: 1, text: transcript.text });
  }

  for (const gap of gaps) {
    lines.push({
      type: "gap",
      chunkIndex: gap.chunkIndex,
      startSeconds: gap.logicalStartMs / 1000,
      endSeconds: gap.logicalEndMs / 1000,
      error: gap.error,
    });
  }

  return lines.map((l) => JSON.stringify(l)).join("\n");
}
