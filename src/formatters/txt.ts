import type { GapRange, Transcript } from "../transcription/types.js";

function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.floor(seconds);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;
  const hh = hours.toString().padStart(2, "0");
  const mm = minutes.toString().padStart(2, "0");
  const ss = secs.toString().padStart(2, "0");
  return `${hh}:${mm}:${ss}`;
}

function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    if (current.length === 0) {
      current = word;
      continue;
    }

    if (current.length + 1 + word.length <= width) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current.length > 0) lines.push(current);
  return lines;
}

type BodyEntry = {
  start: number;
  prefix: string;
  text: string;
};

export type TxtMeta = {
  source: string;
  durationMs?: number;
  status?: "complete" | "partial";
};

export function formatTxt(
  transcript: Transcript,
  gaps: readonly GapRange[],
  meta: TxtMeta,
  options?: { timestamps?: boolean; wrapWidth?: number }
): string {
  const timestamps = options?.timestamps ?? true;
  const wrapWidth = options?.wrapWidth ?? 100;

  const headerLines = [
    `Source: ${meta.source}`,
    meta.durationMs !== undefined ? `Duration: ${formatTimestamp(meta.durationMs / 1000)}` : undefined,
    meta.status ? `Status: ${meta.status}` : undefined,
    gaps.length > 0 ? `Gaps: ${gaps.length}` : undefined,
    "---",
  ].filter((line): line is string => line !== undefined);

  const entries: BodyEntry[] = [];
  if (transcript.segments.length > 0) {
    for (const seg of transcript.segments) {
      const label = [
        timestamps ? `${formatTimestamp(seg.start)} - ${formatTimestamp(seg.end)}` : undefined,
        seg.speaker,
      ]
        .filter((part): part is string => !!part)
        .join(" ");
      entries.push({
        start: seg.start,
        prefix: label ? `[${label}] ` : "",
        text: seg.text,
      });
    }
  } else if (transcript.text) {
    entries.push({ start: 0, prefix: "", text: transcript.text });
  }
  for (const gap of gaps) {
    const startSec = gap.logicalStartMs / 1000;
    entries.push({
      start: startSec,
      prefix: `[${formatTimestamp(startSec)} - ${formatTimestamp(gap.logicalEndMs / 1000)} gap] `,
      text: `chunk ${gap.chunkIndex} could not be transcribed`,
    });
  }
  entries.sort((a, b) => a.start - b.start);

  const bodyLines: string[] = [];
  for (const entry of entries) {
    const wrapped = wrapText(entry.text, wrapWidth);
    if (wrapped.length === 0) {
      bodyLines.push(entry.prefix.trimEnd());
      continue;
    }

    bodyLines.push(entry.prefix + wrapped[0]);
    for (const line of wrapped.slice(1)) {
      bodyLines.push(" ".repeat(entry.prefix.length) + line);
    }
  }

  return [...headerLines, ...bodyLines].join("\n");
}
