import type { Segment, Transcript, WordToken } from "./types.js";

export function tokenizeText(text: string): string[] {
  return text.split(/\s+/).filter((t) => t.length > 0);
}

/**
 * Spreads each segment's duration over its words in proportion to their
 * character length. Used when the engine reports segments but no word
 * timing. The last word of a segment always ends at the segment end.
 */
export function inferWordTokensFromSegments(
  segments: readonly Segment[],
  minDurationSec = 0.04
): WordToken[] {
  const words: WordToken[] = [];

  for (const seg of segments) {
    const tokens = tokenizeText(seg.text.trim());
    if (tokens.length === 0) continue;

    const segDuration = seg.end - seg.start;
    const totalChars = tokens.reduce((sum, t) => sum + t.length, 0);
    let current = seg.start;

    tokens.forEach((token, i) => {
      const wordDuration = Math.max(segDuration * (token.length / totalChars), minDurationSec);
      const end = i === tokens.length - 1 ? seg.end : Math.min(current + wordDuration, seg.end);
      const word: WordToken = { text: token, start: current, end };
      if (seg.speaker !== undefined) word.speaker = seg.speaker;
      words.push(word);
      current = end;
    });
  }

  return words;
}

export type ResegmentOptions = {
  pauseThresholdMs: number;
  maxSegmentMs: number;
  splitOnPunctuation: boolean;
};

const DEFAULT_RESEGMENT: ResegmentOptions = {
  pauseThresholdMs: 250,
  maxSegmentMs: 1500,
  splitOnPunctuation: true,
};

function majoritySpeaker(words: readonly WordToken[]): string | undefined {
  const votes = new Map<string, number>();
  for (const w of words) {
    if (w.speaker === undefined) continue;
    votes.set(w.speaker, (votes.get(w.speaker) ?? 0) + 1);
  }
  let best: string | undefined;
  let bestVotes = 0;
  for (const [speaker, count] of votes) {
    if (count > bestVotes) {
      best = speaker;
      bestVotes = count;
    }
  }
  return best;
}

function toSegment(words: readonly WordToken[]): Segment | undefined {
  const first = words[0];
  const last = words[words.length - 1];
  if (!first || !last) return undefined;
  const segment: Segment = {
    start: first.start,
    end: last.end,
    text: words.map((w) => w.text).join(" ").trim(),
  };
  const speaker = majoritySpeaker(words);
  if (speaker !== undefined) segment.speaker = speaker;
  return segment;
}

/**
 * Builds segments from word tokens. A new segment starts on a speaker
 * change, a pause of at least `pauseThresholdMs`, once the running segment
 * reaches `maxSegmentMs`, or after a word ending in `.`, `?` or `!`.
 */
export function resegmentWords(
  words: readonly WordToken[],
  options: Partial<ResegmentOptions> = {}
): Segment[] {
  const opts = { ...DEFAULT_RESEGMENT, ...options };
  const pauseSec = opts.pauseThresholdMs / 1000;
  const maxSec = opts.maxSegmentMs / 1000;

  const segments: Segment[] = [];
  let current: WordToken[] = [];

  const flush = () => {
    const segment = toSegment(current);
    if (segment) segments.push(segment);
    current = [];
  };

  for (const word of words) {
    const prev = current[current.length - 1];
    const first = current[0];
    if (prev && first) {
      const speakerChanged =
        word.speaker !== prev.speaker &&
        (word.speaker !== undefined || prev.speaker !== undefined);
      const paused = word.start - prev.end >= pauseSec;
      const tooLong = word.end - first.start >= maxSec;
      const sentenceEnd = opts.splitOnPunctuation && /[.?!]$/.test(prev.text.trimEnd());
      if (speakerChanged || paused || tooLong || sentenceEnd) flush();
    }
    current.push(word);
  }
  flush();

  return segments;
}

/** Renames engine labels (A, B, spk_0, ...) to `Speaker N` by first appearance. */
export function normalizeSpeakerLabels(segments: readonly Segment[]): Segment[] {
  const labels = new Map<string, string>();
  return segments.map((seg) => {
    if (seg.speaker === undefined) return { ...seg };
    let label = labels.get(seg.speaker);
    if (!label) {
      label = `Speaker ${labels.size + 1}`;
      labels.set(seg.speaker, label);
    }
    return { ...seg, speaker: label };
  });
}

/** One `Speaker: text` line per run of consecutive same-speaker segments. */
export function formatDiarizedTranscript(segments: readonly Segment[]): string {
  const lines: string[] = [];
  let currentSpeaker: string | undefined;
  let currentTexts: string[] = [];

  const emit = () => {
    if (currentSpeaker !== undefined && currentTexts.length > 0) {
      lines.push(`${currentSpeaker}: ${currentTexts.join(" ")}`);
    }
  };

  for (const seg of segments) {
    const text = seg.text.trim();
    if (!text) continue;
    const speaker = seg.speaker ?? "Unknown";
    if (speaker !== currentSpeaker) {
      emit();
      currentSpeaker = speaker;
      currentTexts = [text];
    } else {
      currentTexts.push(text);
    }
  }
  emit();

  return lines.join("\n");
}

/**
 * Replaces a folded transcript's segments with speaker-normalized ones and
 * renders its text with speaker prefixes. Word tokens, when present, are the
 * source of truth for the new segments.
 */
export function applyDiarization(
  transcript: Transcript,
  options: Partial<ResegmentOptions> = {}
): Transcript {
  const base =
    transcript.wordTokens.length > 0
      ? resegmentWords(transcript.wordTokens, options)
      : transcript.segments;
  const segments = normalizeSpeakerLabels(base);
  return {
    wordTokens: transcript.wordTokens,
    segments,
    text: formatDiarizedTranscript(segments),
  };
}
