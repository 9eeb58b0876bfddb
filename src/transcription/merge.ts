import type { ChunkWindow } from "../pipeline/plan.js";
import { trimSegments, trimWords } from "./boundary.js";
import { MergeInconsistencyError, type InconsistentUnitKind } from "./errors.js";
import { dedupSeam, findOverlap } from "./seam.js";
import type { ChunkTranscription, Segment, Transcript, WordToken } from "./types.js";

export type FoldState = {
  readonly transcript: Transcript;
};

export type FoldOptions = {
  epsilonSec: number;
  maxOverlapChars: number;
};

export type FoldStats = {
  chunkIndex: number;
  keptWords: number;
  droppedWords: number;
  keptSegments: number;
  droppedSegments: number;
  /** Raw text discarded because every timed unit fell inside the overlap. */
  textDropped: boolean;
  seamOverlapChars: number;
  issues: MergeInconsistencyError[];
};

export function createFoldState(): FoldState {
  return { transcript: { wordTokens: [], segments: [], text: "" } };
}

type Timed = { start: number; end: number };

function inconsistency(unit: Timed): string | undefined {
  if (!Number.isFinite(unit.start) || !Number.isFinite(unit.end)) {
    return "non-finite timestamp";
  }
  if (unit.end < unit.start) return `ends (${unit.end}s) before it starts (${unit.start}s)`;
  if (unit.start < 0) return `starts ${unit.start}s before the chunk's audio`;
  return undefined;
}

function keepConsistent<T extends Timed>(
  units: readonly T[],
  chunkIndex: number,
  kind: InconsistentUnitKind,
  issues: MergeInconsistencyError[]
): T[] {
  const kept: T[] = [];
  units.forEach((unit, idx) => {
    const reason = inconsistency(unit);
    if (reason) {
      issues.push(new MergeInconsistencyError(chunkIndex, kind, idx, reason));
      return;
    }
    kept.push(unit);
  });
  return kept;
}

/**
 * Drops units that contradict the chunk-local time contract (timestamps
 * must be finite, ordered and not before the start of the chunk's audio).
 */
export function validateChunkUnits(
  chunkIndex: number,
  result: ChunkTranscription
): { wordTokens: WordToken[]; segments: Segment[]; issues: MergeInconsistencyError[] } {
  const issues: MergeInconsistencyError[] = [];
  const wordTokens = keepConsistent(result.wordTokens, chunkIndex, "word", issues);
  const segments = keepConsistent(result.segments, chunkIndex, "segment", issues);
  return { wordTokens, segments, issues };
}

function offsetUnits<T extends Timed>(units: readonly T[], offsetSec: number): T[] {
  if (offsetSec === 0) return units.map((u) => ({ ...u }));
  return units.map((u) => ({ ...u, start: u.start + offsetSec, end: u.end + offsetSec }));
}

function joinText(left: string, right: string): string {
  if (!left) return right;
  if (!right) return left;
  return `${left} ${right}`;
}

/**
 * Folds one chunk's result into the accumulated transcript. Must be called
 * in ascending chunk order: the boundary rule assumes the previous chunk
 * already owns everything before this chunk's logical start.
 */
export function foldChunk(
  state: FoldState,
  window: ChunkWindow,
  result: ChunkTranscription,
  options: FoldOptions
): { state: FoldState; stats: FoldStats } {
  const chunkIndex = window.chunkIndex;
  const acc = state.transcript;
  const validated = validateChunkUnits(chunkIndex, result);

  const offsetSec = window.actualStartMs / 1000;
  let words = offsetUnits(validated.wordTokens, offsetSec);
  let segments = offsetUnits(validated.segments, offsetSec);
  const hadTimedUnits = words.length > 0 || segments.length > 0;

  if (chunkIndex > 0) {
    const ownedBoundarySec = window.logicalStartMs / 1000;
    words = trimWords(words, ownedBoundarySec, options.epsilonSec);
    segments = trimSegments(segments, ownedBoundarySec, options.epsilonSec);
  }

  let chunkText = result.rawText.trim();
  const textDropped =
    chunkIndex > 0 && hadTimedUnits && words.length === 0 && segments.length === 0;
  if (textDropped) chunkText = "";

  const lastSegment = acc.segments[acc.segments.length - 1];
  const firstSegment = segments[0];
  if (lastSegment && firstSegment) {
    const text = dedupSeam(lastSegment.text, firstSegment.text, options.maxOverlapChars);
    // A segment the previous one already fully covers adds nothing.
    segments = text ? [{ ...firstSegment, text }, ...segments.slice(1)] : segments.slice(1);
  }

  const seamOverlapChars = findOverlap(acc.text, chunkText, options.maxOverlapChars);
  const dedupedText = dedupSeam(acc.text, chunkText, options.maxOverlapChars);

  const transcript: Transcript = {
    wordTokens: [...acc.wordTokens, ...words],
    segments: [...acc.segments, ...segments],
    text: joinText(acc.text, dedupedText),
  };

  return {
    state: { transcript },
    stats: {
      chunkIndex,
      keptWords: words.length,
      droppedWords: validated.wordTokens.length - words.length,
      keptSegments: segments.length,
      droppedSegments: validated.segments.length - segments.length,
      textDropped,
      seamOverlapChars,
      issues: validated.issues,
    },
  };
}

export type ChunkToMerge = {
  window: ChunkWindow;
  result: ChunkTranscription;
};

/** Sequential fold over results that are already in hand. */
export function mergeChunkResults(
  chunks: readonly ChunkToMerge[],
  options: FoldOptions
): Transcript {
  const ordered = [...chunks].sort((a, b) => a.window.chunkIndex - b.window.chunkIndex);
  let state = createFoldState();
  for (const chunk of ordered) {
    state = foldChunk(state, chunk.window, chunk.result, options).state;
  }
  return state.transcript;
}
