/** A single word with timing in seconds. */
export type WordToken = {
  text: string;
  start: number;
  end: number;
  speaker?: string;
};

/**
 * A coarser timed unit. Fields the engine adds beyond these pass through
 * untouched.
 */
export type Segment = {
  start: number;
  end: number;
  text: string;
  speaker?: string;
  [key: string]: unknown;
};

/** What an invoker returns for one chunk, in chunk-local time. */
export type ChunkTranscription = {
  wordTokens: WordToken[];
  segments: Segment[];
  rawText: string;
};

export type ChunkResult = ChunkTranscription & {
  chunkIndex: number;
};

export type Transcript = {
  wordTokens: WordToken[];
  segments: Segment[];
  text: string;
};

export type GapRange = {
  chunkIndex: number;
  logicalStartMs: number;
  logicalEndMs: number;
  error: string;
};

export type ReassemblyStatus = "complete" | "partial";
