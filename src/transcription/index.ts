export type {
  ChunkResult,
  ChunkTranscription,
  GapRange,
  Segment,
  Transcript,
  WordToken,
} from "./types.js";
export type { ChunkRequest, TranscriptionInvoker } from "./provider.js";
export { createTranscriptionProvider, resolveOpenAiModel } from "./factory.js";
export { OpenAiTranscriptionProvider } from "./openai/index.js";
export { parseTranscriptionResponse } from "./openai/parse.js";
export { trimSegments, trimWords } from "./boundary.js";
export { dedupSeam, findOverlap } from "./seam.js";
export { createFoldState, foldChunk, mergeChunkResults } from "./merge.js";
export {
  applyDiarization,
  formatDiarizedTranscript,
  inferWordTokensFromSegments,
  normalizeSpeakerLabels,
  resegmentWords,
} from "./segmentation.js";
export {
  ChunkTranscriptionError,
  MergeInconsistencyError,
  ProviderHttpError,
  isRetryableError,
} from "./errors.js";
