export { planChunks, describeWindow } from "./pipeline/plan.js";
export type { ChunkWindow } from "./pipeline/plan.js";
export {
  reassemble,
  toReassemblyOptions,
  DEFAULT_REASSEMBLY_OPTIONS,
} from "./pipeline/reassemble.js";
export type {
  ReassembleDeps,
  ReassemblyOptions,
  ReassemblyResult,
} from "./pipeline/reassemble.js";
export type { ReassemblyEvent, ReassemblyEventEmitter, ReassemblyState } from "./pipeline/events.js";
export { JsonLinesEventEmitter } from "./pipeline/jsonlEmitter.js";
export { CancelledError, PlanningError } from "./pipeline/errors.js";
export * from "./transcription/index.js";
export { FfmpegAudioSource } from "./utils/audio.js";
export type { AudioSlice, AudioSource } from "./utils/audio.js";
export { TimeoutError } from "./utils/timeout.js";
export { FsTranscriptSink } from "./storage/fsAdapter.js";
export type { SinkMeta, TranscriptSink } from "./storage/adapter.js";
export { loadConfig, configSchema } from "./config/index.js";
export type { AppConfig } from "./config/index.js";
