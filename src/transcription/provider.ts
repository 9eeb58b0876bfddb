import type { ChunkWindow } from "../pipeline/plan.js";
import type { AudioSlice } from "../utils/audio.js";
import type { ChunkTranscription } from "./types.js";

export type ChunkRequest = {
  chunkIndex: number;
  window: ChunkWindow;
  audio: AudioSlice;
};

/**
 * A speech-to-text engine seen one chunk at a time. Timestamps in the
 * returned transcription are relative to the start of `request.audio`.
 * Implementations should stop work when `opts.signal` aborts.
 */
export interface TranscriptionInvoker {
  readonly name: string;
  transcribeChunk(
    request: ChunkRequest,
    opts: { signal?: AbortSignal }
  ): Promise<ChunkTranscription>;
}
