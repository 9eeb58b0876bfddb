import type { ReassemblyResult } from "../pipeline/reassemble.js";
import type { OutputPaths } from "./index.js";

export type SinkMeta = {
  /** Path or name of the audio the transcript was made from. */
  source: string;
  durationMs?: number;
  timestamps?: boolean;
};

export interface TranscriptSink {
  save(result: ReassemblyResult, meta: SinkMeta): Promise<OutputPaths>;
}
