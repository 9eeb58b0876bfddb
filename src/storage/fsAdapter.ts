import { promises as fs } from "node:fs";
import type { ReassemblyResult } from "../pipeline/reassemble.js";
import { formatJsonl, formatTxt } from "../formatters/index.js";
import type { SinkMeta, TranscriptSink } from "./adapter.js";
import {
  getOutputPaths,
  saveGaps,
  saveTranscriptJson,
  saveTranscriptJsonl,
  saveTranscriptTxt,
  type OutputPaths,
} from "./index.js";

/**
 * Writes `<name>.json`, `<name>.txt` and `<name>.jsonl` under `outputDir`.
 * `<name>.gaps.json` is written for partial results and removed otherwise.
 */
export class FsTranscriptSink implements TranscriptSink {
  constructor(private outputDir: string) {}

  async save(result: ReassemblyResult, meta: SinkMeta): Promise<OutputPaths> {
    const paths = getOutputPaths(this.outputDir, meta.source);
    const { transcript, gaps, status } = result;

    await saveTranscriptJson(paths.jsonPath, { ...transcript, status, source: meta.source });
    await saveTranscriptTxt(
      paths.txtPath,
      formatTxt(
        transcript,
        gaps,
        { source: meta.source, durationMs: meta.durationMs, status },
        { timestamps: meta.timestamps }
      )
    );
    await saveTranscriptJsonl(paths.jsonlPath, formatJsonl(transcript, gaps));

    if (gaps.length > 0) {
      await saveGaps(paths.gapsPath, gaps);
    } else {
      await fs.rm(paths.gapsPath, { force: true });
    }
    return paths;
  }
}
