#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig, type PartialConfig } from "../config/index.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";
import { FfmpegAudioSource } from "../utils/audio.js";
import { reassemble, toReassemblyOptions } from "../pipeline/reassemble.js";
import { JsonLinesEventEmitter } from "../pipeline/jsonlEmitter.js";
import { createTranscriptionProvider } from "../transcription/index.js";
import { FsTranscriptSink } from "../storage/fsAdapter.js";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkg: { version?: string } = JSON.parse(
  readFileSync(join(__dirname, "../../package.json"), "utf8")
);

const program = new Command();

program
  .name("chunkscribe")
  .version(pkg.version ?? "0.0.0")
  .argument("<audioFile>", "Audio file to transcribe (any format ffmpeg reads)")
  .option("--config <path>", "YAML config file", "config.yaml")
  .option("--outDir <path>", "Output directory")
  .option("--model <name>", "Transcription model (default whisper-1, gpt-4o-transcribe-diarize with --diarize)")
  .option("--language <code>", "Spoken language hint, e.g. en")
  .option("--diarize", "Request speaker labels and render them")
  .option("--chunkDurationMs <n>", "Logical chunk length in ms", (v) => Number(v))
  .option("--overlapMs <n>", "Leading overlap per chunk in ms", (v) => Number(v))
  .option("--maxOverlapChars <n>", "Longest text seam to deduplicate", (v) => Number(v))
  .option("--epsilonSec <n>", "Boundary tolerance in seconds", (v) => Number(v))
  .option("--concurrency <n>", "Chunk transcriptions in flight", (v) => Number(v))
  .option("--chunkRetries <n>", "Retries per chunk before it becomes a gap", (v) => Number(v))
  .option("--chunkTimeoutMs <n>", "Timeout per chunk attempt in ms", (v) => Number(v))
  .option("--json-events", "Emit JSONL reassembly events to stdout")
  .option("--no-timestamps", "Omit timestamps from the .txt output")
  .parse(process.argv);

type CliOptions = {
  config: string;
  outDir?: string;
  model?: string;
  language?: string;
  diarize?: boolean;
  chunkDurationMs?: number;
  overlapMs?: number;
  maxOverlapChars?: number;
  epsilonSec?: number;
  concurrency?: number;
  chunkRetries?: number;
  chunkTimeoutMs?: number;
  jsonEvents?: boolean;
  timestamps: boolean;
};

async function main() {
  const audioPath = program.args[0];
  if (!audioPath) {
    program.help({ error: true });
    return;
  }
  const opts = program.opts<CliOptions>();
  if (opts.jsonEvents) process.env.CHUNKSCRIBE_JSON_EVENTS = "1";
  const emitter = opts.jsonEvents ? new JsonLinesEventEmitter() : undefined;

  const overrides: PartialConfig = {
    outputDir: opts.outDir,
    openaiModel: opts.model,
    language: opts.language,
    diarize: opts.diarize,
    chunkDurationMs: opts.chunkDurationMs,
    overlapMs: opts.overlapMs,
    maxOverlapChars: opts.maxOverlapChars,
    epsilonSec: opts.epsilonSec,
    concurrency: opts.concurrency,
    chunkRetries: opts.chunkRetries,
    chunkTimeoutMs: opts.chunkTimeoutMs,
  };
  const config = loadConfig(opts.config, overrides);

  const audio = await FfmpegAudioSource.open(audioPath, {
    ffmpegPath: config.ffmpegPath,
    ffprobePath: config.ffprobePath,
  });
  const invoker = createTranscriptionProvider(config);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logWarn("Interrupted; abandoning in-flight chunks.");
    controller.abort();
  });

  const result = await reassemble(audio, invoker, toReassemblyOptions(config), {
    emitter,
    abortSignal: controller.signal,
  });

  const sink = new FsTranscriptSink(config.outputDir);
  const paths = await sink.save(result, {
    source: audioPath,
    durationMs: audio.durationMs,
    timestamps: opts.timestamps,
  });
  logInfo(`Transcript written to ${paths.txtPath}`);

  if (result.status === "partial") {
    logWarn(
      `${result.gaps.length} chunk(s) could not be transcribed; see ${paths.gapsPath}`
    );
    process.exitCode = 2;
  }
}

main().catch((error: unknown) => {
  logError(
    error instanceof Error ? error.stack ?? error.message : String(error)
  );
  process.exit(1);
});
