import pLimit from "p-limit";
import type { AppConfig } from "../config/schema.js";
import type { AudioSource } from "../utils/audio.js";
import { logDebug, logStep, logWarn } from "../utils/logger.js";
import { retry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import type { TranscriptionInvoker } from "../transcription/provider.js";
import {
  ChunkTranscriptionError,
  describeError,
  isRetryableError,
} from "../transcription/errors.js";
import { createFoldState, foldChunk } from "../transcription/merge.js";
import { applyDiarization } from "../transcription/segmentation.js";
import type {
  ChunkResult,
  GapRange,
  ReassemblyStatus,
  Transcript,
} from "../transcription/types.js";
import { CancelledError, PlanningError } from "./errors.js";
import type { ReassemblyEventEmitter, ReassemblyState } from "./events.js";
import { describeWindow, planChunks, type ChunkWindow } from "./plan.js";

export type ReassemblyOptions = {
  chunkDurationMs: number;
  overlapMs: number;
  maxOverlapChars: number;
  epsilonSec: number;
  /** Upper bound on chunk transcriptions in flight at once. */
  concurrency: number;
  /** Extra attempts per chunk after the first one fails. */
  chunkRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  chunkTimeoutMs: number;
  diarize: boolean;
};

export const DEFAULT_REASSEMBLY_OPTIONS: ReassemblyOptions = {
  chunkDurationMs: 60_000,
  overlapMs: 1_500,
  maxOverlapChars: 80,
  epsilonSec: 0.01,
  concurrency: 2,
  chunkRetries: 2,
  retryBaseDelayMs: 1_000,
  retryMaxDelayMs: 15_000,
  chunkTimeoutMs: 120_000,
  diarize: false,
};

export function toReassemblyOptions(config: AppConfig): ReassemblyOptions {
  return {
    chunkDurationMs: config.chunkDurationMs,
    overlapMs: config.overlapMs,
    maxOverlapChars: config.maxOverlapChars,
    epsilonSec: config.epsilonSec,
    concurrency: config.concurrency,
    chunkRetries: config.chunkRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    retryMaxDelayMs: config.retryMaxDelayMs,
    chunkTimeoutMs: config.chunkTimeoutMs,
    diarize: config.diarize,
  };
}

export type ReassemblyResult = {
  status: ReassemblyStatus;
  transcript: Transcript;
  gaps: GapRange[];
  windows: ChunkWindow[];
};

export type ReassembleDeps = {
  emitter?: ReassemblyEventEmitter;
  abortSignal?: AbortSignal;
};

type ChunkOutcome =
  | { ok: true; result: ChunkResult }
  | { ok: false; error: ChunkTranscriptionError };

function validateOptions(opts: ReassemblyOptions) {
  const checks: Array<[keyof ReassemblyOptions, boolean]> = [
    ["concurrency", Number.isInteger(opts.concurrency) && opts.concurrency > 0],
    ["chunkRetries", Number.isInteger(opts.chunkRetries) && opts.chunkRetries >= 0],
    ["maxOverlapChars", Number.isInteger(opts.maxOverlapChars) && opts.maxOverlapChars >= 0],
    ["epsilonSec", Number.isFinite(opts.epsilonSec) && opts.epsilonSec >= 0],
    ["chunkTimeoutMs", Number.isFinite(opts.chunkTimeoutMs) && opts.chunkTimeoutMs > 0],
    ["retryBaseDelayMs", Number.isFinite(opts.retryBaseDelayMs) && opts.retryBaseDelayMs >= 0],
    ["retryMaxDelayMs", Number.isFinite(opts.retryMaxDelayMs) && opts.retryMaxDelayMs >= 0],
  ];
  for (const [key, ok] of checks) {
    if (!ok) throw new PlanningError(`Invalid ${key}: ${String(opts[key])}`);
  }
}

function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Plans chunks over `audio`, transcribes them with bounded concurrency and
 * folds the results strictly in chunk order. Chunks that still fail after
 * their retries become gaps; only invalid options (PlanningError) and
 * cancellation (CancelledError) reject.
 */
export async function reassemble(
  audio: AudioSource,
  invoker: TranscriptionInvoker,
  options: Partial<ReassemblyOptions> = {},
  deps: ReassembleDeps = {}
): Promise<ReassemblyResult> {
  const opts: ReassemblyOptions = { ...DEFAULT_REASSEMBLY_OPTIONS, ...options };
  const { emitter, abortSignal } = deps;
  const nowIso = () => new Date().toISOString();
  const setState = (state: ReassemblyState) => {
    emitter?.emit({ type: "reassembly:state", state, timestamp: nowIso() });
  };

  validateOptions(opts);
  const windows = planChunks(audio.durationMs, opts.chunkDurationMs, opts.overlapMs);
  setState("planned");
  logStep(
    "plan",
    `${windows.length} chunk(s) over ${audio.durationMs}ms ` +
      `(chunk ${opts.chunkDurationMs}ms, overlap ${opts.overlapMs}ms)`
  );
  for (const window of windows) logDebug(describeWindow(window));

  if (abortSignal?.aborted) {
    setState("cancelled");
    throw new CancelledError();
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort(new CancelledError());
  abortSignal?.addEventListener("abort", onAbort, { once: true });

  emitter?.emit({
    type: "reassembly:start",
    audioLengthMs: audio.durationMs,
    totalChunks: windows.length,
    concurrency: opts.concurrency,
    timestamp: nowIso(),
  });

  const transcribeWindow = async (window: ChunkWindow): Promise<ChunkOutcome> => {
    const { chunkIndex } = window;
    let attempts = 0;
    try {
      const transcription = await retry(
        async (attempt) => {
          attempts = attempt + 1;
          emitter?.emit({ type: "chunk:start", chunkIndex, attempt: attempts, timestamp: nowIso() });
          return withTimeout(
            async (signal) => {
              const slice = await audio.slice(window.actualStartMs, window.actualEndMs, signal);
              return invoker.transcribeChunk({ chunkIndex, window, audio: slice }, { signal });
            },
            opts.chunkTimeoutMs,
            controller.signal
          );
        },
        {
          retries: opts.chunkRetries,
          baseDelayMs: opts.retryBaseDelayMs,
          maxDelayMs: opts.retryMaxDelayMs,
          signal: controller.signal,
          shouldRetry: isRetryableError,
          onRetry: ({ retry: retryNumber, delayMs, error }) => {
            const message = describeError(error);
            logStep(
              "retry",
              `chunk ${chunkIndex} retry ${retryNumber}/${opts.chunkRetries} in ${delayMs}ms: ${message}`
            );
            emitter?.emit({
              type: "chunk:retry",
              chunkIndex,
              retry: retryNumber,
              delayMs,
              error: message,
              timestamp: nowIso(),
            });
          },
        }
      );
      emitter?.emit({
        type: "chunk:done",
        chunkIndex,
        words: transcription.wordTokens.length,
        segments: transcription.segments.length,
        timestamp: nowIso(),
      });
      return { ok: true, result: { ...transcription, chunkIndex } };
    } catch (error) {
      return { ok: false, error: new ChunkTranscriptionError(chunkIndex, attempts, error) };
    }
  };

  const limit = pLimit(opts.concurrency);
  setState("dispatching");
  logStep("dispatch", `${windows.length} chunk(s), up to ${opts.concurrency} in flight`);
  // One slot per chunk index; slots resolve in any order, the fold reads them in order.
  const slots = windows.map((window) => ({
    window,
    outcome: limit(() => transcribeWindow(window)),
  }));

  let state = createFoldState();
  const gaps: GapRange[] = [];
  let folded = 0;

  try {
    for (const slot of slots) {
      const { window } = slot;
      const outcome = await untilAborted(slot.outcome, controller.signal);
      if (folded === 0) setState("folding");

      if (!outcome.ok) {
        const gap: GapRange = {
          chunkIndex: window.chunkIndex,
          logicalStartMs: window.logicalStartMs,
          logicalEndMs: window.logicalEndMs,
          error: outcome.error.message,
        };
        gaps.push(gap);
        logStep(
          "gap",
          `chunk ${gap.chunkIndex} [${gap.logicalStartMs}-${gap.logicalEndMs})ms left empty: ${gap.error}`
        );
        emitter?.emit({ type: "chunk:gap", ...gap, timestamp: nowIso() });
        folded += 1;
        continue;
      }

      const next = foldChunk(state, window, outcome.result, {
        epsilonSec: opts.epsilonSec,
        maxOverlapChars: opts.maxOverlapChars,
      });
      state = next.state;
      folded += 1;

      const { stats } = next;
      for (const issue of stats.issues) logWarn(issue.message);
      logStep(
        "fold",
        `chunk ${stats.chunkIndex}: kept ${stats.keptWords} word(s), ${stats.keptSegments} segment(s); ` +
          `trimmed ${stats.droppedWords} word(s), ${stats.droppedSegments} segment(s)` +
          (stats.seamOverlapChars > 0 ? `; seam ${stats.seamOverlapChars} char(s)` : "") +
          (stats.textDropped ? "; text fell inside overlap" : "")
      );
      emitter?.emit({
        type: "chunk:folded",
        chunkIndex: stats.chunkIndex,
        keptWords: stats.keptWords,
        droppedWords: stats.droppedWords,
        keptSegments: stats.keptSegments,
        droppedSegments: stats.droppedSegments,
        textDropped: stats.textDropped,
        seamOverlapChars: stats.seamOverlapChars,
        inconsistencies: stats.issues.length,
        timestamp: nowIso(),
      });
    }
  } catch (error) {
    if (controller.signal.aborted) {
      limit.clearQueue();
      setState("cancelled");
      emitter?.emit({
        type: "reassembly:cancelled",
        folded,
        totalChunks: windows.length,
        timestamp: nowIso(),
      });
      throw new CancelledError();
    }
    throw error;
  } finally {
    abortSignal?.removeEventListener("abort", onAbort);
  }

  const transcript = opts.diarize ? applyDiarization(state.transcript) : state.transcript;
  const status: ReassemblyStatus = gaps.length === 0 ? "complete" : "partial";
  setState(status);
  logStep(
    "done",
    status === "complete"
      ? `${windows.length} chunk(s) reassembled`
      : `${windows.length - gaps.length}/${windows.length} chunk(s) reassembled, ${gaps.length} gap(s)`
  );
  emitter?.emit({
    type: "reassembly:done",
    status,
    totalChunks: windows.length,
    gaps: gaps.length,
    timestamp: nowIso(),
  });

  return { status, transcript, gaps, windows };
}
