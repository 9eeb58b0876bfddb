import { PlanningError } from "./errors.js";

export type ChunkWindow = {
  readonly chunkIndex: number;
  /** Start of the range this chunk owns in the final transcript. */
  readonly logicalStartMs: number;
  readonly logicalEndMs: number;
  /** Start of the audio actually sent to the engine, including leading overlap. */
  readonly actualStartMs: number;
  readonly actualEndMs: number;
};

function assertInteger(name: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new PlanningError(
      `${name} must be an integer >= ${min} (got ${value})`
    );
  }
}

/**
 * Tiles `[0, audioLengthMs)` into consecutive logical windows of
 * `chunkDurationMs`. Each window's actual range reaches back `overlapMs`
 * (clamped at 0) so the engine has context across the boundary; there is no
 * trailing overlap.
 */
export function planChunks(
  audioLengthMs: number,
  chunkDurationMs: number,
  overlapMs: number
): ChunkWindow[] {
  assertInteger("audioLengthMs", audioLengthMs, 0);
  assertInteger("chunkDurationMs", chunkDurationMs, 1);
  assertInteger("overlapMs", overlapMs, 0);

  const windows: ChunkWindow[] = [];
  let logicalStart = 0;
  while (logicalStart < audioLengthMs) {
    const logicalEnd = Math.min(logicalStart + chunkDurationMs, audioLengthMs);
    windows.push(
      Object.freeze({
        chunkIndex: windows.length,
        logicalStartMs: logicalStart,
        logicalEndMs: logicalEnd,
        actualStartMs: Math.max(0, logicalStart - overlapMs),
        actualEndMs: logicalEnd,
      })
    );
    logicalStart = logicalEnd;
  }
  return windows;
}

export function describeWindow(window: ChunkWindow): string {
  return (
    `chunk ${window.chunkIndex}: logical=[${window.logicalStartMs}-${window.logicalEndMs})ms ` +
    `actual=[${window.actualStartMs}-${window.actualEndMs})ms`
  );
}
