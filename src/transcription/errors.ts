export class ChunkTranscriptionError extends Error {
  constructor(
    public readonly chunkIndex: number,
    public readonly attempts: number,
    cause: unknown
  ) {
    super(
      `Chunk ${chunkIndex} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(cause)}`,
      { cause }
    );
    this.name = "ChunkTranscriptionError";
  }
}

export type InconsistentUnitKind = "word" | "segment";

/**
 * A unit a chunk result emitted in violation of its own contract. These are
 * reported and dropped, never thrown out of the fold.
 */
export class MergeInconsistencyError extends Error {
  constructor(
    public readonly chunkIndex: number,
    public readonly unitKind: InconsistentUnitKind,
    public readonly unitIndex: number,
    public readonly reason: string
  ) {
    super(`Chunk ${chunkIndex} ${unitKind} #${unitIndex} dropped: ${reason}`);
    this.name = "MergeInconsistencyError";
  }
}

export class ProviderHttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "ProviderHttpError";
  }
}

/**
 * Client errors other than 408 and 429 fail the same way on every attempt,
 * so they are not retried. Everything else is.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderHttpError) {
    const { status } = error;
    if (status >= 400 && status < 500) return status === 408 || status === 429;
  }
  return true;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function sanitizeProviderErrorText(
  text: string,
  secrets: string[] = [],
  maxLen = 200
): string {
  let out = text;
  for (const secret of secrets) {
    if (!secret) continue;
    out = out.split(secret).join("[redacted]");
  }
  out = out.replace(/[\r\n\t]+/g, " ").trim();
  if (out.length > maxLen) {
    out = `${out.slice(0, maxLen)}...`;
  }
  return out;
}
