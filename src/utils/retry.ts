export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each retry; `retry` counts from 1. */
  onRetry?: (info: { retry: number; delayMs: number; error: unknown }) => void;
};

export function backoffDelayMs(
  attempt: number,
  opts: { baseDelayMs: number; maxDelayMs: number }
): number {
  return Math.min(opts.baseDelayMs * 2 ** attempt, opts.maxDelayMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `operation` up to `retries + 1` times with exponential backoff.
 * The attempt number (starting at 0) is passed to the operation. An aborted
 * `signal` stops further attempts and rejects with the abort reason.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= opts.retries) {
    if (opts.signal?.aborted) throw opts.signal.reason;
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === opts.retries) break;
      if (opts.signal?.aborted) break;
      if (opts.shouldRetry && !opts.shouldRetry(error)) break;
      const delay = backoffDelayMs(attempt, opts);
      opts.onRetry?.({ retry: attempt + 1, delayMs: delay, error });
      await sleep(delay, opts.signal);
      attempt += 1;
    }
  }

  throw lastError;
}
