export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, message = `Timed out after ${timeoutMs}ms`) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `operation` with its own AbortSignal that fires when either
 * `timeoutMs` elapses or `parentSignal` aborts. The returned promise settles
 * as soon as one of those happens, even if the operation ignores its signal.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    return Promise.reject(parentSignal.reason);
  }

  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parentSignal?.removeEventListener("abort", onParentAbort);
      fn();
    };

    const timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      controller.abort(error);
      finish(() => reject(error));
    }, timeoutMs);

    const onParentAbort = () => {
      controller.abort(parentSignal?.reason);
      finish(() => reject(parentSignal?.reason));
    };
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });

    operation(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}
