/**
 * A signal that aborts with a TimeoutError once `timeoutMs` elapses.
 * Call `cleanup` in a `finally` to clear the timer.
 */
export function createDeadlineSignal(timeoutMs: number): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new TimeoutError(timeoutMs));
  }, timeoutMs);
  timeout.unref?.();
  return { signal: controller.signal, cleanup: () => clearTimeout(timeout) };
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Settle with `work`, or reject with the signal's reason as soon as it aborts.
 * The work itself is not cancelled; a late result is discarded.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(toError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(err));
      },
    );
  });
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
