import { CancelledError, TimeoutError } from './errors.js';

/**
 * Runs `operation`, rejecting with TimeoutError after `timeoutMs` or with
 * CancelledError when `signal` aborts. A null `timeoutMs` only observes the signal. The underlying operation is not
 * interrupted; its eventual result is discarded.
 */
export function withTimeout<T>(
  label: string,
  timeoutMs: number | null,
  operation: () => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError(label));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(new CancelledError(label));
    };
    const timer =
      timeoutMs === null
        ? undefined
        : setTimeout(() => {
            cleanup();
            reject(new TimeoutError(label, timeoutMs));
          }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    Promise.resolve()
      .then(operation)
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
  });
}
