import { ErrorFactory } from './error-handling.util';

/**
 * Run `task` with an upper bound on its duration.
 *
 * Rejects with an upstream timeout error once `ms` elapses, or with a
 * cancellation error as soon as `signal` aborts. The underlying call is not
 * interrupted; its eventual result is discarded.
 */
export function withTimeout<T>(
  operation: string,
  task: () => Promise<T>,
  ms: number,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(ErrorFactory.cancelled(operation));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(ErrorFactory.cancelled(operation));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(ErrorFactory.timeout(operation, ms));
    }, ms);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    task().then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
