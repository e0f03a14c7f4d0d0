import type { MutexInterface } from "async-mutex";

export const ABORTED = Symbol("aborted");

export type Aborted = typeof ABORTED;

/**
 * Resolves with the next iterator result, or ABORTED as soon as the signal
 * fires. The pending `next()` is left to settle on its own.
 */
export function nextOrAbort<T>(
  iterator: AsyncIterator<T>,
  signal: AbortSignal
): Promise<IteratorResult<T> | Aborted> {
  if (signal.aborted) {
    return Promise.resolve(ABORTED);
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
    iterator.next().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Waits for the lock unless the signal fires first. A lock granted after the
 * abort is released immediately.
 */
export function acquireOrAbort(
  lock: MutexInterface,
  signal?: AbortSignal
): Promise<MutexInterface.Releaser | null> {
  if (signal?.aborted) {
    return Promise.resolve(null);
  }
  const pending = lock.acquire();
  if (!signal) {
    return pending;
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(null);
    signal.addEventListener("abort", onAbort, { once: true });
    pending.then(
      (release) => {
        signal.removeEventListener("abort", onAbort);
        if (signal.aborted) {
          release();
          return;
        }
        resolve(release);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
