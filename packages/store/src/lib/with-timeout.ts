import { StoreError } from '../errors.js';

/**
 * Race a store operation against a timer.
 *
 * On expiry the returned promise rejects with a `TIMEOUT` {@link StoreError};
 * the underlying operation keeps running and its late result is discarded.
 * A missing or non-positive `timeoutMs` returns `promise` unchanged.
 *
 * @param promise - The pending store operation.
 * @param timeoutMs - Upper bound in milliseconds.
 * @param label - Operation name used in the error message.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number | undefined, label: string): Promise<T> {
  if (timeoutMs === undefined || timeoutMs <= 0) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new StoreError(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT'));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
