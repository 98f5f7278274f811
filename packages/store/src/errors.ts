/**
 * Error classes for the flag store.
 *
 * Include a machine-readable `code` for programmatic error handling.
 *
 * @module store/errors
 */

/** Machine-readable error codes for persistent store operations. */
export type StoreErrorCode = 'STORE_UNAVAILABLE' | 'CONFLICT' | 'TIMEOUT' | 'NOT_OPEN';

/** Raised by persistent store adapters and surfaced to callers unmodified. */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/** Raised by notification adapters. Never escapes the facade. */
export class NotificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationError';
  }
}

/**
 * Wrap an arbitrary adapter failure in a {@link StoreError}.
 *
 * Existing StoreErrors pass through so their code is kept.
 */
export function toStoreError(err: unknown, operation: string): StoreError {
  if (err instanceof StoreError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new StoreError(`${operation} failed: ${message}`, 'STORE_UNAVAILABLE', { cause: err });
}

/** Raised by the facade when a flag name or gate fails validation. */
export class InvalidFlagError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = 'InvalidFlagError';
  }
}
