/**
 * Raised when a backing store (e.g. Redis) cannot serve an operation.
 * Stores do not retry; callers decide between retry and fallback.
 */
export class StoreBackendError extends Error {
  readonly backend: string;
  readonly operation: string;

  constructor(backend: string, operation: string, cause?: unknown) {
    const detail =
      cause instanceof Error
        ? cause.message
        : cause !== undefined
          ? String(cause)
          : 'not connected';
    super(`${backend} ${operation} failed: ${detail}`, { cause });
    this.name = 'StoreBackendError';
    this.backend = backend;
    this.operation = operation;
  }
}
