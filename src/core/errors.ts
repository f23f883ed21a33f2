export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input (plate fingerprint, response value, message); raised before any I/O. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION', details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
  }
}

export class RateLimitExceededError extends AppError {
  constructor(
    message: string,
    public readonly quota: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'RATE_LIMIT_EXCEEDED', { quota, ...details });
  }
}

export interface FailedRecipient {
  receiverId: string;
  error: string;
}

/** Fan-out wrote some rows but not all of them. */
export class PartialFailureError extends AppError {
  constructor(
    public readonly succeeded: string[],
    public readonly failed: FailedRecipient[]
  ) {
    super(
      `alert delivered to ${succeeded.length} of ${succeeded.length + failed.length} recipients`,
      'PARTIAL_FAILURE',
      { succeeded, failed }
    );
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ALREADY_RESPONDED', details);
  }
}

/** Transient transport failure. Retrying (with backoff) is the caller's job. */
export class NetworkError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK', details);
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERSISTENCE', details);
  }
}

export type AlertError =
  | ValidationError
  | NotFoundError
  | RateLimitExceededError
  | PartialFailureError
  | ConflictError
  | NetworkError
  | PersistenceError;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/** Wrap an unexpected store failure; typed errors pass through untouched. */
export const toPersistenceError = (err: unknown, operation: string): AlertError => {
  if (err instanceof NetworkError || err instanceof PersistenceError || err instanceof NotFoundError) {
    return err;
  }
  return new PersistenceError(`${operation} failed: ${errorMessage(err)}`, { operation });
};
