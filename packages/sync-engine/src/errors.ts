/**
 * Sync Engine Errors
 * Per-action failures are recorded in execution summaries; only
 * CatastrophicError aborts a transaction.
 */

export class PackSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'PackSyncError';
  }
}

/** Malformed candidate or pack data */
export class ValidationError extends PackSyncError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** A generated pack id already exists */
export class IdentityCollisionError extends PackSyncError {
  constructor(public readonly packId: string) {
    super(`Pack id already exists: ${packId}`, 'IDENTITY_COLLISION');
    this.name = 'IdentityCollisionError';
  }
}

export class ConstraintViolationError extends PackSyncError {
  constructor(message: string) {
    super(message, 'CONSTRAINT_VIOLATION');
    this.name = 'ConstraintViolationError';
  }
}

/** POS vendor failure for a single pack */
export class ExternalServiceError extends PackSyncError {
  constructor(
    message: string,
    public readonly retryable: boolean = true
  ) {
    super(message, 'EXTERNAL_SERVICE_ERROR');
    this.name = 'ExternalServiceError';
  }
}

/** Unexpected failure inside a storage transaction */
export class CatastrophicError extends PackSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CATASTROPHIC');
    this.name = 'CatastrophicError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class LockUnavailableError extends PackSyncError {
  constructor(public readonly performanceId: string) {
    super(`Performance ${performanceId} is locked by another pass`, 'LOCK_UNAVAILABLE');
    this.name = 'LockUnavailableError';
  }
}

/** The lock expired or changed hands while its pass was still running */
export class LockLostError extends PackSyncError {
  constructor(public readonly performanceId: string) {
    super(`Lock for performance ${performanceId} was lost during the pass`, 'LOCK_LOST');
    this.name = 'LockLostError';
  }
}

/**
 * Errors a single plan action may fail with without aborting its siblings.
 */
export function isActionRecoverable(error: unknown): error is PackSyncError {
  return (
    error instanceof ValidationError ||
    error instanceof IdentityCollisionError ||
    error instanceof ConstraintViolationError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
