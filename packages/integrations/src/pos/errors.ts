/**
 * POS API Errors
 */

export class PosApiError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'PosApiError';
  }
}

export class PosNotFoundError extends PosApiError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'PosNotFoundError';
  }
}

export class PosAuthError extends PosApiError {
  constructor(message: string, statusCode = 401) {
    super(message, 'AUTH_ERROR', statusCode);
    this.name = 'PosAuthError';
  }
}

export class PosRateLimitError extends PosApiError {
  constructor(message: string) {
    super(message, 'RATE_LIMIT', 429);
    this.name = 'PosRateLimitError';
  }
}

export class PosServerError extends PosApiError {
  constructor(message: string, statusCode = 500) {
    super(message, 'SERVER_ERROR', statusCode);
    this.name = 'PosServerError';
  }
}

/** A listing payload the vendor would reject */
export class PosValidationError extends PosApiError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'PosValidationError';
  }
}

/** Rate limits, server errors and transport failures are worth another try */
export function isRetryablePosError(error: unknown): boolean {
  if (error instanceof PosRateLimitError || error instanceof PosServerError) {
    return true;
  }
  if (error instanceof PosApiError) {
    return error.code === 'NETWORK_ERROR' || error.code === 'TIMEOUT';
  }
  return false;
}
