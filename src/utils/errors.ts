// src/utils/errors.ts

export class TransferError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Run-level errors

/**
 * Transport or authentication failure while building a snapshot.
 * Fatal: the run aborts before any mutation.
 */
export class FetchError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_FAILED', details);
  }
}

/**
 * Pre-flight failure: same credential identity on both sides, missing
 * credentials or an invalid configuration.
 */
export class ConfigurationError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

/**
 * A saved item outside the closed `submission | comment` set.
 */
export class UnexpectedTypeError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UNEXPECTED_TYPE', details);
  }
}

/**
 * A single mutating call failed. Recorded in the report, never thrown out of a run.
 */
export class PerItemApplyError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ITEM_APPLY_FAILED', details);
  }
}

export class PreferenceCopyError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PREFERENCE_COPY_FAILED', details);
  }
}

// Auth errors
export class AuthError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTH_FAILED', details);
  }
}

// API errors
export class ApiError extends TransferError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends TransferError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class CircuitBreakerOpenError extends NetworkError {
  constructor(
    message: string,
    /** Milliseconds until the circuit lets a request through again */
    public reopensIn?: number,
    details?: Record<string, unknown>
  ) {
    super(message, { ...details, reopensIn });
    this.code = 'CIRCUIT_BREAKER_OPEN';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
