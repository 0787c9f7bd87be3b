/**
 * Sessionkeep Error Types and Factory Functions
 *
 * Standardized error handling across the store, config and CLI packages.
 * Every error carries the component that raised it and structured details,
 * so callers can tell "store busy, retry later" apart from "logic error".
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * All Sessionkeep error codes
 */
export const SessionkeepErrorCodes = {
  /** Configuration error */
  CONFIG: 'SESSIONKEEP_ERR_CONFIG',
  /** Record failed schema validation */
  VALIDATION: 'SESSIONKEEP_ERR_VALIDATION',
  /** Resource not found (only raised where absence is not a normal result) */
  NOT_FOUND: 'SESSIONKEEP_ERR_NOT_FOUND',
  /** Session lock could not be acquired within the retry budget */
  LOCK_NOT_ACQUIRED: 'SESSIONKEEP_ERR_LOCK_NOT_ACQUIRED',
  /** Session lock release failed */
  LOCK_RELEASE_FAILED: 'SESSIONKEEP_ERR_LOCK_RELEASE_FAILED',
  /** Store connection or command failure */
  STORE_UNAVAILABLE: 'SESSIONKEEP_ERR_STORE_UNAVAILABLE',
  /** Store command exceeded its timeout */
  STORE_TIMEOUT: 'SESSIONKEEP_ERR_STORE_TIMEOUT',
  /** Stored payload could not be decoded */
  DECODE_FAILED: 'SESSIONKEEP_ERR_DECODE_FAILED',
  /** Caller passed an unusable argument */
  INVALID_ARGUMENT: 'SESSIONKEEP_ERR_INVALID_ARGUMENT',
  /** Internal error */
  INTERNAL: 'SESSIONKEEP_ERR_INTERNAL',
} as const;

export type SessionkeepErrorCode = (typeof SessionkeepErrorCodes)[keyof typeof SessionkeepErrorCodes];

// ============================================================================
// Error Interface
// ============================================================================

/**
 * Structured Sessionkeep error
 */
export interface SessionkeepErrorData {
  /** Error code */
  code: SessionkeepErrorCode;
  /** Human-readable error message */
  message: string;
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Correlation ID for tracing */
  correlationId?: string;
  /** Original error if wrapping another error */
  cause?: Error;
}

// ============================================================================
// SessionkeepError Class
// ============================================================================

/**
 * Base error class for all Sessionkeep errors
 */
export class SessionkeepError extends Error {
  /** Error code */
  readonly code: SessionkeepErrorCode;
  /** Component that generated the error */
  readonly component: string;
  /** Additional error details */
  readonly details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  readonly timestamp: string;
  /** Correlation ID for tracing */
  readonly correlationId?: string;

  constructor(data: SessionkeepErrorData) {
    super(data.message);
    this.name = 'SessionkeepError';
    this.code = data.code;
    this.component = data.component;
    this.details = data.details;
    this.timestamp = data.timestamp;
    this.correlationId = data.correlationId;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SessionkeepError);
    }

    if (data.cause) {
      this.cause = data.cause;
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      component: this.component,
      details: this.details,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message} (component: ${this.component})`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Options for creating errors
 */
export interface CreateErrorOptions {
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Correlation ID for tracing */
  correlationId?: string;
  /** Original error if wrapping */
  cause?: Error;
}

function createError(
  code: SessionkeepErrorCode,
  message: string,
  options: CreateErrorOptions
): SessionkeepError {
  return new SessionkeepError({
    code,
    message,
    timestamp: new Date().toISOString(),
    ...options,
  });
}

/**
 * Create a configuration error
 */
export function createConfigError(message: string, options: CreateErrorOptions): SessionkeepError {
  return createError(SessionkeepErrorCodes.CONFIG, message, options);
}

/**
 * Create a validation error
 */
export function createValidationError(
  message: string,
  options: CreateErrorOptions
): SessionkeepError {
  return createError(SessionkeepErrorCodes.VALIDATION, message, options);
}

export function createNotFoundError(message: string, options: CreateErrorOptions): SessionkeepError {
  return createError(SessionkeepErrorCodes.NOT_FOUND, message, options);
}

/**
 * Create a lock-not-acquired error. Raised once every acquisition retry is spent.
 */
export function createLockNotAcquiredError(
  message: string,
  options: CreateErrorOptions
): SessionkeepError {
  return createError(SessionkeepErrorCodes.LOCK_NOT_ACQUIRED, message, options);
}

export function createLockReleaseFailedError(
  message: string,
  options: CreateErrorOptions
): SessionkeepError {
  return createError(SessionkeepErrorCodes.LOCK_RELEASE_FAILED, message, options);
}

/**
 * Create a store unavailable error
 */
export function createStoreUnavailableError(
  message: string,
  options: CreateErrorOptions
): SessionkeepError {
  return createError(SessionkeepErrorCodes.STORE_UNAVAILABLE, message, options);
}

/**
 * Create a store timeout error
 */
export function createStoreTimeoutError(
  message: string,
  options: CreateErrorOptions
): SessionkeepError {
  return createError(SessionkeepErrorCodes.STORE_TIMEOUT, message, options);
}

export function createDecodeFailedError(
  message: string,
  options: CreateErrorOptions
): SessionkeepError {
  return createError(SessionkeepErrorCodes.DECODE_FAILED, message, options);
}

/**
 * Create an invalid argument error
 */
export function createInvalidArgumentError(
  message: string,
  options: CreateErrorOptions
): SessionkeepError {
  return createError(SessionkeepErrorCodes.INVALID_ARGUMENT, message, options);
}

/**
 * Create an internal error
 */
export function createInternalError(message: string, options: CreateErrorOptions): SessionkeepError {
  return createError(SessionkeepErrorCodes.INTERNAL, message, options);
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check if an error is a SessionkeepError
 */
export function isSessionkeepError(error: unknown): error is SessionkeepError {
  return error instanceof SessionkeepError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: SessionkeepErrorCode): boolean {
  return isSessionkeepError(error) && error.code === code;
}

/**
 * Store failures that a caller may reasonably retry later
 */
export function isTransientStoreError(error: unknown): boolean {
  return (
    hasErrorCode(error, SessionkeepErrorCodes.STORE_UNAVAILABLE) ||
    hasErrorCode(error, SessionkeepErrorCodes.STORE_TIMEOUT) ||
    hasErrorCode(error, SessionkeepErrorCodes.LOCK_NOT_ACQUIRED)
  );
}

/**
 * Wrap an unknown error as a SessionkeepError.
 * If already a SessionkeepError, returns as-is. Otherwise wraps as internal error.
 */
export function wrapError(error: unknown, options: CreateErrorOptions): SessionkeepError {
  if (isSessionkeepError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return createInternalError(error.message, {
      ...options,
      cause: error,
    });
  }

  return createInternalError(String(error), options);
}

/**
 * Extract error information suitable for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (isSessionkeepError(error)) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
