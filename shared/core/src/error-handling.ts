/**
 * Shared Error Handling Utilities
 *
 * Two failure classes exist for estimators:
 * - Construction-time validation (bad quantile, bad window size, malformed
 *   snapshot): reported as {@link ValidationError}, recoverable.
 * - Use-time invariant violations (NaN into an ordered structure, reading an
 *   empty window, out-of-range rank, failed revert inside the rolling
 *   decorator): reported as {@link InvariantError} with CRITICAL severity.
 *   Once thrown, the estimator that raised it must not be trusted.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standardized error codes.
 */
export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  INVALID_STATE = 1005,
  NOT_SERIALIZABLE = 1006,

  // Validation errors (6000-6999)
  VALIDATION_FAILED = 6000,
  INVALID_CONFIG = 6002,
  SCHEMA_MISMATCH = 6003,

  // Invariant violations (8000-8999)
  NAN_OBSERVATION = 8000,
  EMPTY_WINDOW = 8001,
  INDEX_OUT_OF_RANGE = 8002,
  EMPTY_CAPACITY = 8003,
  REVERT_FAILED = 8004,
  CORRUPTED_WINDOW = 8005
}

/**
 * Error severity levels.
 */
export enum ErrorSeverity {
  /** Informational - expected errors that don't require action */
  INFO = 'info',
  /** Warning - unexpected but recoverable errors */
  WARNING = 'warning',
  /** Error - failures that may impact functionality */
  ERROR = 'error',
  /** Critical - estimator state can no longer be trusted */
  CRITICAL = 'critical'
}

// =============================================================================
// Custom Error Classes
// =============================================================================

/**
 * Base error class for statistics estimators.
 * Provides structured error information for logging.
 */
export class StatsError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: {
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = 'StatsError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.cause = options.cause;

    // Capture stack trace
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Convert to JSON for logging/serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack
    };
  }
}

/**
 * Validation error for invalid construction parameters or snapshots.
 */
export class ValidationError extends StatsError {
  readonly field?: string;
  readonly receivedValue?: unknown;
  readonly issues: string[];

  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      field?: string;
      receivedValue?: unknown;
      issues?: string[];
      cause?: Error;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message, options.code ?? ErrorCode.VALIDATION_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: {
        ...options.context,
        field: options.field,
        receivedValue: options.receivedValue,
        issues: options.issues
      }
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.receivedValue = options.receivedValue;
    this.issues = options.issues ?? [];
  }
}

/**
 * Contract violation at use time. The structure that threw it is left in a
 * state that must not be trusted.
 */
export class InvariantError extends StatsError {
  readonly structure: string;

  constructor(
    message: string,
    structure: string,
    options: {
      code?: ErrorCode;
      cause?: Error;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message, options.code ?? ErrorCode.INVALID_STATE, {
      severity: ErrorSeverity.CRITICAL,
      cause: options.cause,
      context: { ...options.context, structure }
    });
    this.name = 'InvariantError';
    this.structure = structure;
  }
}

// =============================================================================
// Error Handling Utilities
// =============================================================================

/**
 * Result type for operations that may fail.
 */
export type Result<T, E = StatsError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Create a success result.
 */
export function success<T>(data: T): Result<T> {
  return { success: true, data };
}

/**
 * Create a failure result.
 */
export function failure<E extends StatsError>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Wrap a sync function to return Result type instead of throwing.
 */
export function tryCatchSync<T>(
  fn: () => T,
  errorCode: ErrorCode = ErrorCode.UNKNOWN_ERROR
): Result<T> {
  try {
    const data = fn();
    return success(data);
  } catch (error) {
    if (error instanceof StatsError) {
      return failure(error);
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return failure(
      new StatsError(
        cause.message || 'Unknown error',
        errorCode,
        { cause }
      )
    );
  }
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format error for logging.
 */
export function formatErrorForLog(error: Error): Record<string, unknown> {
  if (error instanceof StatsError) {
    return error.toJSON();
  }

  return {
    name: error.name,
    message: error.message,
    stack: error.stack
  };
}
