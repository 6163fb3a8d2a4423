/**
 * Base error class with error codes
 * @module @herald/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  CANCELLED = 1004,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  UNRESOLVED_REFERENCE = 2005,

  // Configuration errors (3xxx)
  CACHE_SYNC_TIMEOUT = 3000,
  INVALID_CONTROLLER_CONFIG = 3001,
  KUBE_CONFIG_UNAVAILABLE = 3002,
  SERVICE_ALREADY_REGISTERED = 3003,
  NOTIFIER_SEALED = 3004,

  // Worker errors (4xxx)
  WORKER_CONSTRUCTION_FAILED = 4000,
  WORKER_INIT_FAILED = 4001,
  STALE_SNAPSHOT = 4003,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource kind involved */
  resourceType?: string;
  /** Resource name involved */
  resourceId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Codes that end the process when they reach the reconciliation loop
 */
const FATAL_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.VALIDATION_FAILED,
  ErrorCode.MISSING_REQUIRED_FIELD,
  ErrorCode.INVALID_FORMAT,
  ErrorCode.UNRESOLVED_REFERENCE,
  ErrorCode.CACHE_SYNC_TIMEOUT,
  ErrorCode.INVALID_CONTROLLER_CONFIG,
  ErrorCode.KUBE_CONFIG_UNAVAILABLE,
  ErrorCode.WORKER_CONSTRUCTION_FAILED,
  ErrorCode.WORKER_INIT_FAILED,
]);

/**
 * Base error class for all Herald errors
 */
export class HeraldError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Original error if this wraps another */
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'HeraldError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for status responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  /**
   * Whether this error must terminate the controller process
   */
  isFatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

/**
 * Check if an error is a HeraldError
 */
export function isHeraldError(error: unknown): error is HeraldError {
  return error instanceof HeraldError;
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
