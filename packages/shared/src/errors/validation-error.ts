/**
 * Validation error class
 * @module @herald/shared/errors/validation-error
 */

import { HeraldError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field (or settings key) that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** Machine-readable rule that failed, e.g. REQUIRED or UNRESOLVED_REFERENCE */
  code: string;
}

/**
 * Validation error for malformed or inconsistent configuration
 */
export class ValidationError extends HeraldError {
  /** Validation error details */
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create for a required field
   */
  static required(field: string): ValidationError {
    return new ValidationError(
      `Missing required field: ${field}`,
      [{ field, message: 'This field is required', code: 'REQUIRED' }],
      { field },
      ErrorCode.MISSING_REQUIRED_FIELD,
    );
  }

  /**
   * Create for an invalid format
   */
  static invalidFormat(field: string, expected: string): ValidationError {
    return new ValidationError(
      `Invalid format for field: ${field}`,
      [{ field, message: `Expected ${expected}`, code: 'INVALID_FORMAT' }],
      { field },
      ErrorCode.INVALID_FORMAT,
    );
  }

  /**
   * Create for a reference to something that is not defined
   */
  static unresolvedReference(field: string, kind: string, name: string): ValidationError {
    return new ValidationError(
      `${field} references undefined ${kind} '${name}'`,
      [{ field, message: `${kind} '${name}' is not defined`, code: 'UNRESOLVED_REFERENCE' }],
      { field },
      ErrorCode.UNRESOLVED_REFERENCE,
    );
  }

  /**
   * Create from multiple field errors
   */
  static multiple(details: ValidationErrorDetail[]): ValidationError {
    const detail = details[0];
    if (details.length === 1 && detail) {
      return new ValidationError(`${detail.field}: ${detail.message}`, details, { field: detail.field });
    }
    const fields = [...new Set(details.map((d) => d.field))].join(', ');
    return new ValidationError(`Validation failed for fields: ${fields}`, details);
  }

  /**
   * Check if a specific field has an error
   */
  hasFieldError(field: string): boolean {
    return this.details.some((d) => d.field === field);
  }

  /**
   * Get errors for a specific field
   */
  getFieldErrors(field: string): ValidationErrorDetail[] {
    return this.details.filter((d) => d.field === field);
  }

  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: ValidationError };

/**
 * Create a successful validation result
 */
export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value };
}

/**
 * Create a failed validation result
 */
export function invalidResult<T>(error: ValidationError): ValidationResult<T> {
  return { valid: false, error };
}
