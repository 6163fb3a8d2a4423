/**
 * Error classes for Herald
 * @module @herald/shared/errors
 */

// Base error
export {
  HeraldError,
  ErrorCode,
  isHeraldError,
  toError,
} from './base-error.js';

export type { ErrorMeta } from './base-error.js';

// Validation errors
export {
  ValidationError,
  isValidationError,
  validResult,
  invalidResult,
} from './validation-error.js';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error.js';

// Worker errors
export { WorkerError } from './worker-error.js';
