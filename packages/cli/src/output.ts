/**
 * CLI Output Utilities
 * @module @herald/cli/output
 */

import chalk from 'chalk';
import { isHeraldError, isValidationError } from '@herald/shared';

/**
 * Outputs an info message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ') + ' ' + message);
}

/**
 * Outputs an error message, with one indented line per detail
 */
export function error(message: string, details: string[] = []): void {
  console.error(chalk.red('✗') + ' ' + message);
  for (const detail of details) {
    console.error(chalk.gray(`  ${detail}`));
  }
}

/**
 * Split an error into a headline and detail lines
 */
export function describeError(err: unknown): { message: string; details: string[] } {
  if (isValidationError(err) && err.details.length > 0) {
    return {
      message: err.message,
      details: err.details.map((detail) => `${detail.field}: ${detail.message}`),
    };
  }
  if (isHeraldError(err) && err.cause) {
    return { message: err.message, details: [err.cause.message] };
  }
  if (err instanceof Error) {
    return { message: err.message, details: [] };
  }
  return { message: String(err), details: [] };
}
