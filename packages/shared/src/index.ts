/**
 * Herald - Shared Package
 * Types, validation, errors, logging, and utilities
 * @module @herald/shared
 */

// Types (includes helpers like parseRecipient, parseLabelSelector, summarizeSnapshot)
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export * from './validation/index.js';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  isTestEnvironment,
  logger,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  SELECTABLE_LOG_LEVELS,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';

// Utilities
export { EventChannel, FrozenMap, Mutex, sleep } from './utils/index.js';
