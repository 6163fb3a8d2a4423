/**
 * Structured JSON logger
 * @module @herald/shared/logging/logger
 */

import { ValidationError } from '../errors/validation-error.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

/**
 * Levels accepted from the command line
 */
export const SELECTABLE_LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Log entry metadata
 */
export interface LogMeta {
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level; falls back to the process-wide level when unset */
  level?: LogLevel;
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Pretty print output (development) */
  pretty?: boolean;
  /** Custom output function */
  output?: (entry: LogEntry) => void;
}

/**
 * Process-wide level, set once from --loglevel
 */
let rootLevel: LogLevel = 'info';

/**
 * Set the level used by every logger without an explicit level
 */
export function setLogLevel(level: LogLevel): void {
  rootLevel = level;
}

/**
 * Get the process-wide log level
 */
export function getLogLevel(): LogLevel {
  return rootLevel;
}

/**
 * Parse a level name, rejecting anything that is not a known level
 */
export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  const match = SELECTABLE_LOG_LEVELS.find((level) => level === normalized);
  if (!match) {
    throw ValidationError.invalidFormat('loglevel', `one of: ${SELECTABLE_LOG_LEVELS.join('|')}`);
  }
  return match;
}

/**
 * Structured JSON logger
 */
export class Logger {
  private config: LoggerConfig;
  private meta: LogMeta;

  constructor(config: LoggerConfig = {}, meta: LogMeta = {}) {
    this.config = { pretty: false, ...config };
    this.meta = {
      ...meta,
      service: config.service || meta.service,
      component: config.component || meta.component,
    };
  }

  private isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level ?? rootLevel];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedMeta: LogMeta = {};
    for (const [key, value] of Object.entries({ ...this.meta, ...meta })) {
      if (value !== undefined) {
        mergedMeta[key] = value;
      }
    }
    if (Object.keys(mergedMeta).length > 0) {
      entry.meta = mergedMeta;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
        entry.error.code = error.code;
      }
    }

    if (this.config.output) {
      this.config.output(entry);
    } else {
      this.defaultOutput(entry);
    }
  }

  private defaultOutput(entry: LogEntry): void {
    const output = this.config.pretty ? this.formatPretty(entry) : JSON.stringify(entry);

    switch (entry.level) {
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
      case 'fatal':
        console.error(output);
        break;
    }
  }

  private formatPretty(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[90m', // Gray
      info: '\x1b[36m',  // Cyan
      warn: '\x1b[33m',  // Yellow
      error: '\x1b[31m', // Red
      fatal: '\x1b[35m', // Magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];
    const levelStr = entry.level.toUpperCase().padEnd(5);

    let output = `${entry.timestamp} ${color}${levelStr}${reset} ${entry.message}`;

    if (entry.meta?.component) {
      output += ` ${color}(${entry.meta.component})${reset}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n${entry.error.stack}`;
      }
    }

    return output;
  }

  /**
   * Create a child logger with additional metadata
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('error', message, meta, error);
    } else {
      this.log('error', message, error);
    }
  }

  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('fatal', message, meta, error);
    } else {
      this.log('fatal', message, error);
    }
  }
}

/**
 * Check if running in test environment
 */
export function isTestEnvironment(): boolean {
  return (
    process.env.NODE_ENV === 'test' ||
    process.env.VITEST === 'true' ||
    process.env.JEST_WORKER_ID !== undefined
  );
}

/**
 * Silent output function for tests
 */
function silentOutput(_entry: LogEntry): void {
  // Suppresses all output
}

/**
 * Create a new logger instance (basic, does not apply test environment detection)
 */
export function createLogger(config?: LoggerConfig, meta?: LogMeta): Logger {
  return new Logger(config, meta);
}

/**
 * Create a logger instance with test environment detection
 * Suppresses output during tests unless LOG_LEVEL or an output is given
 */
export function createServiceLogger(config: LoggerConfig = {}, meta?: LogMeta): Logger {
  const testConfig: LoggerConfig = {};

  if (isTestEnvironment() && !process.env.LOG_LEVEL && !config.output) {
    testConfig.output = silentOutput;
  }

  return new Logger(
    {
      service: 'herald',
      pretty: process.env.NODE_ENV !== 'production',
      ...config,
      ...testConfig,
    },
    meta,
  );
}

/**
 * Default logger instance
 */
export const logger = createServiceLogger();
