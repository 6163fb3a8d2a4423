/**
 * Controller configuration validation
 * @module @herald/shared/validation/controller-validation
 */

import type { ValidationErrorDetail } from '../errors/validation-error.js';
import type { ControllerConfig } from '../types/config.js';
import { parseLabelSelector } from '../types/labels.js';
import { isValidationError } from '../errors/validation-error.js';
import { SELECTABLE_LOG_LEVELS } from '../logging/logger.js';

/**
 * Namespace name pattern: DNS-1123 label
 */
const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

/**
 * Resource name pattern: DNS-1123 subdomain
 */
const RESOURCE_NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;

const MAX_NAMESPACE_LENGTH = 63;
const MAX_RESOURCE_NAME_LENGTH = 253;
const MAX_PROCESSORS = 256;

// ============================================================================
// Field Validators
// ============================================================================

/**
 * Validate namespace name
 */
export function validateNamespaceName(namespace: unknown): ValidationErrorDetail | null {
  if (typeof namespace !== 'string' || namespace.length === 0) {
    return { field: 'namespace', message: 'Namespace is required', code: 'REQUIRED' };
  }
  if (namespace.length > MAX_NAMESPACE_LENGTH || !NAMESPACE_PATTERN.test(namespace)) {
    return {
      field: 'namespace',
      message: 'Namespace must be a DNS label: lowercase alphanumeric or hyphens, at most 63 characters',
      code: 'INVALID_FORMAT',
    };
  }
  return null;
}

/**
 * Validate the name of a watched resource
 */
export function validateResourceName(field: string, name: unknown): ValidationErrorDetail | null {
  if (typeof name !== 'string' || name.length === 0) {
    return { field, message: 'Resource name is required', code: 'REQUIRED' };
  }
  if (name.length > MAX_RESOURCE_NAME_LENGTH || !RESOURCE_NAME_PATTERN.test(name)) {
    return {
      field,
      message: 'Resource name must be DNS-compatible: lowercase alphanumeric, hyphens, or dots',
      code: 'INVALID_FORMAT',
    };
  }
  return null;
}

/**
 * Validate the processor count of a worker
 */
export function validateProcessorsCount(count: unknown): ValidationErrorDetail | null {
  if (typeof count !== 'number' || !Number.isInteger(count)) {
    return { field: 'processorsCount', message: 'Processors count must be an integer', code: 'INVALID_TYPE' };
  }
  if (count < 1 || count > MAX_PROCESSORS) {
    return {
      field: 'processorsCount',
      message: `Processors count must be between 1 and ${MAX_PROCESSORS}`,
      code: 'OUT_OF_RANGE',
    };
  }
  return null;
}

/**
 * Validate a TCP port
 */
export function validatePort(field: string, port: unknown): ValidationErrorDetail | null {
  if (typeof port !== 'number' || !Number.isInteger(port)) {
    return { field, message: 'Port must be an integer', code: 'INVALID_TYPE' };
  }
  if (port < 1 || port > 65535) {
    return { field, message: 'Port must be between 1 and 65535', code: 'OUT_OF_RANGE' };
  }
  return null;
}

/**
 * Validate the initial sync timeout
 */
export function validateSyncTimeout(timeoutMs: unknown): ValidationErrorDetail | null {
  if (typeof timeoutMs !== 'number' || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return { field: 'syncTimeoutMs', message: 'Sync timeout must be a positive number', code: 'OUT_OF_RANGE' };
  }
  return null;
}

/**
 * Validate a label selector string
 */
export function validateLabelSelectorText(selector: unknown): ValidationErrorDetail | null {
  if (typeof selector !== 'string') {
    return { field: 'appLabelSelector', message: 'Label selector must be a string', code: 'INVALID_TYPE' };
  }
  try {
    parseLabelSelector(selector);
  } catch (error) {
    if (isValidationError(error)) {
      return { field: 'appLabelSelector', message: error.details[0]?.message ?? error.message, code: 'INVALID_FORMAT' };
    }
    throw error;
  }
  return null;
}

/**
 * Validate the log level
 */
export function validateLogLevel(level: unknown): ValidationErrorDetail | null {
  if (typeof level !== 'string' || !SELECTABLE_LOG_LEVELS.some((l) => l === level)) {
    return {
      field: 'logLevel',
      message: `Log level must be one of: ${SELECTABLE_LOG_LEVELS.join(', ')}`,
      code: 'INVALID_VALUE',
    };
  }
  return null;
}

// ============================================================================
// Input Validator
// ============================================================================

/**
 * Validate a resolved controller configuration, returning every problem found
 */
export function validateControllerConfig(config: ControllerConfig): ValidationErrorDetail[] {
  const checks = [
    validateNamespaceName(config.namespace),
    validateProcessorsCount(config.processorsCount),
    validateLabelSelectorText(config.appLabelSelector),
    validateLogLevel(config.logLevel),
    validatePort('metricsPort', config.metricsPort),
    validateResourceName('configMapName', config.configMapName),
    validateResourceName('secretName', config.secretName),
    validateSyncTimeout(config.syncTimeoutMs),
  ];

  return checks.filter((check): check is ValidationErrorDetail => check !== null);
}
