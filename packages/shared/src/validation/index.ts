/**
 * Validation module - re-exports all validators
 * @module @herald/shared/validation
 */

// Settings validation
export type { ParseResult } from './settings-validation.js';

export {
  TEMPLATE_KEY_PREFIX,
  TRIGGER_KEY_PREFIX,
  SERVICE_KEY_PREFIX,
  SUBSCRIPTIONS_KEY,
  DEFAULT_TRIGGERS_KEY,
  CONTEXT_KEY,
  RESERVED_SERVICE_NAMES,
  validateEntryName,
  parseStringList,
  parseTemplate,
  parseTrigger,
  parseServiceKey,
  parseServiceOptions,
  resolveSecretReferences,
  parseSubscriptions,
  parseContext,
} from './settings-validation.js';

// Controller configuration validation
export {
  validateNamespaceName,
  validateResourceName,
  validateProcessorsCount,
  validatePort,
  validateSyncTimeout,
  validateLabelSelectorText,
  validateLogLevel,
  validateControllerConfig,
} from './controller-validation.js';
