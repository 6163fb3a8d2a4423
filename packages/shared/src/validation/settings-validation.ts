/**
 * Settings entry validation
 *
 * Field validators for the documents stored under settings keys. Each
 * takes an already-decoded YAML value and returns the typed entry plus
 * every problem found, so that one bad key never hides another.
 *
 * @module @herald/shared/validation/settings-validation
 */

import type { ValidationErrorDetail } from '../errors/validation-error.js';
import type {
  NotificationTemplate,
  Recipient,
  Subscription,
  TriggerCondition,
  TriggerDefinition,
} from '../types/notification.js';
import { INSPECTION_SERVICE_NAME, parseRecipient } from '../types/notification.js';

// ============================================================================
// Keys
// ============================================================================

export const TEMPLATE_KEY_PREFIX = 'template.';
export const TRIGGER_KEY_PREFIX = 'trigger.';
export const SERVICE_KEY_PREFIX = 'service.';
export const SUBSCRIPTIONS_KEY = 'subscriptions';
export const DEFAULT_TRIGGERS_KEY = 'defaultTriggers';
export const CONTEXT_KEY = 'context';

/**
 * Entry names: alphanumeric start and end, with dots, dashes and underscores inside
 */
const ENTRY_NAME_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9._-]*[a-zA-Z0-9])?$/;

/**
 * A secret reference is a whole string value of the form `$key`
 */
const SECRET_REFERENCE_PATTERN = /^\$([a-zA-Z0-9._-]+)$/;

/**
 * Service names that user configuration may not claim
 */
export const RESERVED_SERVICE_NAMES: readonly string[] = [INSPECTION_SERVICE_NAME];

/**
 * Outcome of parsing one settings entry
 */
export interface ParseResult<T> {
  value: T | null;
  errors: ValidationErrorDetail[];
}

function ok<T>(value: T): ParseResult<T> {
  return { value, errors: [] };
}

function fail<T>(field: string, message: string, code: string): ParseResult<T> {
  return { value: null, errors: [{ field, message, code }] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Field Validators
// ============================================================================

/**
 * Validate the name part of a `template.`, `trigger.` or `service.` key
 */
export function validateEntryName(field: string, name: string): ValidationErrorDetail | null {
  if (name.length === 0) {
    return { field, message: 'Name cannot be empty', code: 'REQUIRED' };
  }
  if (name.length > 253 || !ENTRY_NAME_PATTERN.test(name)) {
    return {
      field,
      message: 'Name must be alphanumeric and may contain dots, dashes or underscores',
      code: 'INVALID_FORMAT',
    };
  }
  return null;
}

/**
 * Validate a list of strings, e.g. `send` or `defaultTriggers`
 */
export function parseStringList(field: string, doc: unknown): ParseResult<string[]> {
  if (doc === undefined || doc === null) {
    return ok([]);
  }
  if (!Array.isArray(doc)) {
    return fail(field, 'Must be a list of strings', 'INVALID_TYPE');
  }
  const values: string[] = [];
  const errors: ValidationErrorDetail[] = [];
  doc.forEach((item: unknown, index) => {
    if (typeof item !== 'string' || item.trim() === '') {
      errors.push({ field: `${field}[${index}]`, message: 'Must be a non-empty string', code: 'INVALID_TYPE' });
    } else {
      values.push(item.trim());
    }
  });
  return { value: errors.length === 0 ? values : null, errors };
}

/**
 * Validate a `template.<name>` document
 */
export function parseTemplate(field: string, name: string, doc: unknown): ParseResult<NotificationTemplate> {
  if (!isRecord(doc)) {
    return fail(field, 'Template must be a map with a message', 'INVALID_TYPE');
  }

  const errors: ValidationErrorDetail[] = [];
  const { message, title } = doc;

  if (message === undefined || message === null) {
    errors.push({ field: `${field}.message`, message: 'Template message is required', code: 'REQUIRED' });
  } else if (typeof message !== 'string') {
    errors.push({ field: `${field}.message`, message: 'Template message must be a string', code: 'INVALID_TYPE' });
  }
  if (title !== undefined && typeof title !== 'string') {
    errors.push({ field: `${field}.title`, message: 'Template title must be a string', code: 'INVALID_TYPE' });
  }

  if (errors.length > 0 || typeof message !== 'string') {
    return { value: null, errors };
  }

  return ok(typeof title === 'string' ? { name, message, title } : { name, message });
}

/**
 * Validate one condition of a trigger
 */
function parseTriggerCondition(field: string, doc: unknown): ParseResult<TriggerCondition> {
  if (!isRecord(doc)) {
    return fail(field, 'Condition must be a map', 'INVALID_TYPE');
  }

  const errors: ValidationErrorDetail[] = [];
  const { when, oncePer, description } = doc;

  if (typeof when !== 'string' || when.trim() === '') {
    errors.push({ field: `${field}.when`, message: 'Condition expression is required', code: 'REQUIRED' });
  }

  const send = parseStringList(`${field}.send`, doc.send);
  errors.push(...send.errors);
  if (send.value !== null && send.value.length === 0) {
    errors.push({ field: `${field}.send`, message: 'At least one template is required', code: 'REQUIRED' });
  }

  if (oncePer !== undefined && typeof oncePer !== 'string') {
    errors.push({ field: `${field}.oncePer`, message: 'Must be a string', code: 'INVALID_TYPE' });
  }
  if (description !== undefined && typeof description !== 'string') {
    errors.push({ field: `${field}.description`, message: 'Must be a string', code: 'INVALID_TYPE' });
  }

  if (errors.length > 0 || typeof when !== 'string' || send.value === null) {
    return { value: null, errors };
  }

  const condition: TriggerCondition = { when: when.trim(), send: send.value };
  if (typeof oncePer === 'string') condition.oncePer = oncePer;
  if (typeof description === 'string') condition.description = description;
  return ok(condition);
}

/**
 * Validate a `trigger.<name>` document: a non-empty list of conditions
 */
export function parseTrigger(field: string, name: string, doc: unknown): ParseResult<TriggerDefinition> {
  if (!Array.isArray(doc) || doc.length === 0) {
    return fail(field, 'Trigger must be a non-empty list of conditions', 'INVALID_TYPE');
  }

  const conditions: TriggerCondition[] = [];
  const errors: ValidationErrorDetail[] = [];
  doc.forEach((item: unknown, index) => {
    const result = parseTriggerCondition(`${field}[${index}]`, item);
    errors.push(...result.errors);
    if (result.value) conditions.push(result.value);
  });

  return errors.length > 0 ? { value: null, errors } : ok({ name, conditions });
}

/**
 * Split a `service.<type>` or `service.<type>.<name>` key.
 * The service name defaults to its type.
 */
export function parseServiceKey(key: string): ParseResult<{ type: string; name: string }> {
  const rest = key.slice(SERVICE_KEY_PREFIX.length);
  const separator = rest.indexOf('.');
  const type = separator === -1 ? rest : rest.slice(0, separator);
  const name = separator === -1 ? rest : rest.slice(separator + 1);

  const typeError = validateEntryName(key, type);
  if (typeError) return { value: null, errors: [typeError] };
  const nameError = validateEntryName(key, name);
  if (nameError) return { value: null, errors: [nameError] };

  if (RESERVED_SERVICE_NAMES.includes(name)) {
    return fail(key, `Service name '${name}' is reserved`, 'RESERVED');
  }
  return ok({ type, name });
}

/**
 * Validate a service options document: a map, possibly empty
 */
export function parseServiceOptions(field: string, doc: unknown): ParseResult<Record<string, unknown>> {
  if (doc === undefined || doc === null) {
    return ok({});
  }
  if (!isRecord(doc)) {
    return fail(field, 'Service options must be a map', 'INVALID_TYPE');
  }
  return ok({ ...doc });
}

/**
 * Replace `$key` string values with the matching secret value.
 * Nested maps and lists are walked; other strings are kept as they are.
 */
export function resolveSecretReferences(
  field: string,
  options: Record<string, unknown>,
  secrets: Readonly<Record<string, string>>,
): ParseResult<Record<string, unknown>> {
  const errors: ValidationErrorDetail[] = [];

  const resolve = (path: string, value: unknown): unknown => {
    if (typeof value === 'string') {
      const match = SECRET_REFERENCE_PATTERN.exec(value);
      if (!match) return value;
      const key = match[1] ?? '';
      const secret = Object.hasOwn(secrets, key) ? secrets[key] : undefined;
      if (secret === undefined) {
        errors.push({ field: path, message: `Secret key '${key}' is not defined`, code: 'UNRESOLVED_REFERENCE' });
        return value;
      }
      return secret;
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => resolve(`${path}[${index}]`, item));
    }
    if (isRecord(value)) {
      const resolved: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        resolved[key] = resolve(`${path}.${key}`, item);
      }
      return resolved;
    }
    return value;
  };

  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options)) {
    resolved[key] = resolve(`${field}.${key}`, value);
  }

  return errors.length > 0 ? { value: null, errors } : ok(resolved);
}

/**
 * Validate the `subscriptions` document
 */
export function parseSubscriptions(field: string, doc: unknown): ParseResult<Subscription[]> {
  if (doc === undefined || doc === null) {
    return ok([]);
  }
  if (!Array.isArray(doc)) {
    return fail(field, 'Subscriptions must be a list', 'INVALID_TYPE');
  }

  const subscriptions: Subscription[] = [];
  const errors: ValidationErrorDetail[] = [];

  doc.forEach((item: unknown, index) => {
    const itemField = `${field}[${index}]`;
    if (!isRecord(item)) {
      errors.push({ field: itemField, message: 'Subscription must be a map', code: 'INVALID_TYPE' });
      return;
    }

    const recipientList = parseStringList(`${itemField}.recipients`, item.recipients);
    const triggers = parseStringList(`${itemField}.triggers`, item.triggers);
    errors.push(...recipientList.errors, ...triggers.errors);

    const recipients: Recipient[] = [];
    (recipientList.value ?? []).forEach((text, recipientIndex) => {
      const recipient = parseRecipient(text);
      if (recipient) {
        recipients.push(recipient);
      } else {
        errors.push({
          field: `${itemField}.recipients[${recipientIndex}]`,
          message: 'Recipient must look like <service>:<destination>',
          code: 'INVALID_FORMAT',
        });
      }
    });

    if (recipientList.value !== null && recipientList.value.length === 0) {
      errors.push({ field: `${itemField}.recipients`, message: 'At least one recipient is required', code: 'REQUIRED' });
    }

    if (triggers.value !== null) {
      subscriptions.push({ recipients, triggers: triggers.value });
    }
  });

  return errors.length > 0 ? { value: null, errors } : ok(subscriptions);
}

/**
 * Validate the `context` document: a flat map of strings
 */
export function parseContext(field: string, doc: unknown): ParseResult<Record<string, string>> {
  if (doc === undefined || doc === null) {
    return ok({});
  }
  if (!isRecord(doc)) {
    return fail(field, 'Context must be a map of strings', 'INVALID_TYPE');
  }

  const context: Record<string, string> = {};
  const errors: ValidationErrorDetail[] = [];
  for (const [key, value] of Object.entries(doc)) {
    if (typeof value === 'string') {
      context[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      context[key] = String(value);
    } else {
      errors.push({ field: `${field}.${key}`, message: 'Context values must be strings', code: 'INVALID_TYPE' });
    }
  }
  return errors.length > 0 ? { value: null, errors } : ok(context);
}
