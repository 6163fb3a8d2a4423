/**
 * Snapshot validator
 *
 * Turns the raw settings and secrets payloads into a typed, immutable
 * configuration snapshot. Settings values are YAML documents; every
 * problem across all keys is collected into a single ValidationError.
 *
 * @module @herald/core/services/snapshot-validator
 */

import { parse as parseYaml } from 'yaml';
import type {
  ConfigSnapshot,
  NotificationTemplate,
  RawResourcePayload,
  ServiceDefinition,
  Subscription,
  TriggerDefinition,
  ValidationErrorDetail,
  ValidationResult,
} from '@herald/shared';
import {
  CONTEXT_KEY,
  DEFAULT_TRIGGERS_KEY,
  FrozenMap,
  INSPECTION_SERVICE_NAME,
  SERVICE_KEY_PREFIX,
  SUBSCRIPTIONS_KEY,
  TEMPLATE_KEY_PREFIX,
  TRIGGER_KEY_PREFIX,
  ValidationError,
  invalidResult,
  isValidationError,
  parseContext,
  parseServiceKey,
  parseServiceOptions,
  parseStringList,
  parseSubscriptions,
  parseTemplate,
  parseTrigger,
  resolveSecretReferences,
  toError,
  validResult,
  validateEntryName,
} from '@herald/shared';
import { ServiceNotifier } from '../notifier/service-notifier.js';
import type { ServiceRegistry } from '../notifier/service-registry.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Snapshot validation options
 */
export interface SnapshotValidationOptions {
  /** Generation assigned to the snapshot */
  generation: number;
  /** Known service types */
  registry: ServiceRegistry;
  /** Clock, for tests */
  now?: () => Date;
}

/**
 * Settings fields parsed before cross-reference checks
 */
interface ParsedSettings {
  templates: Map<string, NotificationTemplate>;
  triggers: Map<string, TriggerDefinition>;
  services: Map<string, ServiceDefinition>;
  subscriptions: Subscription[];
  defaultTriggers: string[];
  context: Record<string, string>;
}

// ============================================================================
// Parsing
// ============================================================================

function decodeYaml(field: string, text: string, errors: ValidationErrorDetail[]): { ok: boolean; doc: unknown } {
  try {
    const doc: unknown = parseYaml(text);
    return { ok: true, doc };
  } catch (error) {
    errors.push({ field, message: `Invalid YAML: ${toError(error).message}`, code: 'INVALID_YAML' });
    return { ok: false, doc: undefined };
  }
}

function parseSettings(
  settings: RawResourcePayload,
  secrets: RawResourcePayload,
  registry: ServiceRegistry,
  errors: ValidationErrorDetail[],
): ParsedSettings {
  const parsed: ParsedSettings = {
    templates: new Map(),
    triggers: new Map(),
    services: new Map(),
    subscriptions: [],
    defaultTriggers: [],
    context: {},
  };

  for (const key of Object.keys(settings).sort()) {
    const text = settings[key] ?? '';

    if (key.startsWith(TEMPLATE_KEY_PREFIX)) {
      const name = key.slice(TEMPLATE_KEY_PREFIX.length);
      const nameError = validateEntryName(key, name);
      if (nameError) {
        errors.push(nameError);
        continue;
      }
      const { ok, doc } = decodeYaml(key, text, errors);
      if (!ok) continue;
      const result = parseTemplate(key, name, doc);
      errors.push(...result.errors);
      if (result.value) parsed.templates.set(name, result.value);
      continue;
    }

    if (key.startsWith(TRIGGER_KEY_PREFIX)) {
      const name = key.slice(TRIGGER_KEY_PREFIX.length);
      const nameError = validateEntryName(key, name);
      if (nameError) {
        errors.push(nameError);
        continue;
      }
      const { ok, doc } = decodeYaml(key, text, errors);
      if (!ok) continue;
      const result = parseTrigger(key, name, doc);
      errors.push(...result.errors);
      if (result.value) parsed.triggers.set(name, result.value);
      continue;
    }

    if (key.startsWith(SERVICE_KEY_PREFIX)) {
      const service = parseService(key, text, secrets, registry, errors);
      if (!service) continue;
      if (parsed.services.has(service.name)) {
        errors.push({ field: key, message: `Service '${service.name}' is defined more than once`, code: 'DUPLICATE' });
        continue;
      }
      parsed.services.set(service.name, service);
      continue;
    }

    if (key === SUBSCRIPTIONS_KEY) {
      const { ok, doc } = decodeYaml(key, text, errors);
      if (!ok) continue;
      const result = parseSubscriptions(key, doc);
      errors.push(...result.errors);
      parsed.subscriptions = result.value ?? [];
      continue;
    }

    if (key === DEFAULT_TRIGGERS_KEY) {
      const { ok, doc } = decodeYaml(key, text, errors);
      if (!ok) continue;
      const result = parseStringList(key, doc);
      errors.push(...result.errors);
      parsed.defaultTriggers = result.value ?? [];
      continue;
    }

    if (key === CONTEXT_KEY) {
      const { ok, doc } = decodeYaml(key, text, errors);
      if (!ok) continue;
      const result = parseContext(key, doc);
      errors.push(...result.errors);
      parsed.context = result.value ?? {};
    }
  }

  return parsed;
}

function parseService(
  key: string,
  text: string,
  secrets: RawResourcePayload,
  registry: ServiceRegistry,
  errors: ValidationErrorDetail[],
): ServiceDefinition | null {
  const identity = parseServiceKey(key);
  errors.push(...identity.errors);
  if (!identity.value) return null;

  const { type, name } = identity.value;
  if (!registry.has(type)) {
    errors.push({ field: key, message: `Unknown service type '${type}'`, code: 'UNKNOWN_SERVICE_TYPE' });
    return null;
  }

  const { ok, doc } = decodeYaml(key, text, errors);
  if (!ok) return null;

  const options = parseServiceOptions(key, doc);
  errors.push(...options.errors);
  if (!options.value) return null;

  const resolved = resolveSecretReferences(key, options.value, secrets);
  errors.push(...resolved.errors);
  if (!resolved.value) return null;

  return { name, type, options: Object.freeze(resolved.value) };
}

// ============================================================================
// Cross-references
// ============================================================================

function checkReferences(parsed: ParsedSettings, errors: ValidationErrorDetail[]): void {
  const reference = (field: string, kind: string, name: string): void => {
    const [detail] = ValidationError.unresolvedReference(field, kind, name).details;
    if (detail) errors.push(detail);
  };

  for (const trigger of parsed.triggers.values()) {
    trigger.conditions.forEach((condition, index) => {
      for (const template of condition.send) {
        if (!parsed.templates.has(template)) {
          reference(`${TRIGGER_KEY_PREFIX}${trigger.name}[${index}].send`, 'template', template);
        }
      }
    });
  }

  parsed.subscriptions.forEach((subscription, index) => {
    const field = `${SUBSCRIPTIONS_KEY}[${index}]`;
    for (const recipient of subscription.recipients) {
      if (recipient.service !== INSPECTION_SERVICE_NAME && !parsed.services.has(recipient.service)) {
        reference(`${field}.recipients`, 'service', recipient.service);
      }
    }
    for (const trigger of subscription.triggers) {
      if (!parsed.triggers.has(trigger)) {
        reference(`${field}.triggers`, 'trigger', trigger);
      }
    }
  });

  for (const trigger of parsed.defaultTriggers) {
    if (!parsed.triggers.has(trigger)) {
      reference(DEFAULT_TRIGGERS_KEY, 'trigger', trigger);
    }
  }
}

function buildNotifier(parsed: ParsedSettings, registry: ServiceRegistry, errors: ValidationErrorDetail[]): ServiceNotifier {
  const notifier = new ServiceNotifier();
  for (const definition of parsed.services.values()) {
    try {
      notifier.addService(definition.name, registry.create(definition));
    } catch (error) {
      if (isValidationError(error)) {
        errors.push(...error.details);
      } else {
        errors.push({ field: definition.name, message: toError(error).message, code: 'INVALID_SERVICE' });
      }
    }
  }
  return notifier;
}

/**
 * Freeze a parsed value and everything reachable from it
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const items: unknown[] = Object.values(value);
    for (const item of items) {
      deepFreeze(item);
    }
  }
  return value;
}

function freezeEntries<V>(map: Map<string, V>): ReadonlyMap<string, V> {
  return new FrozenMap([...map].map(([key, value]) => [key, deepFreeze(value)] as const));
}

// ============================================================================
// Validator
// ============================================================================

/**
 * Validate raw payloads and build a snapshot.
 *
 * The notifier of a valid snapshot carries the configured services and is
 * not sealed; the inspection sink is added by the caller.
 */
export function validateSnapshot(
  settings: RawResourcePayload,
  secrets: RawResourcePayload,
  options: SnapshotValidationOptions,
): ValidationResult<ConfigSnapshot> {
  const errors: ValidationErrorDetail[] = [];

  const parsed = parseSettings(settings, secrets, options.registry, errors);
  checkReferences(parsed, errors);

  if (errors.length > 0) {
    return invalidResult(ValidationError.multiple(errors));
  }

  const notifier = buildNotifier(parsed, options.registry, errors);
  if (errors.length > 0) {
    return invalidResult(ValidationError.multiple(errors));
  }

  const snapshot: ConfigSnapshot = Object.freeze({
    generation: options.generation,
    templates: freezeEntries(parsed.templates),
    triggers: freezeEntries(parsed.triggers),
    services: freezeEntries(parsed.services),
    subscriptions: deepFreeze(parsed.subscriptions),
    defaultTriggers: deepFreeze(parsed.defaultTriggers),
    context: deepFreeze(parsed.context),
    notifier,
    createdAt: (options.now ?? (() => new Date()))(),
  });

  return validResult(snapshot);
}
