/**
 * Labels and LabelSelector types (Kubernetes-like)
 * @module @herald/shared/types/labels
 */

import { ValidationError } from '../errors/validation-error.js';

/**
 * Labels are key-value pairs used for organization and selection
 */
export type Labels = Record<string, string>;

/**
 * Label selector operator for match expressions
 */
export type LabelSelectorOperator = 'In' | 'NotIn' | 'Exists' | 'DoesNotExist';

/**
 * Match expression for set-based label selection
 *
 * @example
 * // environment in (production, staging)
 * { key: "environment", operator: "In", values: ["production", "staging"] }
 *
 * // !deprecated
 * { key: "deprecated", operator: "DoesNotExist" }
 */
export interface LabelSelectorMatchExpression {
  key: string;
  operator: LabelSelectorOperator;
  /** Required for In/NotIn, ignored for Exists/DoesNotExist */
  values?: string[];
}

/**
 * Label selector for querying resources
 */
export interface LabelSelector {
  /** Simple key-value matching (all must match) */
  matchLabels?: Labels;
  /** Advanced expression matching (all must match) */
  matchExpressions?: LabelSelectorMatchExpression[];
}

/**
 * Validate a label key
 * - Must be non-empty
 * - Must start and end with alphanumeric
 * - Can contain alphanumeric, dash, underscore, dot
 * - Optional prefix (DNS subdomain) followed by /
 */
export function isValidLabelKey(key: string): boolean {
  if (!key || key.length > 253) {
    return false;
  }

  const parts = key.split('/');
  if (parts.length > 2) {
    return false;
  }

  const name = parts.length === 2 ? parts[1] : parts[0];

  if (!name || name.length > 63) {
    return false;
  }

  return /^[a-zA-Z0-9]([a-zA-Z0-9._-]*[a-zA-Z0-9])?$/.test(name);
}

/**
 * Validate a label value
 * - Can be empty
 * - Must be 63 characters or less
 * - If non-empty, must start and end with alphanumeric
 */
export function isValidLabelValue(value: string): boolean {
  if (value.length > 63) {
    return false;
  }

  if (value === '') {
    return true;
  }

  return /^[a-zA-Z0-9]([a-zA-Z0-9._-]*[a-zA-Z0-9])?$/.test(value);
}

/**
 * Split a selector on commas that are not inside a value set
 */
function splitRequirements(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of text) {
    if (char === '(') depth += 1;
    if (char === ')') depth -= 1;
    if (char === ',' && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);

  return parts.map((part) => part.trim());
}

const SET_REQUIREMENT = /^(\S+)\s+(in|notin)\s+\(([^()]*)\)$/;
const EQUALITY_REQUIREMENT = /^([^=!\s]+)\s*(==|=|!=)\s*(\S*)$/;

function invalidSelector(requirement: string): ValidationError {
  return ValidationError.invalidFormat('app-label-selector', `a valid label selector, got "${requirement}"`);
}

function requireKey(key: string, requirement: string): string {
  if (!isValidLabelKey(key)) {
    throw invalidSelector(requirement);
  }
  return key;
}

function requireValue(value: string, requirement: string): string {
  if (!isValidLabelValue(value)) {
    throw invalidSelector(requirement);
  }
  return value;
}

/**
 * Parse a selector string such as `app=web,tier in (a,b),!legacy`.
 * An empty string selects everything.
 *
 * @throws ValidationError when any requirement is malformed
 */
export function parseLabelSelector(text: string): LabelSelector {
  const selector: LabelSelector = {};
  if (text.trim() === '') {
    return selector;
  }

  const matchLabels: Labels = {};
  const matchExpressions: LabelSelectorMatchExpression[] = [];

  for (const requirement of splitRequirements(text)) {
    if (requirement === '') {
      throw invalidSelector(requirement);
    }

    const set = SET_REQUIREMENT.exec(requirement);
    if (set) {
      const [, key = '', op, list = ''] = set;
      const values = list.split(',').map((v) => requireValue(v.trim(), requirement));
      matchExpressions.push({
        key: requireKey(key, requirement),
        operator: op === 'in' ? 'In' : 'NotIn',
        values,
      });
      continue;
    }

    const equality = EQUALITY_REQUIREMENT.exec(requirement);
    if (equality) {
      const [, key = '', op, value = ''] = equality;
      requireKey(key, requirement);
      requireValue(value, requirement);
      if (op === '!=') {
        matchExpressions.push({ key, operator: 'NotIn', values: [value] });
      } else {
        matchLabels[key] = value;
      }
      continue;
    }

    if (requirement.startsWith('!')) {
      const key = requireKey(requirement.slice(1).trim(), requirement);
      matchExpressions.push({ key, operator: 'DoesNotExist' });
      continue;
    }

    matchExpressions.push({ key: requireKey(requirement, requirement), operator: 'Exists' });
  }

  if (Object.keys(matchLabels).length > 0) {
    selector.matchLabels = matchLabels;
  }
  if (matchExpressions.length > 0) {
    selector.matchExpressions = matchExpressions;
  }
  return selector;
}
