/**
 * Watched resource type definitions
 * @module @herald/shared/types/resource
 */

// ============================================================================
// Resource Kinds
// ============================================================================

/**
 * The two resources that together configure the worker.
 *
 * - `settings`: the ConfigMap holding templates, triggers and services
 * - `secrets`: the Secret holding credentials referenced by services
 */
export type ResourceKind = 'settings' | 'secrets';

/**
 * All resource kinds, in the order they are reported
 */
export const RESOURCE_KINDS: readonly ResourceKind[] = ['settings', 'secrets'];

/**
 * Human-readable label per kind, used in operator-facing messages
 */
export const RESOURCE_KIND_LABELS: Record<ResourceKind, string> = {
  settings: 'config map',
  secrets: 'secret',
};

/**
 * Default resource names looked up in the target namespace
 */
export const DEFAULT_RESOURCE_NAMES: Record<ResourceKind, string> = {
  settings: 'herald-notifications-cm',
  secrets: 'herald-notifications-secret',
};

// ============================================================================
// Payloads and Events
// ============================================================================

/**
 * The data map of a resource as last observed.
 * Secret values are already decoded to UTF-8 strings.
 */
export type RawResourcePayload = Readonly<Record<string, string>>;

/**
 * Change event kinds delivered by a watcher
 */
export type ResourceEventType = 'added' | 'updated';

/**
 * An update tagged with the kind of resource it came from
 */
export type ResourceUpdate =
  | { kind: 'settings'; event: ResourceEventType; payload: RawResourcePayload }
  | { kind: 'secrets'; event: ResourceEventType; payload: RawResourcePayload };

/**
 * An object delivered by an informer, reduced to what the watcher keeps
 */
export interface WatchedObject {
  /** metadata.name */
  name: string;
  /** metadata.resourceVersion, when the source provides one */
  resourceVersion?: string;
  /** Decoded data map */
  payload: RawResourcePayload;
}

/**
 * Identity of a watched resource
 */
export interface ResourceIdentity {
  kind: ResourceKind;
  name: string;
  namespace: string;
  /** e.g. "config map herald-notifications-cm" */
  displayName: string;
}

/**
 * Build the identity of a watched resource
 */
export function resourceIdentity(kind: ResourceKind, name: string, namespace: string): ResourceIdentity {
  return {
    kind,
    name,
    namespace,
    displayName: `${RESOURCE_KIND_LABELS[kind]} ${name}`,
  };
}

/**
 * Create a tagged update for the given kind
 */
export function toResourceUpdate(
  kind: ResourceKind,
  event: ResourceEventType,
  payload: RawResourcePayload,
): ResourceUpdate {
  return kind === 'settings'
    ? { kind: 'settings', event, payload }
    : { kind: 'secrets', event, payload };
}
