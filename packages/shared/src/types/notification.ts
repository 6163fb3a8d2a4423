/**
 * Notification configuration type definitions
 *
 * These are the typed forms of the settings ConfigMap entries:
 *
 * ```yaml
 * template.app-deployed: |
 *   title: Deployed
 *   message: Application has been deployed.
 * trigger.on-deployed: |
 *   - when: app.status.sync == 'Synced'
 *     send: [app-deployed]
 * service.webhook.alerts: |
 *   url: https://hooks.example.com/notify
 *   headers:
 *     Authorization: $webhook-token
 * subscriptions: |
 *   - recipients: [alerts:ops]
 *     triggers: [on-deployed]
 * ```
 *
 * @module @herald/shared/types/notification
 */

// ============================================================================
// Templates and Triggers
// ============================================================================

/**
 * A message template, from a `template.<name>` key
 */
export interface NotificationTemplate {
  name: string;
  message: string;
  title?: string;
}

/**
 * One condition of a trigger
 */
export interface TriggerCondition {
  /** Expression evaluated by the worker */
  when: string;
  /** Names of the templates to send when the condition holds */
  send: readonly string[];
  /** Optional field whose change re-arms the condition */
  oncePer?: string;
  description?: string;
}

/**
 * A trigger, from a `trigger.<name>` key
 */
export interface TriggerDefinition {
  name: string;
  conditions: readonly TriggerCondition[];
}

// ============================================================================
// Services and Subscriptions
// ============================================================================

/**
 * A configured notification service, from a `service.<type>[.<name>]` key.
 * Secret references in options are already resolved.
 */
export interface ServiceDefinition {
  name: string;
  type: string;
  options: Readonly<Record<string, unknown>>;
}

/**
 * Where a notification goes: a service and a service-specific destination
 */
export interface Recipient {
  service: string;
  destination: string;
}

/**
 * A subscription binding recipients to triggers
 */
export interface Subscription {
  recipients: readonly Recipient[];
  triggers: readonly string[];
}

/**
 * A rendered notification
 */
export interface Notification {
  title?: string;
  message: string;
}

/**
 * Per-delivery options
 */
export interface SendOptions {
  /** Aborts an in-flight delivery */
  signal?: AbortSignal;
}

/**
 * A sink that can deliver notifications
 */
export interface NotificationService {
  send(notification: Notification, destination: string, options?: SendOptions): Promise<void>;
}

/**
 * The notifier carried by a configuration snapshot
 */
export interface Notifier {
  /** Register a service under a name; each name may be registered once */
  addService(name: string, service: NotificationService): void;
  getService(name: string): NotificationService | undefined;
  /** Names of all registered services */
  readonly serviceNames: string[];
  /** Whether further registrations are refused */
  readonly sealed: boolean;
  seal(): void;
  send(notification: Notification, recipient: Recipient, options?: SendOptions): Promise<void>;
}

/**
 * Name of the built-in inspection sink added to every valid snapshot
 */
export const INSPECTION_SERVICE_NAME = 'console';

/**
 * Parse a `<service>:<destination>` recipient string.
 * Returns null when the service part is missing.
 */
export function parseRecipient(value: string): Recipient | null {
  const separator = value.indexOf(':');
  const service = separator === -1 ? value.trim() : value.slice(0, separator).trim();
  const destination = separator === -1 ? '' : value.slice(separator + 1).trim();
  if (!service) {
    return null;
  }
  return { service, destination };
}
