/**
 * Configuration snapshot type definitions
 * @module @herald/shared/types/snapshot
 */

import type {
  NotificationTemplate,
  Notifier,
  ServiceDefinition,
  Subscription,
  TriggerDefinition,
} from './notification.js';

/**
 * A validated configuration derived from one settings payload and one
 * secrets payload. Built once, never mutated after it is handed to the
 * lifecycle manager.
 */
export interface ConfigSnapshot {
  /** Merge attempt number that produced this snapshot; strictly increasing */
  readonly generation: number;
  readonly templates: ReadonlyMap<string, NotificationTemplate>;
  readonly triggers: ReadonlyMap<string, TriggerDefinition>;
  readonly services: ReadonlyMap<string, ServiceDefinition>;
  readonly subscriptions: readonly Subscription[];
  readonly defaultTriggers: readonly string[];
  /** Free-form values made available to templates */
  readonly context: Readonly<Record<string, string>>;
  readonly notifier: Notifier;
  readonly createdAt: Date;
}

/**
 * Short description of a snapshot for logs and status responses
 */
export interface SnapshotSummary {
  generation: number;
  templates: number;
  triggers: number;
  services: string[];
  subscriptions: number;
}

/**
 * Summarize a snapshot
 */
export function summarizeSnapshot(snapshot: ConfigSnapshot): SnapshotSummary {
  return {
    generation: snapshot.generation,
    templates: snapshot.templates.size,
    triggers: snapshot.triggers.size,
    services: snapshot.notifier.serviceNames,
    subscriptions: snapshot.subscriptions.length,
  };
}
