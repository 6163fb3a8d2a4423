/**
 * Shared types for Herald
 * @module @herald/shared/types
 */

// Resource types
export type {
  ResourceKind,
  RawResourcePayload,
  ResourceEventType,
  ResourceUpdate,
  WatchedObject,
  ResourceIdentity,
} from './resource.js';

export {
  RESOURCE_KINDS,
  RESOURCE_KIND_LABELS,
  DEFAULT_RESOURCE_NAMES,
  resourceIdentity,
  toResourceUpdate,
} from './resource.js';

// Notification types
export type {
  NotificationTemplate,
  TriggerCondition,
  TriggerDefinition,
  ServiceDefinition,
  Recipient,
  Subscription,
  Notification,
  NotificationService,
  Notifier,
  SendOptions,
} from './notification.js';

export {
  INSPECTION_SERVICE_NAME,
  parseRecipient,
} from './notification.js';

// Snapshot types
export type {
  ConfigSnapshot,
  SnapshotSummary,
} from './snapshot.js';

export { summarizeSnapshot } from './snapshot.js';

// Worker types
export type {
  ReloadOutcome,
  ControllerMetrics,
  Worker,
  WorkerOptions,
  WorkerFactory,
  LifecycleState,
} from './worker.js';

export { noopMetrics } from './worker.js';

// Label types
export type {
  Labels,
  LabelSelectorOperator,
  LabelSelectorMatchExpression,
  LabelSelector,
} from './labels.js';

export {
  isValidLabelKey,
  isValidLabelValue,
  parseLabelSelector,
} from './labels.js';

// Controller configuration
export type { ControllerConfig } from './config.js';
