/**
 * Core services
 * @module @herald/core/services
 */

export {
  ResourceWatcher,
  type ResourceWatcherOptions,
  type ResourceInformer,
  type InformerHandlers,
} from './resource-watcher.js';

export {
  PartialStateMerger,
  PARSE_FAILURE_MESSAGE,
  START_FAILURE_MESSAGE,
  type PartialStateMergerOptions,
  type FatalHandler,
  type SnapshotTarget,
} from './partial-state-merger.js';

export { validateSnapshot, type SnapshotValidationOptions } from './snapshot-validator.js';

export {
  WorkerLifecycleManager,
  type WorkerLifecycleManagerOptions,
} from './worker-lifecycle-manager.js';

export {
  awaitInitialSync,
  missingResourcesMessage,
  CACHE_SYNC_TIMEOUT_MESSAGE,
  type SyncableWatcher,
  type InitialSyncOptions,
  type ReadinessReport,
} from './startup-readiness-gate.js';

export { ConfigReconciler, type ConfigReconcilerOptions } from './config-reconciler.js';
