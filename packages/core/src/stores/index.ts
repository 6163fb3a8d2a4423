/**
 * Reactive stores for Herald
 * @module @herald/core/stores
 */

export {
  createReconcilerStore,
  type ReconcilerStore,
  type ReconcilerState,
  type ReconcilerStatus,
  type ReconcilerPhase,
} from './reconciler-store.js';
