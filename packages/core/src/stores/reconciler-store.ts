/**
 * Reactive reconciler status store using Vue reactivity
 *
 * Tracks what the health endpoint reports: which resources have synced and
 * been seen, the generation of the running worker, and the last failure.
 *
 * @module @herald/core/stores/reconciler-store
 */

import { reactive, computed, readonly, type ComputedRef, type DeepReadonly } from '@vue/reactivity';
import type { ResourceKind } from '@herald/shared';
import { RESOURCE_KINDS } from '@herald/shared';

// ============================================================================
// State
// ============================================================================

/**
 * Reconciler phases
 *
 * - `starting`: constructed, watchers not started
 * - `syncing`: waiting for the initial listing
 * - `waiting`: synced, but a resource is missing
 * - `running`: a worker is running
 * - `failed`: a fatal error stopped reconciliation
 * - `stopped`: shut down
 */
export type ReconcilerPhase = 'starting' | 'syncing' | 'waiting' | 'running' | 'failed' | 'stopped';

export interface ReconcilerState {
  phase: ReconcilerPhase;
  synced: Record<ResourceKind, boolean>;
  present: Record<ResourceKind, boolean>;
  /** Generation of the running worker; 0 when none */
  generation: number;
  /** ISO timestamp of the last applied snapshot */
  lastAppliedAt: string | null;
  lastError: string | null;
}

/**
 * Status document served by the health endpoint
 */
export interface ReconcilerStatus {
  phase: ReconcilerPhase;
  ready: boolean;
  generation: number;
  synced: Record<ResourceKind, boolean>;
  missing: ResourceKind[];
  lastAppliedAt: string | null;
  lastError: string | null;
}

export interface ReconcilerStore {
  readonly state: DeepReadonly<ReconcilerState>;
  /** A worker is running */
  readonly isReady: ComputedRef<boolean>;
  /** Resources not seen yet */
  readonly missingResources: ComputedRef<ResourceKind[]>;
  setPhase(phase: ReconcilerPhase): void;
  markSynced(kind: ResourceKind): void;
  markPresent(kind: ResourceKind): void;
  recordApplied(generation: number, at?: Date): void;
  recordFailure(message: string): void;
  toStatus(): ReconcilerStatus;
}

// ============================================================================
// Store
// ============================================================================

/**
 * Create a reconciler store
 */
export function createReconcilerStore(): ReconcilerStore {
  const state = reactive<ReconcilerState>({
    phase: 'starting',
    synced: { settings: false, secrets: false },
    present: { settings: false, secrets: false },
    generation: 0,
    lastAppliedAt: null,
    lastError: null,
  });

  const isReady = computed(() => state.phase === 'running');

  const missingResources = computed(() => RESOURCE_KINDS.filter((kind) => !state.present[kind]));

  function setPhase(phase: ReconcilerPhase): void {
    // failed and stopped are terminal
    if (state.phase === 'failed' || state.phase === 'stopped') {
      return;
    }
    state.phase = phase;
  }

  function markSynced(kind: ResourceKind): void {
    state.synced[kind] = true;
  }

  function markPresent(kind: ResourceKind): void {
    state.present[kind] = true;
  }

  function recordApplied(generation: number, at: Date = new Date()): void {
    if (state.phase === 'failed' || state.phase === 'stopped') {
      return;
    }
    state.generation = generation;
    state.lastAppliedAt = at.toISOString();
    state.lastError = null;
    setPhase('running');
  }

  function recordFailure(message: string): void {
    state.lastError = message;
    setPhase('failed');
  }

  function toStatus(): ReconcilerStatus {
    return {
      phase: state.phase,
      ready: isReady.value,
      generation: state.generation,
      synced: { ...state.synced },
      missing: [...missingResources.value],
      lastAppliedAt: state.lastAppliedAt,
      lastError: state.lastError,
    };
  }

  return {
    state: readonly(state),
    isReady,
    missingResources,
    setPhase,
    markSynced,
    markPresent,
    recordApplied,
    recordFailure,
    toStatus,
  };
}
