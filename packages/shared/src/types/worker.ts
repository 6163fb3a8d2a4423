/**
 * Worker contract and controller metrics type definitions
 * @module @herald/shared/types/worker
 */

import type { ResourceEventType, ResourceKind } from './resource.js';
import type { ConfigSnapshot } from './snapshot.js';

// ============================================================================
// Metrics
// ============================================================================

/**
 * Result of one merge attempt that reached validation
 */
export type ReloadOutcome = 'applied' | 'invalid' | 'failed';

/**
 * Metrics sink used by the reconciliation loop and handed to workers
 */
export interface ControllerMetrics {
  recordResourceEvent(kind: ResourceKind, event: ResourceEventType): void;
  recordReload(outcome: ReloadOutcome): void;
  recordWorkerRestart(): void;
  setGeneration(generation: number): void;
}

/**
 * Metrics sink that records nothing
 */
export const noopMetrics: ControllerMetrics = {
  recordResourceEvent: () => undefined,
  recordReload: () => undefined,
  recordWorkerRestart: () => undefined,
  setGeneration: () => undefined,
};

// ============================================================================
// Worker
// ============================================================================

/**
 * A worker instance bound to one snapshot.
 *
 * `initialize` runs to completion before `run` starts. `run` keeps going
 * until the signal aborts, then settles once all of its background
 * activity has stopped.
 */
export interface Worker {
  initialize(signal: AbortSignal): Promise<void>;
  run(signal: AbortSignal, concurrency: number): Promise<void>;
}

/**
 * Options passed to every worker the factory builds
 */
export interface WorkerOptions {
  /** Namespace the worker operates in */
  namespace: string;
  /** Label selector restricting the resources the worker reconciles; empty for all */
  selector: string;
  metrics: ControllerMetrics;
}

/**
 * Builds a worker for a snapshot. Throwing means the snapshot cannot
 * produce a working worker.
 */
export type WorkerFactory = (
  snapshot: ConfigSnapshot,
  options: WorkerOptions,
) => Worker | Promise<Worker>;

/**
 * Lifecycle manager states
 */
export type LifecycleState = 'idle' | 'running';
