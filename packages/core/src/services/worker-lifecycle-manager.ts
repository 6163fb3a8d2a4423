/**
 * Worker lifecycle manager
 * Owns at most one running worker and replaces it when a new snapshot arrives
 * @module @herald/core/services/worker-lifecycle-manager
 */

import type {
  ConfigSnapshot,
  ControllerMetrics,
  LifecycleState,
  Worker,
  WorkerFactory,
} from '@herald/shared';
import {
  WorkerError,
  createServiceLogger,
  noopMetrics,
  summarizeSnapshot,
  toError,
} from '@herald/shared';

const logger = createServiceLogger({ component: 'worker-lifecycle' });

// ============================================================================
// Types
// ============================================================================

/**
 * Worker lifecycle manager options
 */
export interface WorkerLifecycleManagerOptions {
  factory: WorkerFactory;
  /** Namespace handed to every worker */
  namespace: string;
  /** Label selector handed to every worker */
  selector: string;
  /** Processor count passed to `run` */
  concurrency: number;
  metrics?: ControllerMetrics;
}

/**
 * Record of the running worker
 */
interface WorkerHandle {
  worker: Worker;
  controller: AbortController;
  /** Settles after the worker has stopped; never rejects */
  run: Promise<void>;
  generation: number;
}

// ============================================================================
// Lifecycle Manager
// ============================================================================

/**
 * Starts and stops workers. Only one worker runs at a time, and the old
 * worker's teardown completes before the next one is constructed.
 *
 * `apply` calls must not overlap; the merger serializes them.
 */
export class WorkerLifecycleManager {
  private readonly options: WorkerLifecycleManagerOptions;
  private readonly metrics: ControllerMetrics;
  private handle: WorkerHandle | null = null;
  private currentGeneration = 0;

  constructor(options: WorkerLifecycleManagerOptions) {
    this.options = options;
    this.metrics = options.metrics ?? noopMetrics;
  }

  get state(): LifecycleState {
    return this.handle ? 'running' : 'idle';
  }

  /**
   * Generation of the last accepted snapshot, 0 before the first
   */
  get generation(): number {
    return this.currentGeneration;
  }

  /**
   * Replace the running worker with one built from `snapshot`.
   *
   * @throws WorkerError STALE_SNAPSHOT when the snapshot is not newer than the last one
   * @throws WorkerError WORKER_CONSTRUCTION_FAILED when the factory throws
   * @throws WorkerError WORKER_INIT_FAILED when initialization rejects
   */
  async apply(snapshot: ConfigSnapshot): Promise<void> {
    const { generation } = snapshot;
    if (generation <= this.currentGeneration) {
      throw WorkerError.staleSnapshot(generation, this.currentGeneration);
    }
    this.currentGeneration = generation;

    if (this.handle) {
      logger.info('Settings had been updated. Restarting controller...', {
        from: this.handle.generation,
        to: generation,
      });
      await this.stopCurrent();
      this.metrics.recordWorkerRestart();
    }

    let worker: Worker;
    try {
      worker = await this.options.factory(snapshot, {
        namespace: this.options.namespace,
        selector: this.options.selector,
        metrics: this.metrics,
      });
    } catch (error) {
      throw WorkerError.constructionFailed(generation, toError(error));
    }

    const controller = new AbortController();
    try {
      await worker.initialize(controller.signal);
    } catch (error) {
      controller.abort();
      throw WorkerError.initFailed(generation, toError(error));
    }

    const run = this.runInBackground(worker, controller, generation);
    this.handle = { worker, controller, run, generation };
    logger.info('Worker started', { ...summarizeSnapshot(snapshot) });
  }

  /**
   * Stop the running worker, if any, and wait for it to finish
   */
  async shutdown(): Promise<void> {
    await this.stopCurrent();
  }

  private async stopCurrent(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;
    handle.controller.abort();
    await handle.run;
    logger.debug('Worker stopped', { generation: handle.generation });
  }

  private async runInBackground(worker: Worker, controller: AbortController, generation: number): Promise<void> {
    try {
      await worker.run(controller.signal, this.options.concurrency);
    } catch (error) {
      if (controller.signal.aborted) {
        logger.debug('Worker exited with an error after stop', { generation, error: toError(error).message });
      } else {
        logger.error('Worker stopped unexpectedly', toError(error), { generation });
      }
    }
  }
}
