/**
 * Config reconciler
 *
 * Wires the two watchers to the merger: one consumer loop per watcher
 * stream, then waits for the initial sync.
 *
 * @module @herald/core/services/config-reconciler
 */

import { HeraldError, ErrorCode, createServiceLogger, toError } from '@herald/shared';
import type { ReconcilerStore } from '../stores/reconciler-store.js';
import type { PartialStateMerger } from './partial-state-merger.js';
import type { ResourceWatcher } from './resource-watcher.js';
import { awaitInitialSync, type ReadinessReport } from './startup-readiness-gate.js';
import type { WorkerLifecycleManager } from './worker-lifecycle-manager.js';

const logger = createServiceLogger({ component: 'config-reconciler' });

/**
 * Config reconciler options
 */
export interface ConfigReconcilerOptions {
  settingsWatcher: ResourceWatcher;
  secretsWatcher: ResourceWatcher;
  merger: PartialStateMerger;
  lifecycle: Pick<WorkerLifecycleManager, 'shutdown'>;
  /** Bound on the initial sync */
  syncTimeoutMs: number;
  store?: ReconcilerStore;
}

export class ConfigReconciler {
  private readonly options: ConfigReconcilerOptions;
  private controller: AbortController | null = null;
  private consumers: Promise<void>[] = [];

  constructor(options: ConfigReconcilerOptions) {
    this.options = options;
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Start both watchers and their consumer loops, then wait for the initial sync.
   *
   * @throws HeraldError CACHE_SYNC_TIMEOUT when the watchers do not sync in time
   */
  async start(): Promise<ReadinessReport> {
    if (this.controller) {
      throw new HeraldError('Reconciler already started', ErrorCode.INTERNAL);
    }
    const controller = new AbortController();
    this.controller = controller;

    const { settingsWatcher, secretsWatcher, merger, store } = this.options;
    const watchers = [settingsWatcher, secretsWatcher];
    store?.setPhase('syncing');

    for (const watcher of watchers) {
      watcher.start();
      this.consumers.push(
        merger.consume(watcher.events(controller.signal)).catch((error: unknown) => {
          logger.error('Event consumer stopped', toError(error), { resource: watcher.identity.displayName });
        }),
      );
    }

    const report = await awaitInitialSync(watchers, {
      timeoutMs: this.options.syncTimeoutMs,
      signal: controller.signal,
    });

    for (const watcher of watchers) {
      store?.markSynced(watcher.kind);
    }
    if (store && report.missing.length > 0 && store.state.phase === 'syncing') {
      store.setPhase('waiting');
    }

    logger.info('Watching configuration', {
      settings: settingsWatcher.identity.displayName,
      secrets: secretsWatcher.identity.displayName,
    });
    return report;
  }

  /**
   * Stop streams and watchers, wait for the consumers, then stop the worker
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    controller.abort();
    this.options.settingsWatcher.stop();
    this.options.secretsWatcher.stop();

    await Promise.all(this.consumers);
    this.consumers = [];
    await this.options.lifecycle.shutdown();

    this.options.store?.setPhase('stopped');
    this.controller = null;
    logger.info('Reconciler stopped');
  }
}
