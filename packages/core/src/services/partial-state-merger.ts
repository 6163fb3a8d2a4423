/**
 * Partial-state merger
 *
 * Collects the latest settings and secrets payloads. Once both have been
 * seen, every update produces a new snapshot that is validated and handed
 * to the lifecycle manager while the merge lock is held, so updates are
 * applied strictly one after another in arrival order.
 *
 * @module @herald/core/services/partial-state-merger
 */

import type {
  ConfigSnapshot,
  ControllerMetrics,
  NotificationService,
  RawResourcePayload,
  ResourceUpdate,
} from '@herald/shared';
import {
  Mutex,
  createServiceLogger,
  isHeraldError,
  noopMetrics,
  toError,
} from '@herald/shared';
import { ConsoleService } from '../notifier/console-service.js';
import { attachInspectionSink } from '../notifier/service-notifier.js';
import { createDefaultServiceRegistry, type ServiceRegistry } from '../notifier/service-registry.js';
import type { ReconcilerStore } from '../stores/reconciler-store.js';
import { validateSnapshot } from './snapshot-validator.js';

const logger = createServiceLogger({ component: 'partial-state-merger' });

// ============================================================================
// Types
// ============================================================================

/**
 * Receives errors that must end the process
 */
export type FatalHandler = (message: string, error: Error) => void;

/**
 * Where valid snapshots go
 */
export interface SnapshotTarget {
  apply(snapshot: ConfigSnapshot): Promise<void>;
}

/**
 * Partial-state merger options
 */
export interface PartialStateMergerOptions {
  lifecycle: SnapshotTarget;
  onFatal: FatalHandler;
  /** Service types known to the validator; defaults to the built-in registry */
  registry?: ServiceRegistry;
  /** Builds the inspection sink added to every valid snapshot */
  inspectionSink?: () => NotificationService;
  metrics?: ControllerMetrics;
  store?: ReconcilerStore;
}

/**
 * Latest payload per kind. A field is only ever replaced by an update of
 * the same kind.
 */
interface MergedState {
  settings?: RawResourcePayload;
  secrets?: RawResourcePayload;
}

export const PARSE_FAILURE_MESSAGE = 'Failed to parse new settings';
export const START_FAILURE_MESSAGE = 'Failed to start controller';

// ============================================================================
// Merger
// ============================================================================

export class PartialStateMerger {
  private readonly options: PartialStateMergerOptions;
  private readonly registry: ServiceRegistry;
  private readonly metrics: ControllerMetrics;
  private readonly mutex = new Mutex();
  private readonly merged: MergedState = {};
  private generation = 0;
  private halted = false;

  constructor(options: PartialStateMergerOptions) {
    this.options = options;
    this.registry = options.registry ?? createDefaultServiceRegistry();
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Generation of the last merge attempt, 0 before the first
   */
  get lastGeneration(): number {
    return this.generation;
  }

  /**
   * Whether a fatal error stopped merging
   */
  get isHalted(): boolean {
    return this.halted;
  }

  hasPayload(kind: ResourceUpdate['kind']): boolean {
    return this.merged[kind] !== undefined;
  }

  /**
   * Record an update and, when both payloads are present, validate and apply
   * a snapshot. Resolves after the apply step has finished.
   */
  onUpdate(update: ResourceUpdate): Promise<void> {
    return this.mutex.runExclusive(() => this.merge(update));
  }

  /**
   * Run one merge attempt per event, in order, until the stream ends
   */
  async consume(stream: AsyncIterable<ResourceUpdate>): Promise<void> {
    for await (const update of stream) {
      await this.onUpdate(update);
    }
  }

  private async merge(update: ResourceUpdate): Promise<void> {
    if (this.halted) {
      logger.debug('Ignoring update after fatal error', { kind: update.kind });
      return;
    }

    if (update.kind === 'settings') {
      this.merged.settings = update.payload;
    } else {
      this.merged.secrets = update.payload;
    }
    this.options.store?.markPresent(update.kind);

    const { settings, secrets } = this.merged;
    if (!settings || !secrets) {
      logger.debug('Waiting for the other resource before merging', { received: update.kind });
      return;
    }

    this.generation += 1;
    const generation = this.generation;

    const result = validateSnapshot(settings, secrets, { generation, registry: this.registry });
    if (!result.valid) {
      this.metrics.recordReload('invalid');
      this.fail(PARSE_FAILURE_MESSAGE, result.error);
      return;
    }

    const snapshot = result.value;
    const sink = this.options.inspectionSink?.() ?? new ConsoleService();
    attachInspectionSink(snapshot.notifier, sink);

    try {
      await this.options.lifecycle.apply(snapshot);
    } catch (error) {
      this.metrics.recordReload('failed');
      if (isHeraldError(error) && !error.isFatal()) {
        logger.warn('Skipping snapshot', { generation, code: error.code, error: error.message });
        return;
      }
      this.fail(START_FAILURE_MESSAGE, toError(error));
      return;
    }

    this.metrics.recordReload('applied');
    this.metrics.setGeneration(generation);
    this.options.store?.recordApplied(generation);
    logger.debug('Snapshot applied', { generation, trigger: update.kind, event: update.event });
  }

  private fail(message: string, error: Error): void {
    this.halted = true;
    this.options.store?.recordFailure(`${message}: ${error.message}`);
    this.options.onFatal(message, error);
  }
}
