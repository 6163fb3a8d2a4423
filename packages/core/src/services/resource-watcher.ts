/**
 * Resource watcher service
 * Keeps a local cache of one named resource and streams its add/update events
 * @module @herald/core/services/resource-watcher
 */

import type {
  ControllerMetrics,
  Logger,
  RawResourcePayload,
  ResourceEventType,
  ResourceIdentity,
  ResourceKind,
  ResourceUpdate,
  WatchedObject,
} from '@herald/shared';
import {
  EventChannel,
  HeraldError,
  ErrorCode,
  createServiceLogger,
  noopMetrics,
  resourceIdentity,
  toError,
  toResourceUpdate,
} from '@herald/shared';

// ============================================================================
// Types
// ============================================================================

/**
 * Callbacks an informer delivers to
 */
export interface InformerHandlers {
  onAdd(object: WatchedObject): void;
  onUpdate(object: WatchedObject): void;
  onDelete(object: WatchedObject): void;
  onError(error: unknown): void;
}

/**
 * Source of change events for one resource.
 *
 * `start` resolves once the initial listing has been delivered through
 * `onAdd`. Reconnecting after transport errors is the informer's job.
 */
export interface ResourceInformer {
  start(handlers: InformerHandlers): Promise<void>;
  stop(): void;
}

/**
 * Resource watcher options
 */
export interface ResourceWatcherOptions {
  kind: ResourceKind;
  name: string;
  namespace: string;
  informer: ResourceInformer;
  metrics?: ControllerMetrics;
}

// ============================================================================
// Resource Watcher
// ============================================================================

/**
 * Watches a single named resource.
 *
 * The event stream has one consumer. Events that arrive before the consumer
 * starts reading are buffered.
 */
export class ResourceWatcher {
  readonly identity: ResourceIdentity;

  private readonly informer: ResourceInformer;
  private readonly metrics: ControllerMetrics;
  private readonly cache = new Map<string, WatchedObject>();
  private readonly channel = new EventChannel<ResourceUpdate>();
  private readonly syncWaiters = new Set<() => void>();
  private readonly logger: Logger;
  private synced = false;
  private started = false;
  private stopped = false;

  constructor(options: ResourceWatcherOptions) {
    this.identity = resourceIdentity(options.kind, options.name, options.namespace);
    this.informer = options.informer;
    this.metrics = options.metrics ?? noopMetrics;
    this.logger = createServiceLogger({ component: 'resource-watcher' }, {
      resource: this.identity.displayName,
      namespace: options.namespace,
    });
  }

  get kind(): ResourceKind {
    return this.identity.kind;
  }

  /**
   * Begin delivery. Returns immediately; `hasSynced()` turns true once the
   * initial listing is in.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    void this.informer
      .start({
        onAdd: (object) => this.handleChange('added', object),
        onUpdate: (object) => this.handleChange('updated', object),
        onDelete: (object) => this.handleDelete(object),
        onError: (error) => this.handleError(error),
      })
      .then(
        () => this.markSynced(),
        (error: unknown) => {
          if (this.stopped) {
            this.logger.debug('Informer stopped before initial sync');
          } else {
            this.logger.error('Informer failed to start', toError(error));
          }
        },
      );
  }

  /**
   * Stop delivery and end the event stream
   */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.informer.stop();
    this.channel.close();
  }

  hasSynced(): boolean {
    return this.synced;
  }

  /**
   * Resolve once the initial listing is in.
   * @throws HeraldError CANCELLED when the signal aborts first
   */
  whenSynced(signal?: AbortSignal): Promise<void> {
    if (this.synced) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      const cancelled = (): HeraldError =>
        new HeraldError(`Stopped waiting for ${this.identity.displayName} to sync`, ErrorCode.CANCELLED);
      if (signal?.aborted) {
        reject(cancelled());
        return;
      }
      const onSynced = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = (): void => {
        this.syncWaiters.delete(onSynced);
        reject(cancelled());
      };
      this.syncWaiters.add(onSynced);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Cached payloads; at most one entry
   */
  list(): RawResourcePayload[] {
    return [...this.cache.values()].map((object) => object.payload);
  }

  /**
   * Ordered add/update events, ending when the signal aborts or the watcher stops
   */
  events(signal?: AbortSignal): AsyncIterable<ResourceUpdate> {
    return this.channel.stream(signal);
  }

  // ===========================================================================
  // Informer callbacks
  // ===========================================================================

  private handleChange(event: ResourceEventType, object: WatchedObject): void {
    if (object.name !== this.identity.name) {
      return;
    }
    this.cache.set(object.name, object);
    this.metrics.recordResourceEvent(this.identity.kind, event);

    if (event === 'added') {
      this.logger.info(`${this.identity.displayName} found`);
    } else {
      this.logger.debug(`${this.identity.displayName} updated`, { resourceVersion: object.resourceVersion });
    }

    this.channel.push(toResourceUpdate(this.identity.kind, event, object.payload));
  }

  private handleDelete(object: WatchedObject): void {
    if (object.name !== this.identity.name) {
      return;
    }
    this.cache.delete(object.name);
    this.logger.info(`${this.identity.displayName} deleted`);
  }

  private handleError(error: unknown): void {
    this.logger.warn('Watch error', { error: toError(error).message });
  }

  private markSynced(): void {
    if (this.synced) {
      return;
    }
    this.synced = true;
    this.logger.debug('Initial sync complete', { cached: this.cache.size });
    for (const waiter of this.syncWaiters) {
      waiter();
    }
    this.syncWaiters.clear();
  }
}
