/**
 * Kubernetes informers for the watched ConfigMap and Secret
 *
 * Wraps `@kubernetes/client-node` informers in the ResourceInformer contract
 * the resource watcher consumes: objects are reduced to their name, version
 * and decoded data, the initial list is retried until it succeeds, and the
 * watch is restarted after transport errors.
 *
 * @module @herald/server/kube/informers
 */

import {
  CoreV1Api,
  ListWatch,
  Watch,
  type Informer,
  type KubeConfig,
  type KubernetesObject,
  type V1ConfigMap,
  type V1Secret,
} from '@kubernetes/client-node';
import type { InformerHandlers, ResourceInformer } from '@herald/core';
import type { WatchedObject } from '@herald/shared';
import { ErrorCode, HeraldError, createServiceLogger, sleep, toError } from '@herald/shared';

const logger = createServiceLogger({ component: 'kube-informer' });

/**
 * Delay before restarting a watch, and between failed initial lists
 */
export const RESTART_DELAY_MS = 2000;

// ============================================================================
// Object conversion
// ============================================================================

export function configMapToObject(configMap: V1ConfigMap): WatchedObject | null {
  const name = configMap.metadata?.name;
  if (!name) {
    return null;
  }
  return {
    name,
    resourceVersion: configMap.metadata?.resourceVersion,
    payload: { ...(configMap.data ?? {}) },
  };
}

/**
 * Convert a Secret, base64-decoding every data value
 */
export function secretToObject(secret: V1Secret): WatchedObject | null {
  const name = secret.metadata?.name;
  if (!name) {
    return null;
  }
  const payload: Record<string, string> = {};
  for (const [key, value] of Object.entries(secret.data ?? {})) {
    payload[key] = Buffer.from(value, 'base64').toString('utf8');
  }
  return { name, resourceVersion: secret.metadata?.resourceVersion, payload };
}

// ============================================================================
// Watch source
// ============================================================================

export type ObjectVerb = 'add' | 'update' | 'delete';

/**
 * The parts of a client-node informer used here
 */
export interface WatchSource<T> {
  onObject(verb: ObjectVerb, callback: (object: T) => void): void;
  onError(callback: (error: unknown) => void): void;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function informerSource<T extends KubernetesObject>(informer: Informer<T>): WatchSource<T> {
  return {
    onObject: (verb, callback) => informer.on(verb, callback),
    onError: (callback) => informer.on('error', (error?: unknown) => callback(error)),
    start: () => informer.start(),
    stop: () => informer.stop(),
  };
}

export interface RetryOptions {
  delayMs: number;
  signal: AbortSignal;
  onError: (error: unknown) => void;
}

/**
 * Call `start` until it resolves or the signal aborts.
 * Returns false when aborted before a successful start.
 */
export async function startWithRetry(start: () => Promise<void>, options: RetryOptions): Promise<boolean> {
  while (!options.signal.aborted) {
    try {
      await start();
      return true;
    } catch (error) {
      if (options.signal.aborted) {
        break;
      }
      options.onError(error);
      await sleep(options.delayMs, options.signal);
    }
  }
  return false;
}

// ============================================================================
// Informer
// ============================================================================

export interface KubeResourceInformerOptions<T> {
  source: WatchSource<T>;
  toObject: (object: T) => WatchedObject | null;
  /** e.g. "config map herald-notifications-cm" */
  description: string;
  restartDelayMs?: number;
}

export class KubeResourceInformer<T> implements ResourceInformer {
  private readonly options: KubeResourceInformerOptions<T>;
  private readonly abort = new AbortController();
  private restartTimer: NodeJS.Timeout | null = null;

  constructor(options: KubeResourceInformerOptions<T>) {
    this.options = options;
  }

  private get delayMs(): number {
    return this.options.restartDelayMs ?? RESTART_DELAY_MS;
  }

  async start(handlers: InformerHandlers): Promise<void> {
    const { source, toObject } = this.options;
    const deliver = (callback: (object: WatchedObject) => void) => (object: T): void => {
      const watched = toObject(object);
      if (watched) {
        callback(watched);
      }
    };

    source.onObject('add', deliver((object) => handlers.onAdd(object)));
    source.onObject('update', deliver((object) => handlers.onUpdate(object)));
    source.onObject('delete', deliver((object) => handlers.onDelete(object)));
    source.onError((error) => {
      handlers.onError(error);
      this.scheduleRestart(handlers);
    });

    const started = await this.startSource(handlers);
    if (!started) {
      throw new HeraldError(`Informer for ${this.options.description} stopped before it started`, ErrorCode.CANCELLED);
    }
  }

  stop(): void {
    if (this.abort.signal.aborted) {
      return;
    }
    this.abort.abort();
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    this.options.source.stop().catch((error: unknown) => {
      logger.warn('Failed to stop informer', { resource: this.options.description, error: toError(error).message });
    });
  }

  private startSource(handlers: InformerHandlers): Promise<boolean> {
    return startWithRetry(() => this.options.source.start(), {
      delayMs: this.delayMs,
      signal: this.abort.signal,
      onError: (error) => handlers.onError(error),
    });
  }

  private scheduleRestart(handlers: InformerHandlers): void {
    if (this.abort.signal.aborted || this.restartTimer) {
      return;
    }
    logger.debug('Restarting watch', { resource: this.options.description, delayMs: this.delayMs });
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.startSource(handlers).catch((error: unknown) => {
        logger.error('Failed to restart watch', toError(error), { resource: this.options.description });
      });
    }, this.delayMs);
  }
}

// ============================================================================
// Factories
// ============================================================================

export interface NamedResourceOptions {
  namespace: string;
  name: string;
  restartDelayMs?: number;
}

function nameSelector(name: string): string {
  return `metadata.name=${name}`;
}

/**
 * Informer for one ConfigMap, selected by name
 */
export function createConfigMapInformer(kubeConfig: KubeConfig, options: NamedResourceOptions): ResourceInformer {
  const { namespace, name } = options;
  const api = kubeConfig.makeApiClient(CoreV1Api);
  const fieldSelector = nameSelector(name);
  const informer = new ListWatch<V1ConfigMap>(
    `/api/v1/namespaces/${namespace}/configmaps`,
    new Watch(kubeConfig),
    () => api.listNamespacedConfigMap({ namespace, fieldSelector }),
    false,
    undefined,
    fieldSelector,
  );
  return new KubeResourceInformer({
    source: informerSource(informer),
    toObject: configMapToObject,
    description: `config map ${name}`,
    restartDelayMs: options.restartDelayMs,
  });
}

/**
 * Informer for one Secret, selected by name
 */
export function createSecretInformer(kubeConfig: KubeConfig, options: NamedResourceOptions): ResourceInformer {
  const { namespace, name } = options;
  const api = kubeConfig.makeApiClient(CoreV1Api);
  const fieldSelector = nameSelector(name);
  const informer = new ListWatch<V1Secret>(
    `/api/v1/namespaces/${namespace}/secrets`,
    new Watch(kubeConfig),
    () => api.listNamespacedSecret({ namespace, fieldSelector }),
    false,
    undefined,
    fieldSelector,
  );
  return new KubeResourceInformer({
    source: informerSource(informer),
    toObject: secretToObject,
    description: `secret ${name}`,
    restartDelayMs: options.restartDelayMs,
  });
}
