/**
 * Controller process
 *
 * Builds the reconciliation pipeline for one namespace, serves metrics and
 * health, and turns fatal errors into a log line and exit code 1.
 *
 * @module @herald/server/controller
 */

import type { KubeConfig } from '@kubernetes/client-node';
import {
  ConfigReconciler,
  PartialStateMerger,
  ResourceWatcher,
  WorkerLifecycleManager,
  createReconcilerStore,
  type FatalHandler,
  type ReadinessReport,
  type ReconcilerStore,
  type ResourceInformer,
} from '@herald/core';
import type { ControllerConfig, NotificationService, WorkerFactory } from '@herald/shared';
import { createServiceLogger, setLogLevel, toError } from '@herald/shared';
import { configFromEnv, resolveControllerConfig } from './config.js';
import { contextNamespace, loadKubeConfig } from './kube/client.js';
import { createConfigMapInformer, createSecretInformer } from './kube/informers.js';
import { createMetricsServer, type MetricsServer } from './metrics/metrics-server.js';
import { ControllerMetricsRegistry } from './metrics/registry.js';
import { createDefaultWorker } from './worker/default-worker.js';

const logger = createServiceLogger({ component: 'controller' });

export const SYNC_FAILURE_MESSAGE = 'Failed to sync configuration';

// ============================================================================
// Types
// ============================================================================

export interface ControllerInformers {
  settings: ResourceInformer;
  secrets: ResourceInformer;
}

export interface ControllerOptions {
  config: ControllerConfig;
  /** Used to build the informers when `informers` is not given */
  kubeConfig?: KubeConfig;
  informers?: ControllerInformers;
  /** Defaults to the default worker */
  workerFactory?: WorkerFactory;
  /** Defaults to a fatal log followed by exit code 1 */
  onFatal?: FatalHandler;
  inspectionSink?: () => NotificationService;
  /** Serve /metrics and /healthz; on by default */
  serveMetrics?: boolean;
}

export interface Controller {
  config: ControllerConfig;
  store: ReconcilerStore;
  metrics: ControllerMetricsRegistry;
  reconciler: ConfigReconciler;
  metricsServer: MetricsServer | null;
  start(): Promise<ReadinessReport>;
  stop(): Promise<void>;
}

// ============================================================================
// Fatal handling
// ============================================================================

/**
 * Fatal handler that logs and ends the process
 */
export function createExitOnFatal(exit: (code: number) => void = (code) => process.exit(code)): FatalHandler {
  return (message, error) => {
    logger.fatal(message, error);
    exit(1);
  };
}

// ============================================================================
// Controller
// ============================================================================

function buildInformers(options: ControllerOptions): ControllerInformers {
  if (options.informers) {
    return options.informers;
  }
  if (!options.kubeConfig) {
    throw new Error('Either informers or a kubeconfig is required');
  }
  const { namespace, configMapName, secretName } = options.config;
  return {
    settings: createConfigMapInformer(options.kubeConfig, { namespace, name: configMapName }),
    secrets: createSecretInformer(options.kubeConfig, { namespace, name: secretName }),
  };
}

export function createController(options: ControllerOptions): Controller {
  const { config } = options;
  const onFatal = options.onFatal ?? createExitOnFatal();
  const store = createReconcilerStore();
  const metrics = new ControllerMetricsRegistry();
  const informers = buildInformers(options);

  const settingsWatcher = new ResourceWatcher({
    kind: 'settings',
    name: config.configMapName,
    namespace: config.namespace,
    informer: informers.settings,
    metrics,
  });
  const secretsWatcher = new ResourceWatcher({
    kind: 'secrets',
    name: config.secretName,
    namespace: config.namespace,
    informer: informers.secrets,
    metrics,
  });

  const lifecycle = new WorkerLifecycleManager({
    factory: options.workerFactory ?? createDefaultWorker,
    namespace: config.namespace,
    selector: config.appLabelSelector,
    concurrency: config.processorsCount,
    metrics,
  });

  const merger = new PartialStateMerger({
    lifecycle,
    onFatal,
    inspectionSink: options.inspectionSink,
    metrics,
    store,
  });

  const reconciler = new ConfigReconciler({
    settingsWatcher,
    secretsWatcher,
    merger,
    lifecycle,
    syncTimeoutMs: config.syncTimeoutMs,
    store,
  });

  const metricsServer =
    options.serveMetrics === false
      ? null
      : createMetricsServer({ metrics, store, port: config.metricsPort, host: config.metricsHost });

  let stopped = false;

  return {
    config,
    store,
    metrics,
    reconciler,
    metricsServer,

    async start() {
      logger.info('Starting controller', {
        namespace: config.namespace,
        configMap: config.configMapName,
        secret: config.secretName,
        processors: config.processorsCount,
        selector: config.appLabelSelector,
      });
      await metricsServer?.start();
      try {
        return await reconciler.start();
      } catch (error) {
        const cause = toError(error);
        store.recordFailure(`${SYNC_FAILURE_MESSAGE}: ${cause.message}`);
        onFatal(SYNC_FAILURE_MESSAGE, cause);
        throw cause;
      }
    },

    async stop() {
      if (stopped) {
        return;
      }
      stopped = true;
      await reconciler.stop();
      await metricsServer?.stop();
      await metrics.shutdown();
    },
  };
}

// ============================================================================
// Process entry
// ============================================================================

/**
 * Resolve configuration, start the controller and stop it on SIGTERM or SIGINT
 */
export async function startController(overrides: Partial<ControllerConfig> = {}): Promise<Controller> {
  const env = configFromEnv();
  const kubeConfig = loadKubeConfig({
    kubeconfig: overrides.kubeconfig ?? env.kubeconfig,
    context: overrides.context ?? env.context,
  });
  const config = resolveControllerConfig(overrides, { fallbackNamespace: contextNamespace(kubeConfig) });
  setLogLevel(config.logLevel);

  const controller = createController({ config, kubeConfig });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    try {
      await controller.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', toError(error));
      process.exit(1);
    }
  };
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  await controller.start();
  return controller;
}
