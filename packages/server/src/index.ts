/**
 * Herald Server Package
 * Controller process: informers, metrics and health endpoint, default worker
 * @module @herald/server
 */

export {
  DEFAULT_CONFIG,
  DEFAULT_METRICS_PORT,
  DEFAULT_NAMESPACE,
  DEFAULT_SYNC_TIMEOUT_SECONDS,
  configFromEnv,
  resolveControllerConfig,
} from './config.js';

export { loadKubeConfig, contextNamespace, type KubeConfigOptions } from './kube/client.js';

export {
  KubeResourceInformer,
  RESTART_DELAY_MS,
  configMapToObject,
  secretToObject,
  createConfigMapInformer,
  createSecretInformer,
  informerSource,
  startWithRetry,
  type KubeResourceInformerOptions,
  type NamedResourceOptions,
  type ObjectVerb,
  type RetryOptions,
  type WatchSource,
} from './kube/informers.js';

export {
  ControllerMetricsRegistry,
  PROMETHEUS_CONTENT_TYPE,
  type MetricsRenderer,
} from './metrics/registry.js';

export {
  createHealthHandler,
  createMetricsApp,
  createMetricsHandler,
  createMetricsServer,
  type MetricsAppOptions,
  type MetricsServer,
  type MetricsServerOptions,
} from './metrics/metrics-server.js';

export {
  CONFIG_APPLIED_MESSAGE,
  CONFIG_APPLIED_TRIGGER,
  DefaultWorker,
  createDefaultWorker,
  notificationsFor,
  recipientsFor,
} from './worker/default-worker.js';

export {
  SYNC_FAILURE_MESSAGE,
  createController,
  createExitOnFatal,
  startController,
  type Controller,
  type ControllerInformers,
  type ControllerOptions,
} from './controller.js';
