/**
 * Controller configuration
 *
 * Defaults come from `HERALD_*` environment variables; command-line values
 * override them. The namespace is resolved last because it may come from
 * the kubeconfig context.
 *
 * @module @herald/server/config
 */

import type { ControllerConfig, LogLevel } from '@herald/shared';
import {
  DEFAULT_RESOURCE_NAMES,
  ErrorCode,
  SELECTABLE_LOG_LEVELS,
  ValidationError,
  validateControllerConfig,
} from '@herald/shared';

export const DEFAULT_NAMESPACE = 'default';
export const DEFAULT_METRICS_PORT = 9001;
export const DEFAULT_SYNC_TIMEOUT_SECONDS = 120;

/**
 * Values that hold when neither flags nor environment say otherwise
 */
export const DEFAULT_CONFIG: Omit<ControllerConfig, 'namespace'> = {
  processorsCount: 1,
  appLabelSelector: '',
  logLevel: 'info',
  metricsPort: DEFAULT_METRICS_PORT,
  metricsHost: '0.0.0.0',
  configMapName: DEFAULT_RESOURCE_NAMES.settings,
  secretName: DEFAULT_RESOURCE_NAMES.secrets,
  syncTimeoutMs: DEFAULT_SYNC_TIMEOUT_SECONDS * 1000,
};

function readLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return SELECTABLE_LOG_LEVELS.find((level) => level === normalized);
}

function readNumber(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

/**
 * Read configuration overrides from the environment.
 * Unparseable numbers come through as NaN so validation reports them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ControllerConfig> {
  const config: Partial<ControllerConfig> = {};

  if (env.HERALD_NAMESPACE) config.namespace = env.HERALD_NAMESPACE;
  const processors = readNumber(env.HERALD_PROCESSORS_COUNT);
  if (processors !== undefined) config.processorsCount = processors;
  if (env.HERALD_APP_LABEL_SELECTOR !== undefined) config.appLabelSelector = env.HERALD_APP_LABEL_SELECTOR;
  const logLevel = readLogLevel(env.LOG_LEVEL);
  if (logLevel) config.logLevel = logLevel;
  const metricsPort = readNumber(env.HERALD_METRICS_PORT);
  if (metricsPort !== undefined) config.metricsPort = metricsPort;
  if (env.HERALD_METRICS_HOST) config.metricsHost = env.HERALD_METRICS_HOST;
  if (env.HERALD_CONFIG_MAP_NAME) config.configMapName = env.HERALD_CONFIG_MAP_NAME;
  if (env.HERALD_SECRET_NAME) config.secretName = env.HERALD_SECRET_NAME;
  const syncTimeout = readNumber(env.HERALD_SYNC_TIMEOUT);
  if (syncTimeout !== undefined) config.syncTimeoutMs = syncTimeout * 1000;
  if (env.KUBECONFIG) config.kubeconfig = env.KUBECONFIG;
  if (env.HERALD_CONTEXT) config.context = env.HERALD_CONTEXT;

  return config;
}

/**
 * Merge defaults, environment and overrides into a validated configuration.
 *
 * @param fallbackNamespace - used when no namespace is configured, usually the kubeconfig context's
 * @throws ValidationError INVALID_CONTROLLER_CONFIG listing every invalid field
 */
export function resolveControllerConfig(
  overrides: Partial<ControllerConfig> = {},
  options: { env?: NodeJS.ProcessEnv; fallbackNamespace?: string } = {},
): ControllerConfig {
  const fromEnv = configFromEnv(options.env);
  const namespace = overrides.namespace ?? fromEnv.namespace ?? options.fallbackNamespace ?? DEFAULT_NAMESPACE;

  const config: ControllerConfig = {
    ...DEFAULT_CONFIG,
    ...fromEnv,
    ...withoutUndefined(overrides),
    namespace,
  };

  const errors = validateControllerConfig(config);
  if (errors.length > 0) {
    throw new ValidationError(
      `Invalid controller configuration: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`,
      errors,
      {},
      ErrorCode.INVALID_CONTROLLER_CONFIG,
    );
  }

  return config;
}

function withoutUndefined(values: Partial<ControllerConfig>): Partial<ControllerConfig> {
  const result: Partial<ControllerConfig> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
