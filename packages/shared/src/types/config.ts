/**
 * Controller process configuration
 * @module @herald/shared/types/config
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Settings of one controller process, resolved from flags and environment
 */
export interface ControllerConfig {
  /** Namespace holding the watched resources */
  namespace: string;
  /** Number of processors each worker runs */
  processorsCount: number;
  /** Label selector passed to the worker; empty selects everything */
  appLabelSelector: string;
  logLevel: LogLevel;
  /** Port of the metrics endpoint */
  metricsPort: number;
  /** Bind address of the metrics endpoint */
  metricsHost: string;
  /** Name of the settings ConfigMap */
  configMapName: string;
  /** Name of the companion Secret */
  secretName: string;
  /** How long to wait for the initial listing of both resources */
  syncTimeoutMs: number;
  /** Path to a kubeconfig file; in-cluster or default loading when unset */
  kubeconfig?: string;
  /** Kubeconfig context to use instead of the current one */
  context?: string;
}
