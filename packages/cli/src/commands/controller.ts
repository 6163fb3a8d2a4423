/**
 * Controller Command
 *
 * `herald controller` runs the notifications controller in the foreground.
 * Flags left unset fall back to HERALD_* environment variables, then to
 * the built-in defaults.
 *
 * @module @herald/cli/commands/controller
 */

import { Command, InvalidArgumentError } from 'commander';
import type { ControllerConfig } from '@herald/shared';
import { DEFAULT_RESOURCE_NAMES, isValidationError, parseLogLevel } from '@herald/shared';
import { DEFAULT_METRICS_PORT, DEFAULT_SYNC_TIMEOUT_SECONDS, startController } from '@herald/server';
import { info } from '../output.js';

/**
 * Starts the controller with the given overrides
 */
export type ControllerRunner = (overrides: Partial<ControllerConfig>) => Promise<unknown>;

/**
 * Options as commander hands them over
 */
export interface ControllerCommandOptions {
  kubeconfig?: string;
  context?: string;
  processorsCount?: number;
  appLabelSelector?: string;
  namespace?: string;
  loglevel?: ControllerConfig['logLevel'];
  metricsPort?: number;
  configMapName?: string;
  secretName?: string;
  syncTimeout?: number;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseLevel(value: string): ControllerConfig['logLevel'] {
  try {
    return parseLogLevel(value);
  } catch (err) {
    if (isValidationError(err)) {
      throw new InvalidArgumentError('Expected one of: debug, info, warn, error.');
    }
    throw err;
  }
}

/**
 * Map command options to configuration overrides; unset flags stay undefined
 */
export function toConfigOverrides(options: ControllerCommandOptions): Partial<ControllerConfig> {
  return {
    kubeconfig: options.kubeconfig,
    context: options.context,
    processorsCount: options.processorsCount,
    appLabelSelector: options.appLabelSelector,
    namespace: options.namespace,
    logLevel: options.loglevel,
    metricsPort: options.metricsPort,
    configMapName: options.configMapName,
    secretName: options.secretName,
    syncTimeoutMs: options.syncTimeout === undefined ? undefined : options.syncTimeout * 1000,
  };
}

/**
 * Creates the controller command
 */
export function createControllerCommand(run: ControllerRunner = startController): Command {
  return new Command('controller')
    .description('Run the notifications controller')
    .option('--kubeconfig <path>', 'Path to a kubeconfig file (default: in-cluster or ~/.kube/config)')
    .option('--context <name>', 'Kubeconfig context to use')
    .option('--processors-count <n>', 'Number of processors each worker runs (default: 1)', parseInteger)
    .option('--app-label-selector <selector>', 'Label selector for the resources the worker handles (default: all)')
    .option('--namespace <ns>', "Namespace to watch (default: the context's namespace, else default)")
    .option('--loglevel <level>', 'Log level: debug, info, warn, error (default: info)', parseLevel)
    .option('--metrics-port <port>', `Port of the metrics endpoint (default: ${DEFAULT_METRICS_PORT})`, parseInteger)
    .option('--config-map-name <name>', `Settings ConfigMap name (default: ${DEFAULT_RESOURCE_NAMES.settings})`)
    .option('--secret-name <name>', `Secret name (default: ${DEFAULT_RESOURCE_NAMES.secrets})`)
    .option(
      '--sync-timeout <seconds>',
      `Seconds to wait for the initial listing (default: ${DEFAULT_SYNC_TIMEOUT_SECONDS})`,
      parseInteger,
    )
    .action(async (options: ControllerCommandOptions) => {
      info('Starting Herald controller…');
      await run(toConfigOverrides(options));
    });
}
