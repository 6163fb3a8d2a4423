/**
 * Kubernetes client configuration
 * @module @herald/server/kube/client
 */

import { KubeConfig } from '@kubernetes/client-node';
import { ErrorCode, HeraldError, toError } from '@herald/shared';

export interface KubeConfigOptions {
  /** Path to a kubeconfig file; the default loading chain is used when unset */
  kubeconfig?: string;
  /** Context to switch to */
  context?: string;
}

/**
 * Load a kubeconfig from a file, or from the default chain
 * (KUBECONFIG, ~/.kube/config, then in-cluster).
 *
 * @throws HeraldError KUBE_CONFIG_UNAVAILABLE when loading fails or the context does not exist
 */
export function loadKubeConfig(options: KubeConfigOptions = {}, kubeConfig: KubeConfig = new KubeConfig()): KubeConfig {
  try {
    if (options.kubeconfig) {
      kubeConfig.loadFromFile(options.kubeconfig);
    } else {
      kubeConfig.loadFromDefault();
    }
  } catch (error) {
    throw new HeraldError(
      `Failed to load kubeconfig${options.kubeconfig ? ` from ${options.kubeconfig}` : ''}`,
      ErrorCode.KUBE_CONFIG_UNAVAILABLE,
      { path: options.kubeconfig },
      toError(error),
    );
  }

  if (options.context) {
    if (!kubeConfig.getContextObject(options.context)) {
      throw new HeraldError(
        `Context '${options.context}' not found in kubeconfig`,
        ErrorCode.KUBE_CONFIG_UNAVAILABLE,
        { context: options.context },
      );
    }
    kubeConfig.setCurrentContext(options.context);
  }

  return kubeConfig;
}

/**
 * Namespace of the current context, if it names one
 */
export function contextNamespace(kubeConfig: KubeConfig): string | undefined {
  const context = kubeConfig.getContextObject(kubeConfig.getCurrentContext());
  return context?.namespace || undefined;
}
