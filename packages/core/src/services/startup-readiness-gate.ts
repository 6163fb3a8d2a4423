/**
 * Startup readiness gate
 * Waits for the initial listing of every watcher, then reports missing resources
 * @module @herald/core/services/startup-readiness-gate
 */

import type { RawResourcePayload, ResourceIdentity } from '@herald/shared';
import { HeraldError, ErrorCode, createServiceLogger } from '@herald/shared';

const logger = createServiceLogger({ component: 'readiness-gate' });

/**
 * What the gate needs from a watcher
 */
export interface SyncableWatcher {
  readonly identity: ResourceIdentity;
  whenSynced(signal?: AbortSignal): Promise<void>;
  list(): RawResourcePayload[];
}

export interface InitialSyncOptions {
  timeoutMs: number;
  /** Aborting stops the wait with a CANCELLED error */
  signal?: AbortSignal;
}

export interface ReadinessReport {
  /** Display names of resources that do not exist yet */
  missing: string[];
}

export const CACHE_SYNC_TIMEOUT_MESSAGE = 'timed out waiting for caches to sync';

/**
 * Format the warning logged when resources are missing after sync
 */
export function missingResourcesMessage(missing: readonly string[]): string {
  return `Cannot find ${missing.join(' and ')}. Waiting when both config map and secret are created.`;
}

/**
 * Wait until every watcher has synced, bounded by `timeoutMs`.
 *
 * @throws HeraldError CACHE_SYNC_TIMEOUT when the timeout elapses first
 */
export async function awaitInitialSync(
  watchers: readonly SyncableWatcher[],
  options: InitialSyncOptions,
): Promise<ReadinessReport> {
  const wait = new AbortController();
  const onAbort = (): void => wait.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });
  if (options.signal?.aborted) {
    wait.abort();
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new HeraldError(CACHE_SYNC_TIMEOUT_MESSAGE, ErrorCode.CACHE_SYNC_TIMEOUT, { timeoutMs: options.timeoutMs }));
    }, options.timeoutMs);
  });

  try {
    await Promise.race([Promise.all(watchers.map((watcher) => watcher.whenSynced(wait.signal))), timeout]);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
    wait.abort();
  }

  const missing = watchers
    .filter((watcher) => watcher.list().length === 0)
    .map((watcher) => watcher.identity.displayName);

  if (missing.length > 0) {
    logger.warn(missingResourcesMessage(missing));
  } else {
    logger.debug('Caches synced');
  }

  return { missing };
}
