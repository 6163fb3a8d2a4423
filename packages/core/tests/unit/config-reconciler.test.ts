/**
 * Unit tests for ConfigReconciler
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';

import { ConfigReconciler } from '../../src/services/config-reconciler.js';
import { PartialStateMerger, type FatalHandler } from '../../src/services/partial-state-merger.js';
import { ResourceWatcher } from '../../src/services/resource-watcher.js';
import { WorkerLifecycleManager } from '../../src/services/worker-lifecycle-manager.js';
import { createReconcilerStore, type ReconcilerStore } from '../../src/stores/reconciler-store.js';
import { ErrorCode } from '@herald/shared';
import {
  FakeInformer,
  VALID_SECRETS,
  VALID_SETTINGS,
  createFakeWorkerFactory,
  flush,
  watched,
} from '../helpers/fakes.js';

const CM = 'herald-notifications-cm';
const SECRET = 'herald-notifications-secret';

describe('ConfigReconciler', () => {
  let settingsInformer: FakeInformer;
  let secretsInformer: FakeInformer;
  let fake: ReturnType<typeof createFakeWorkerFactory>;
  let lifecycle: WorkerLifecycleManager;
  let onFatal: Mock<FatalHandler>;
  let store: ReconcilerStore;
  let reconciler: ConfigReconciler;

  beforeEach(() => {
    settingsInformer = new FakeInformer();
    secretsInformer = new FakeInformer();
    fake = createFakeWorkerFactory();
    lifecycle = new WorkerLifecycleManager({ factory: fake.factory, namespace: 'team-a', selector: '', concurrency: 1 });
    onFatal = vi.fn<FatalHandler>();
    store = createReconcilerStore();

    reconciler = new ConfigReconciler({
      settingsWatcher: new ResourceWatcher({ kind: 'settings', name: CM, namespace: 'team-a', informer: settingsInformer }),
      secretsWatcher: new ResourceWatcher({ kind: 'secrets', name: SECRET, namespace: 'team-a', informer: secretsInformer }),
      merger: new PartialStateMerger({ lifecycle, onFatal, store }),
      lifecycle,
      syncTimeoutMs: 1000,
      store,
    });
  });

  afterEach(async () => {
    await reconciler.stop();
  });

  it('starts a worker once both resources are listed', async () => {
    const starting = reconciler.start();
    settingsInformer.sync([watched(CM, VALID_SETTINGS)]);
    secretsInformer.sync([watched(SECRET, VALID_SECRETS)]);

    await expect(starting).resolves.toEqual({ missing: [] });
    await flush();

    expect(lifecycle.state).toBe('running');
    expect(fake.factory).toHaveBeenCalledTimes(1);
    expect(store.toStatus()).toMatchObject({ phase: 'running', synced: { settings: true, secrets: true } });
  });

  it('waits for a missing resource, then starts when it appears', async () => {
    const starting = reconciler.start();
    settingsInformer.sync([watched(CM, VALID_SETTINGS)]);
    secretsInformer.sync();

    await expect(starting).resolves.toEqual({ missing: [`secret ${SECRET}`] });
    await flush();
    expect(lifecycle.state).toBe('idle');
    expect(store.state.phase).toBe('waiting');

    secretsInformer.add(watched(SECRET, VALID_SECRETS));
    await flush();

    expect(lifecycle.state).toBe('running');
    expect(store.state.phase).toBe('running');
  });

  it('restarts the worker when a resource changes', async () => {
    const starting = reconciler.start();
    settingsInformer.sync([watched(CM, VALID_SETTINGS)]);
    secretsInformer.sync([watched(SECRET, VALID_SECRETS)]);
    await starting;
    await flush();

    settingsInformer.update(watched(CM, { ...VALID_SETTINGS, context: 'env: prod\n' }, '2'));
    await flush(10);

    expect(lifecycle.generation).toBe(2);
    expect(fake.tracker.log).toEqual(['construct:1', 'init:1', 'run:1:1', 'stop:1', 'construct:2', 'init:2', 'run:2:1']);
  });

  it('rejects with CACHE_SYNC_TIMEOUT when a watcher never syncs', async () => {
    reconciler = new ConfigReconciler({
      settingsWatcher: new ResourceWatcher({ kind: 'settings', name: CM, namespace: 'team-a', informer: settingsInformer }),
      secretsWatcher: new ResourceWatcher({ kind: 'secrets', name: SECRET, namespace: 'team-a', informer: secretsInformer }),
      merger: new PartialStateMerger({ lifecycle, onFatal }),
      lifecycle,
      syncTimeoutMs: 10,
    });

    const starting = reconciler.start();
    settingsInformer.sync();

    await expect(starting).rejects.toMatchObject({ code: ErrorCode.CACHE_SYNC_TIMEOUT });
  });

  it('refuses to start twice', async () => {
    const starting = reconciler.start();
    await expect(reconciler.start()).rejects.toThrow('Reconciler already started');
    settingsInformer.sync();
    secretsInformer.sync();
    await starting;
  });

  it('stops watchers and the worker', async () => {
    const starting = reconciler.start();
    settingsInformer.sync([watched(CM, VALID_SETTINGS)]);
    secretsInformer.sync([watched(SECRET, VALID_SECRETS)]);
    await starting;
    await flush();

    await reconciler.stop();

    expect(settingsInformer.stopped).toBe(true);
    expect(secretsInformer.stopped).toBe(true);
    expect(lifecycle.state).toBe('idle');
    expect(store.state.phase).toBe('stopped');
    expect(reconciler.isRunning).toBe(false);
  });
});
