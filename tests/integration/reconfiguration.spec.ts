/**
 * Reconfiguration Integration Tests
 *
 * Drives a full controller (watchers, merger, validator, lifecycle manager)
 * through fake informers and records what the worker factory sees.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type { FatalHandler } from '@herald/core';
import type { RawResourcePayload } from '@herald/shared';
import { createController, resolveControllerConfig, type Controller } from '@herald/server';
import {
  FakeInformer,
  INVALID_SETTINGS,
  VALID_SECRETS,
  VALID_SETTINGS,
  createFakeWorkerFactory,
  flush,
  watched,
} from '../../packages/core/tests/helpers/fakes.js';

const CM = 'herald-notifications-cm';
const SECRET = 'herald-notifications-secret';

describe('reconfiguration', () => {
  let settings: FakeInformer;
  let secrets: FakeInformer;
  let fake: ReturnType<typeof createFakeWorkerFactory>;
  let onFatal: Mock<FatalHandler>;
  let controller: Controller;

  beforeEach(() => {
    settings = new FakeInformer();
    secrets = new FakeInformer();
    fake = createFakeWorkerFactory();
    onFatal = vi.fn<FatalHandler>();
    controller = createController({
      config: resolveControllerConfig({ namespace: 'team-a', syncTimeoutMs: 1000 }, { env: {} }),
      informers: { settings, secrets },
      workerFactory: fake.factory,
      onFatal,
      serveMetrics: false,
    });
  });

  afterEach(async () => {
    await controller.stop();
  });

  async function startWith(settingsPayload?: RawResourcePayload, secretsPayload?: RawResourcePayload) {
    const starting = controller.start();
    settings.sync(settingsPayload ? [watched(CM, settingsPayload)] : []);
    secrets.sync(secretsPayload ? [watched(SECRET, secretsPayload)] : []);
    const report = await starting;
    await flush(10);
    return report;
  }

  function contextOf(index: number): Readonly<Record<string, string>> | undefined {
    return fake.workers[index]?.snapshot.context;
  }

  it('builds no worker from settings alone', async () => {
    const report = await startWith(VALID_SETTINGS);

    settings.update(watched(CM, { ...VALID_SETTINGS, context: 'env: staging\n' }, '2'));
    await flush(10);

    expect(report.missing).toEqual([`secret ${SECRET}`]);
    expect(fake.factory).not.toHaveBeenCalled();
    expect(controller.store.state.phase).toBe('waiting');
  });

  it.each([
    ['settings first', 'settings'],
    ['secrets first', 'secrets'],
  ] as const)('builds exactly one worker with %s', async (_label, first) => {
    const starting = controller.start();
    settings.sync();
    secrets.sync();
    await starting;

    if (first === 'settings') {
      settings.add(watched(CM, VALID_SETTINGS));
      secrets.add(watched(SECRET, VALID_SECRETS));
    } else {
      secrets.add(watched(SECRET, VALID_SECRETS));
      settings.add(watched(CM, VALID_SETTINGS));
    }
    await flush(10);

    expect(fake.factory).toHaveBeenCalledTimes(1);
    expect(fake.workers[0]?.snapshot.generation).toBe(1);
    expect(contextOf(0)).toEqual({ env: 'test' });
    expect(fake.workers[0]?.snapshot.services.get('ops')?.options).toEqual({
      url: 'https://hooks.test/notify',
      headers: { Authorization: 'test-secret' },
    });
  });

  it('merges the latest settings recorded before the secrets arrive', async () => {
    const starting = controller.start();
    settings.sync([watched(CM, VALID_SETTINGS)]);
    secrets.sync();
    await starting;

    settings.update(watched(CM, { ...VALID_SETTINGS, context: 'env: staging\n' }, '2'));
    await flush(10);
    secrets.add(watched(SECRET, VALID_SECRETS));
    await flush(10);

    expect(fake.factory).toHaveBeenCalledTimes(1);
    expect(contextOf(0)).toEqual({ env: 'staging' });
  });

  it('never runs two workers at once and tears down before each replacement', async () => {
    await startWith(VALID_SETTINGS, VALID_SECRETS);

    settings.update(watched(CM, { ...VALID_SETTINGS, context: 'env: one\n' }, '2'));
    settings.update(watched(CM, { ...VALID_SETTINGS, context: 'env: two\n' }, '3'));
    secrets.update(watched(SECRET, { 'webhook-token': 'test-secret-2' }, '2'));
    await flush(30);

    expect(fake.tracker.maxActive).toBe(1);
    expect(fake.tracker.active).toBe(1);
    expect(fake.tracker.log).toEqual([
      'construct:1', 'init:1', 'run:1:1',
      'stop:1', 'construct:2', 'init:2', 'run:2:1',
      'stop:2', 'construct:3', 'init:3', 'run:3:1',
      'stop:3', 'construct:4', 'init:4', 'run:4:1',
    ]);
    expect(contextOf(3)).toEqual({ env: 'two' });
    expect(fake.workers[3]?.snapshot.services.get('ops')?.options).toEqual({
      url: 'https://hooks.test/notify',
      headers: { Authorization: 'test-secret-2' },
    });
  });

  it('treats invalid settings as fatal and keeps the running worker', async () => {
    await startWith(VALID_SETTINGS, VALID_SECRETS);

    settings.update(watched(CM, INVALID_SETTINGS, '2'));
    await flush(10);

    expect(onFatal).toHaveBeenCalledTimes(1);
    expect(onFatal.mock.calls[0]?.[0]).toBe('Failed to parse new settings');
    expect(fake.factory).toHaveBeenCalledTimes(1);
    expect(fake.tracker.log).toEqual(['construct:1', 'init:1', 'run:1:1']);
  });

  it('warns about missing resources and recovers once both appear', async () => {
    const report = await startWith();

    expect(report.missing).toEqual([`config map ${CM}`, `secret ${SECRET}`]);
    expect(onFatal).not.toHaveBeenCalled();
    expect(controller.store.state.phase).toBe('waiting');

    settings.add(watched(CM, VALID_SETTINGS));
    secrets.add(watched(SECRET, VALID_SECRETS));
    await flush(10);

    expect(fake.factory).toHaveBeenCalledTimes(1);
    expect(controller.store.isReady.value).toBe(true);
    expect(controller.store.state.generation).toBe(1);
  });

  it('replaces the worker when an identical update is delivered again', async () => {
    await startWith(VALID_SETTINGS, VALID_SECRETS);

    settings.update(watched(CM, VALID_SETTINGS, '1'));
    await flush(10);

    expect(fake.factory).toHaveBeenCalledTimes(2);
    expect(fake.workers[1]?.snapshot.generation).toBe(2);
    expect(fake.tracker.log).toEqual(['construct:1', 'init:1', 'run:1:1', 'stop:1', 'construct:2', 'init:2', 'run:2:1']);
  });
});
