/**
 * Unit tests for PartialStateMerger
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';

import {
  PartialStateMerger,
  PARSE_FAILURE_MESSAGE,
  START_FAILURE_MESSAGE,
  type FatalHandler,
} from '../../src/services/partial-state-merger.js';
import { createReconcilerStore } from '../../src/stores/reconciler-store.js';
import {
  ErrorCode,
  EventChannel,
  ValidationError,
  WorkerError,
  noopMetrics,
  toResourceUpdate,
} from '@herald/shared';
import type { ConfigSnapshot, ControllerMetrics, NotificationService, ResourceUpdate } from '@herald/shared';
import { INVALID_SETTINGS, VALID_SECRETS, VALID_SETTINGS } from '../helpers/fakes.js';

const settings = (payload = VALID_SETTINGS): ResourceUpdate => toResourceUpdate('settings', 'added', payload);
const secrets = (payload = VALID_SECRETS): ResourceUpdate => toResourceUpdate('secrets', 'added', payload);

describe('PartialStateMerger', () => {
  let applied: ConfigSnapshot[];
  let apply: Mock<(snapshot: ConfigSnapshot) => Promise<void>>;
  let onFatal: Mock<FatalHandler>;
  let metrics: ControllerMetrics;
  let merger: PartialStateMerger;

  beforeEach(() => {
    applied = [];
    apply = vi.fn(async (snapshot: ConfigSnapshot) => {
      applied.push(snapshot);
    });
    onFatal = vi.fn<FatalHandler>();
    metrics = { ...noopMetrics, recordReload: vi.fn(), setGeneration: vi.fn() };
    merger = new PartialStateMerger({ lifecycle: { apply }, onFatal, metrics });
  });

  describe('merging', () => {
    it('does not apply until both payloads are present', async () => {
      await merger.onUpdate(settings());
      await merger.onUpdate(settings());

      expect(apply).not.toHaveBeenCalled();
      expect(merger.hasPayload('settings')).toBe(true);
      expect(merger.hasPayload('secrets')).toBe(false);
      expect(merger.lastGeneration).toBe(0);
    });

    it('applies once the second payload arrives, in either order', async () => {
      await merger.onUpdate(secrets());
      expect(apply).not.toHaveBeenCalled();
      await merger.onUpdate(settings());

      expect(apply).toHaveBeenCalledTimes(1);
      expect(applied[0]?.generation).toBe(1);
      expect(metrics.recordReload).toHaveBeenCalledWith('applied');
      expect(metrics.setGeneration).toHaveBeenCalledWith(1);
    });

    it('treats an empty payload as present', async () => {
      await merger.onUpdate(settings({}));
      await merger.onUpdate(secrets({}));
      expect(apply).toHaveBeenCalledTimes(1);
    });

    it('applies again on every later update, including identical ones', async () => {
      await merger.onUpdate(settings());
      await merger.onUpdate(secrets());
      await merger.onUpdate(secrets());
      await merger.onUpdate(settings());

      expect(applied.map((s) => s.generation)).toEqual([1, 2, 3]);
    });

    it('keeps the other payload when one kind updates', async () => {
      await merger.onUpdate(settings());
      await merger.onUpdate(secrets());
      await merger.onUpdate(secrets({ 'webhook-token': 'rotated-secret' }));

      expect(applied[1]?.services.get('ops')?.options).toEqual({
        url: 'https://hooks.test/notify',
        headers: { Authorization: 'rotated-secret' },
      });
    });

    it('serializes concurrent updates in arrival order', async () => {
      const order: number[] = [];
      apply.mockImplementation(async (snapshot: ConfigSnapshot) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push(snapshot.generation);
      });

      await merger.onUpdate(settings());
      await Promise.all([merger.onUpdate(secrets()), merger.onUpdate(secrets()), merger.onUpdate(secrets())]);

      expect(order).toEqual([1, 2, 3]);
    });
  });

  describe('inspection sink', () => {
    it('attaches the sink and seals the notifier before apply', async () => {
      const sink: NotificationService = { send: vi.fn() };
      merger = new PartialStateMerger({ lifecycle: { apply }, onFatal, inspectionSink: () => sink });

      await merger.onUpdate(settings());
      await merger.onUpdate(secrets());

      const snapshot = applied[0];
      expect(snapshot?.notifier.getService('console')).toBe(sink);
      expect(snapshot?.notifier.sealed).toBe(true);
      expect(snapshot?.notifier.serviceNames).toEqual(['ops', 'console']);
    });

    it('gives every snapshot its own sink', async () => {
      const inspectionSink = vi.fn((): NotificationService => ({ send: vi.fn() }));
      merger = new PartialStateMerger({ lifecycle: { apply }, onFatal, inspectionSink });

      await merger.onUpdate(settings());
      await merger.onUpdate(secrets());
      await merger.onUpdate(secrets());

      expect(inspectionSink).toHaveBeenCalledTimes(2);
    });
  });

  describe('failures', () => {
    it('treats a validation failure as fatal and builds nothing', async () => {
      await merger.onUpdate(settings(INVALID_SETTINGS));
      await merger.onUpdate(secrets());

      expect(apply).not.toHaveBeenCalled();
      expect(onFatal).toHaveBeenCalledTimes(1);
      const [message, error] = onFatal.mock.calls[0] ?? [];
      expect(message).toBe(PARSE_FAILURE_MESSAGE);
      expect(error).toBeInstanceOf(ValidationError);
      expect(metrics.recordReload).toHaveBeenCalledWith('invalid');
      expect(merger.isHalted).toBe(true);
    });

    it('stops merging after a fatal failure', async () => {
      await merger.onUpdate(settings(INVALID_SETTINGS));
      await merger.onUpdate(secrets());
      await merger.onUpdate(settings());

      expect(apply).not.toHaveBeenCalled();
      expect(onFatal).toHaveBeenCalledTimes(1);
    });

    it('treats an apply failure as fatal', async () => {
      apply.mockRejectedValueOnce(WorkerError.initFailed(1, new Error('boom')));

      await merger.onUpdate(settings());
      await merger.onUpdate(secrets());

      expect(onFatal).toHaveBeenCalledWith(START_FAILURE_MESSAGE, expect.objectContaining({ code: ErrorCode.WORKER_INIT_FAILED }));
      expect(metrics.recordReload).toHaveBeenCalledWith('failed');
    });

    it('skips stale snapshots without halting', async () => {
      apply.mockRejectedValueOnce(WorkerError.staleSnapshot(1, 1));

      await merger.onUpdate(settings());
      await merger.onUpdate(secrets());
      await merger.onUpdate(secrets());

      expect(onFatal).not.toHaveBeenCalled();
      expect(apply).toHaveBeenCalledTimes(2);
    });

    it('treats an unclassified apply error as fatal', async () => {
      const error = new Error('socket closed');
      apply.mockRejectedValueOnce(error);

      await merger.onUpdate(settings());
      await merger.onUpdate(secrets());

      expect(onFatal).toHaveBeenCalledWith(START_FAILURE_MESSAGE, error);
    });
  });

  describe('store', () => {
    it('records presence, applies and failures', async () => {
      const store = createReconcilerStore();
      merger = new PartialStateMerger({ lifecycle: { apply }, onFatal, store });

      await merger.onUpdate(settings());
      expect(store.missingResources.value).toEqual(['secrets']);

      await merger.onUpdate(secrets());
      expect(store.state.generation).toBe(1);
      expect(store.isReady.value).toBe(true);
    });

    it('records the fatal message', async () => {
      const store = createReconcilerStore();
      merger = new PartialStateMerger({ lifecycle: { apply }, onFatal, store });

      await merger.onUpdate(settings(INVALID_SETTINGS));
      await merger.onUpdate(secrets());

      expect(store.state.phase).toBe('failed');
      expect(store.state.lastError).toBe(
        "Failed to parse new settings: trigger.on-deployed[0].send: template 'missing-template' is not defined",
      );
    });
  });

  describe('consume', () => {
    it('processes each stream event in order', async () => {
      const channel = new EventChannel<ResourceUpdate>();
      const consuming = merger.consume(channel);

      channel.push(settings());
      channel.push(secrets());
      channel.push(secrets());
      await new Promise((resolve) => setTimeout(resolve, 5));
      channel.close();
      await consuming;

      expect(applied.map((s) => s.generation)).toEqual([1, 2]);
    });
  });
});
