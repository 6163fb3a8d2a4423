/**
 * Unit tests for the default worker
 */

import { describe, it, expect } from 'vitest';
import {
  ConsoleService,
  ServiceRegistry,
  attachInspectionSink,
  validateSnapshot,
} from '@herald/core';
import type { ConfigSnapshot, NotificationService, RawResourcePayload } from '@herald/shared';
import { noopMetrics } from '@herald/shared';
import {
  CONFIG_APPLIED_MESSAGE,
  DefaultWorker,
  notificationsFor,
  recipientsFor,
} from '../../src/worker/default-worker.js';

const ANNOUNCING_SETTINGS: RawResourcePayload = {
  'template.config-applied': 'title: Herald\nmessage: Configuration is live.\n',
  'trigger.on-config-applied': "- when: 'true'\n  send: [config-applied]\n",
  subscriptions: '- recipients: ["console:ops"]\n  triggers: [on-config-applied]\n',
};

function buildSnapshot(settings: RawResourcePayload, registry = new ServiceRegistry()): { snapshot: ConfigSnapshot; lines: string[] } {
  const result = validateSnapshot(settings, {}, { generation: 1, registry });
  if (!result.valid) {
    throw result.error;
  }
  const lines: string[] = [];
  attachInspectionSink(result.value.notifier, new ConsoleService({ write: (chunk: string) => lines.push(chunk) }));
  return { snapshot: result.value, lines };
}

function createWorker(snapshot: ConfigSnapshot): DefaultWorker {
  return new DefaultWorker(snapshot, { namespace: 'team-a', selector: '', metrics: noopMetrics });
}

describe('recipientsFor', () => {
  it('returns recipients of subscriptions naming the trigger', () => {
    const { snapshot } = buildSnapshot(ANNOUNCING_SETTINGS);
    expect(recipientsFor(snapshot, 'on-config-applied')).toEqual([{ service: 'console', destination: 'ops' }]);
  });

  it('applies default triggers to subscriptions that list none', () => {
    const { snapshot } = buildSnapshot({
      ...ANNOUNCING_SETTINGS,
      subscriptions: '- recipients: ["console:all"]\n- recipients: ["console:ops"]\n  triggers: [on-config-applied]\n',
      defaultTriggers: '[on-config-applied]\n',
    });

    expect(recipientsFor(snapshot, 'on-config-applied')).toEqual([
      { service: 'console', destination: 'all' },
      { service: 'console', destination: 'ops' },
    ]);
  });

  it('returns nothing when nobody subscribes', () => {
    const { snapshot } = buildSnapshot({});
    expect(recipientsFor(snapshot, 'on-config-applied')).toEqual([]);
  });
});

describe('notificationsFor', () => {
  it('uses the templates named by the trigger', () => {
    const { snapshot } = buildSnapshot(ANNOUNCING_SETTINGS);
    expect(notificationsFor(snapshot, 'on-config-applied', CONFIG_APPLIED_MESSAGE)).toEqual([
      { title: 'Herald', message: 'Configuration is live.' },
    ]);
  });

  it('falls back to a plain message for an unknown trigger', () => {
    const { snapshot } = buildSnapshot({});
    expect(notificationsFor(snapshot, 'on-config-applied', CONFIG_APPLIED_MESSAGE)).toEqual([
      { message: 'configuration applied' },
    ]);
  });
});

describe('DefaultWorker', () => {
  it('announces the configuration once and stops on abort', async () => {
    const { snapshot, lines } = buildSnapshot(ANNOUNCING_SETTINGS);
    const worker = createWorker(snapshot);
    const controller = new AbortController();

    await worker.initialize(controller.signal);
    const running = worker.run(controller.signal, 2);
    await new Promise((resolve) => setTimeout(resolve, 5));
    controller.abort();
    await running;

    expect(lines).toEqual(['[ops] Herald: Configuration is live.\n']);
  });

  it('keeps delivering after a service fails', async () => {
    const registry = new ServiceRegistry().register('broken', () => ({
      send: () => Promise.reject(new Error('unreachable')),
    }));
    const { snapshot, lines } = buildSnapshot(
      {
        ...ANNOUNCING_SETTINGS,
        'service.broken': '{}\n',
        subscriptions: '- recipients: ["broken:x", "console:ops"]\n  triggers: [on-config-applied]\n',
      },
      registry,
    );

    await createWorker(snapshot).announce();

    expect(lines).toEqual(['[ops] Herald: Configuration is live.\n']);
  });

  it('stops announcing when aborted mid-delivery', async () => {
    const sent: string[] = [];
    const pending: NotificationService = {
      send: (_notification, destination, options) => {
        sent.push(destination);
        return new Promise<void>((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
      },
    };
    const { snapshot, lines } = buildSnapshot(
      {
        ...ANNOUNCING_SETTINGS,
        'service.pending': '{}\n',
        subscriptions: '- recipients: ["pending:a", "pending:b", "pending:c"]\n  triggers: [on-config-applied]\n',
      },
      new ServiceRegistry().register('pending', () => pending),
    );
    const controller = new AbortController();

    const running = createWorker(snapshot).run(controller.signal, 1);
    controller.abort();
    await running;

    expect(sent).toEqual(['a']);
    expect(lines).toEqual([]);
  });
});
