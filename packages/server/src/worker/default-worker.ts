/**
 * Default worker
 *
 * A worker shell for deployments that do not embed their own: it reports
 * the configuration it was built from, announces it to the recipients of
 * the `on-config-applied` trigger and keeps its processors idle until
 * stopped.
 *
 * @module @herald/server/worker/default-worker
 */

import type {
  ConfigSnapshot,
  Notification,
  Recipient,
  Worker,
  WorkerFactory,
  WorkerOptions,
} from '@herald/shared';
import { createServiceLogger, sleep, summarizeSnapshot, toError, type Logger } from '@herald/shared';

export const CONFIG_APPLIED_TRIGGER = 'on-config-applied';
export const CONFIG_APPLIED_MESSAGE = 'configuration applied';

const IDLE_INTERVAL_MS = 1000;

/**
 * Recipients subscribed to a trigger, either by name or through the
 * default triggers when the subscription lists none
 */
export function recipientsFor(snapshot: ConfigSnapshot, trigger: string): Recipient[] {
  const isDefault = snapshot.defaultTriggers.includes(trigger);
  const recipients: Recipient[] = [];
  for (const subscription of snapshot.subscriptions) {
    const subscribed =
      subscription.triggers.includes(trigger) || (subscription.triggers.length === 0 && isDefault);
    if (subscribed) {
      recipients.push(...subscription.recipients);
    }
  }
  return recipients;
}

/**
 * Notifications sent by a trigger: one per template its conditions name,
 * or a plain message when it names none
 */
export function notificationsFor(snapshot: ConfigSnapshot, trigger: string, fallback: string): Notification[] {
  const names = new Set(snapshot.triggers.get(trigger)?.conditions.flatMap((condition) => condition.send) ?? []);
  const notifications: Notification[] = [];
  for (const name of names) {
    const template = snapshot.templates.get(name);
    if (template) {
      notifications.push({ title: template.title, message: template.message });
    }
  }
  return notifications.length > 0 ? notifications : [{ message: fallback }];
}

export class DefaultWorker implements Worker {
  private readonly snapshot: ConfigSnapshot;
  private readonly logger: Logger;

  constructor(snapshot: ConfigSnapshot, options: WorkerOptions) {
    this.snapshot = snapshot;
    this.logger = createServiceLogger({ component: 'worker' }, {
      generation: snapshot.generation,
      namespace: options.namespace,
      selector: options.selector,
    });
  }

  async initialize(_signal: AbortSignal): Promise<void> {
    this.logger.info('Configuration loaded', { ...summarizeSnapshot(this.snapshot) });
  }

  async run(signal: AbortSignal, concurrency: number): Promise<void> {
    await this.announce(signal);
    await Promise.all(Array.from({ length: concurrency }, (_, index) => this.process(index, signal)));
  }

  /**
   * Send the config-applied notifications. Delivery failures are logged;
   * nothing more is sent once the signal aborts.
   */
  async announce(signal?: AbortSignal): Promise<void> {
    const recipients = recipientsFor(this.snapshot, CONFIG_APPLIED_TRIGGER);
    if (recipients.length === 0) {
      return;
    }
    const notifications = notificationsFor(this.snapshot, CONFIG_APPLIED_TRIGGER, CONFIG_APPLIED_MESSAGE);

    for (const recipient of recipients) {
      for (const notification of notifications) {
        if (signal?.aborted) {
          this.logger.debug('Announcement cancelled');
          return;
        }
        try {
          await this.snapshot.notifier.send(notification, recipient, { signal });
        } catch (error) {
          if (signal?.aborted) {
            continue;
          }
          this.logger.warn('Failed to send notification', {
            service: recipient.service,
            destination: recipient.destination,
            error: toError(error).message,
          });
        }
      }
    }
  }

  private async process(index: number, signal: AbortSignal): Promise<void> {
    this.logger.debug('Processor started', { processor: index });
    while (!signal.aborted) {
      await sleep(IDLE_INTERVAL_MS, signal);
    }
    this.logger.debug('Processor stopped', { processor: index });
  }
}

export const createDefaultWorker: WorkerFactory = (snapshot, options) => new DefaultWorker(snapshot, options);
