/**
 * Service Notifier
 *
 * Holds the notification services of one configuration snapshot and routes
 * notifications to them by recipient.
 *
 * @module @herald/core/notifier/service-notifier
 */

import type {
  Notification,
  NotificationService,
  Notifier,
  Recipient,
  SendOptions,
} from '@herald/shared';
import { HeraldError, ErrorCode, INSPECTION_SERVICE_NAME } from '@herald/shared';

/**
 * Notifier backed by a name → service map
 */
export class ServiceNotifier implements Notifier {
  private readonly services = new Map<string, NotificationService>();
  private isSealed = false;

  /**
   * Register a service.
   * @throws HeraldError SERVICE_ALREADY_REGISTERED for a name already in use
   * @throws HeraldError NOTIFIER_SEALED once the notifier is sealed
   */
  addService(name: string, service: NotificationService): void {
    if (this.isSealed) {
      throw new HeraldError(
        `Cannot register service '${name}': notifier is sealed`,
        ErrorCode.NOTIFIER_SEALED,
        { resourceType: 'service', resourceId: name },
      );
    }
    if (this.services.has(name)) {
      throw new HeraldError(
        `Service '${name}' is already registered`,
        ErrorCode.SERVICE_ALREADY_REGISTERED,
        { resourceType: 'service', resourceId: name },
      );
    }
    this.services.set(name, service);
  }

  getService(name: string): NotificationService | undefined {
    return this.services.get(name);
  }

  get serviceNames(): string[] {
    return [...this.services.keys()];
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  seal(): void {
    this.isSealed = true;
  }

  async send(notification: Notification, recipient: Recipient, options?: SendOptions): Promise<void> {
    const service = this.services.get(recipient.service);
    if (!service) {
      throw new HeraldError(
        `Notification service '${recipient.service}' is not registered`,
        ErrorCode.INVALID_INPUT,
        { resourceType: 'service', resourceId: recipient.service },
      );
    }
    await service.send(notification, recipient.destination, options);
  }
}

/**
 * Register the inspection sink under its reserved name and seal the notifier.
 * Called exactly once per valid snapshot.
 */
export function attachInspectionSink(notifier: Notifier, sink: NotificationService): void {
  notifier.addService(INSPECTION_SERVICE_NAME, sink);
  notifier.seal();
}
