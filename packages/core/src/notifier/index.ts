/**
 * Notifier module
 * @module @herald/core/notifier
 */

export { ServiceNotifier, attachInspectionSink } from './service-notifier.js';
export { ConsoleService, formatNotification, type LineWriter } from './console-service.js';
export {
  WebhookService,
  parseWebhookOptions,
  createWebhookService,
  serviceKey,
  type WebhookHttpClient,
  type WebhookOptions,
  type WebhookPayload,
} from './webhook-service.js';
export {
  ServiceRegistry,
  createDefaultServiceRegistry,
  type ServiceFactory,
  type DefaultServiceRegistryOptions,
} from './service-registry.js';
