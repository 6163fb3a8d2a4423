/**
 * Service Registry
 *
 * Maps a service type, the `<type>` in `service.<type>[.<name>]`, to the
 * factory that builds it. The snapshot validator consults it to reject
 * unknown types and to build each snapshot's notifier.
 *
 * @module @herald/core/notifier/service-registry
 */

import type { NotificationService, ServiceDefinition } from '@herald/shared';
import { HeraldError, ErrorCode } from '@herald/shared';
import { createWebhookService, type WebhookHttpClient } from './webhook-service.js';

/**
 * Builds a service from its definition. May throw ValidationError for bad options.
 */
export type ServiceFactory = (definition: ServiceDefinition) => NotificationService;

/**
 * Registry of service factories by type
 */
export class ServiceRegistry {
  private readonly factories = new Map<string, ServiceFactory>();

  /**
   * Register a factory for a type
   * @throws HeraldError SERVICE_ALREADY_REGISTERED for a known type
   */
  register(type: string, factory: ServiceFactory): this {
    if (this.factories.has(type)) {
      throw new HeraldError(
        `Service type '${type}' is already registered`,
        ErrorCode.SERVICE_ALREADY_REGISTERED,
        { resourceType: 'serviceType', resourceId: type },
      );
    }
    this.factories.set(type, factory);
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  get types(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Build a service for a definition of a registered type
   */
  create(definition: ServiceDefinition): NotificationService {
    const factory = this.factories.get(definition.type);
    if (!factory) {
      throw new HeraldError(
        `Unknown service type '${definition.type}'`,
        ErrorCode.INVALID_INPUT,
        { resourceType: 'serviceType', resourceId: definition.type },
      );
    }
    return factory(definition);
  }
}

/**
 * Options for the default registry
 */
export interface DefaultServiceRegistryOptions {
  /** HTTP client used by webhook services */
  http?: WebhookHttpClient;
}

/**
 * Create a registry with the built-in service types
 */
export function createDefaultServiceRegistry(options: DefaultServiceRegistryOptions = {}): ServiceRegistry {
  return new ServiceRegistry().register('webhook', (definition) => createWebhookService(definition, options.http));
}
