/**
 * Webhook notification service
 *
 * Posts notifications as JSON to a configured URL:
 *
 * ```yaml
 * service.webhook.ops: |
 *   url: https://hooks.example.com/notify
 *   headers:
 *     Authorization: $webhook-token
 *   timeoutMs: 5000
 * ```
 *
 * @module @herald/core/notifier/webhook-service
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type {
  Notification,
  NotificationService,
  SendOptions,
  ServiceDefinition,
  ValidationErrorDetail,
} from '@herald/shared';
import { ValidationError } from '@herald/shared';

/**
 * The part of an axios instance the service uses
 */
export type WebhookHttpClient = Pick<AxiosInstance, 'post'>;

/**
 * Validated webhook options
 */
export interface WebhookOptions {
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * Body posted for each notification
 */
export interface WebhookPayload {
  destination: string;
  title?: string;
  message: string;
}

const DEFAULT_TIMEOUT_MS = 10_000;

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Settings key a service definition came from
 */
export function serviceKey(definition: ServiceDefinition): string {
  return definition.name === definition.type
    ? `service.${definition.type}`
    : `service.${definition.type}.${definition.name}`;
}

/**
 * Validate the options of a webhook service definition
 * @throws ValidationError listing every invalid option
 */
export function parseWebhookOptions(field: string, options: Readonly<Record<string, unknown>>): WebhookOptions {
  const errors: ValidationErrorDetail[] = [];
  const { url, headers, timeoutMs } = options;

  if (typeof url !== 'string' || url.length === 0) {
    errors.push({ field: `${field}.url`, message: 'Webhook url is required', code: 'REQUIRED' });
  } else if (!isHttpUrl(url)) {
    errors.push({ field: `${field}.url`, message: 'Webhook url must be an http(s) URL', code: 'INVALID_FORMAT' });
  }

  const parsedHeaders: Record<string, string> = {};
  if (headers !== undefined) {
    if (typeof headers !== 'object' || headers === null || Array.isArray(headers)) {
      errors.push({ field: `${field}.headers`, message: 'Headers must be a map of strings', code: 'INVALID_TYPE' });
    } else {
      for (const [name, value] of Object.entries(headers)) {
        if (typeof value === 'string') {
          parsedHeaders[name] = value;
        } else {
          errors.push({ field: `${field}.headers.${name}`, message: 'Header values must be strings', code: 'INVALID_TYPE' });
        }
      }
    }
  }

  if (timeoutMs !== undefined && (typeof timeoutMs !== 'number' || timeoutMs <= 0)) {
    errors.push({ field: `${field}.timeoutMs`, message: 'Timeout must be a positive number', code: 'OUT_OF_RANGE' });
  }

  if (errors.length > 0 || typeof url !== 'string') {
    throw ValidationError.multiple(errors);
  }

  return {
    url,
    headers: parsedHeaders,
    timeoutMs: typeof timeoutMs === 'number' ? timeoutMs : DEFAULT_TIMEOUT_MS,
  };
}

/**
 * Sends notifications to an HTTP endpoint
 */
export class WebhookService implements NotificationService {
  constructor(
    private readonly options: WebhookOptions,
    private readonly http: WebhookHttpClient = axios,
  ) {}

  async send(notification: Notification, destination: string, options: SendOptions = {}): Promise<void> {
    const payload: WebhookPayload = { destination, message: notification.message };
    if (notification.title) {
      payload.title = notification.title;
    }
    await this.http.post(this.options.url, payload, {
      headers: this.options.headers,
      timeout: this.options.timeoutMs,
      signal: options.signal,
    });
  }
}

/**
 * Build a webhook service from its definition
 */
export function createWebhookService(definition: ServiceDefinition, http?: WebhookHttpClient): WebhookService {
  return new WebhookService(parseWebhookOptions(serviceKey(definition), definition.options), http);
}
