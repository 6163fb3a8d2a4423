/**
 * Console notification service
 *
 * The built-in inspection sink. Every valid snapshot carries one under the
 * reserved `console` name, so operators can subscribe `console:<anything>`
 * to see what the worker would send.
 *
 * @module @herald/core/notifier/console-service
 */

import type { Notification, NotificationService } from '@herald/shared';

/**
 * Minimal writable target
 */
export interface LineWriter {
  write(chunk: string): unknown;
}

/**
 * Format a notification as one line
 */
export function formatNotification(notification: Notification, destination: string): string {
  const target = destination ? `[${destination}] ` : '';
  const title = notification.title ? `${notification.title}: ` : '';
  return `${target}${title}${notification.message}\n`;
}

/**
 * Writes each notification as one line to a stream
 */
export class ConsoleService implements NotificationService {
  constructor(private readonly out: LineWriter = process.stdout) {}

  async send(notification: Notification, destination: string): Promise<void> {
    this.out.write(formatNotification(notification, destination));
  }
}
