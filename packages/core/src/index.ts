/**
 * Herald Core Package
 * Reconciliation pipeline: watchers, merger, validator, worker lifecycle
 * @module @herald/core
 */

// Services
export * from './services/index.js';

// Notifier and notification services
export * from './notifier/index.js';

// Reactive stores
export * from './stores/index.js';
