/**
 * Utilities
 * @module @herald/shared/utils
 */

export { EventChannel } from './event-channel.js';
export { Mutex } from './mutex.js';
export { sleep } from './sleep.js';
export { FrozenMap } from './frozen-map.js';
