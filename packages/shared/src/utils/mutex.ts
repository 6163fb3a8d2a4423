/**
 * Mutex
 * @module @herald/shared/utils/mutex
 */

/**
 * Promise-based mutual exclusion. Callers run one at a time in the order
 * they asked for the lock.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /**
   * Whether some caller holds or waits for the lock
   */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  /**
   * Run `fn` while holding the lock. The lock is released when `fn`
   * settles, whether it resolves or throws.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.holders++;

    await previous;
    try {
      return await fn();
    } finally {
      this.holders--;
      release();
    }
  }
}
