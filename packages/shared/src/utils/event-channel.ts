/**
 * Event Channel
 * @module @herald/shared/utils/event-channel
 *
 * An unbounded, single-consumer queue that can be read with `for await`.
 * Producers push without waiting; the consumer drains items in push order.
 */

/**
 * Async iterable queue of events
 */
export class EventChannel<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  /**
   * Number of items waiting to be read
   */
  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue an item. Returns false when the channel is closed.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  /**
   * Close the channel. Pending reads finish; buffered items are dropped.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.buffer.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  /**
   * Read the next item, or a done result once closed
   */
  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Iterate until the channel closes or the signal aborts.
   * Aborting closes the channel.
   */
  async *stream(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    if (signal?.aborted) {
      this.close();
      return;
    }
    const onAbort = (): void => this.close();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      for (;;) {
        const result = await this.next();
        if (result.done) {
          return;
        }
        yield result.value;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.stream();
  }
}
