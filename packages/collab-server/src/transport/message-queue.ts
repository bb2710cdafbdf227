import { Deferred } from '../deferred.js';

/**
 * Unbounded FIFO between a socket's message events and the task consuming
 * them.
 *
 * `close()` enqueues the end of the stream: consumers receive the messages
 * pushed before it, then `null` from {@link next} (or the end of `for
 * await`). Messages pushed after `close()` are dropped.
 */
export class MessageQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Deferred<T | null>[] = [];
  private closed = false;

  /** Messages waiting to be consumed */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Next message, or null once the queue is closed and drained
   */
  next(): Promise<T | null> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      return Promise.resolve(item === undefined ? null : item);
    }
    if (this.closed) return Promise.resolve(null);

    const waiter = new Deferred<T | null>();
    this.waiters.push(waiter);
    return waiter.promise;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.next();
      if (item === null) return;
      yield item;
    }
  }
}
