/**
 * @file async-queue.ts
 * @brief Unbounded FIFO with awaitable consumption
 *
 * Any number of producers may `put`; consumers `await get()`. Items are
 * handed out strictly in insertion order. Once closed, `get` drains what is
 * left and then resolves `undefined`.
 */

import { ErrorCodes, ProxyError } from '../errors.js';

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  /**
   * Append an item, waking the oldest waiting consumer if there is one
   *
   * @throws ProxyError if the queue has been closed
   */
  put(item: T): void {
    if (this.closed) {
      throw new ProxyError('Queue is closed', ErrorCodes.QUEUE_CLOSED);
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  /**
   * Take the next item, waiting for one if the queue is empty
   *
   * @returns The next item, or undefined once the queue is closed and drained
   */
  get(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Take the next item without waiting
   */
  getNowait(): T | undefined {
    return this.items.shift();
  }

  /**
   * Stop accepting items. Pending consumers are released with undefined.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }
}
