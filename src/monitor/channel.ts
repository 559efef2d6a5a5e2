/**
 * Bounded notification channel
 */

import { ValidationError } from "../utils/errors.js";

/**
 * Queue between the watcher callbacks and whoever presents changes.
 *
 * Producers never block: when the channel is full the oldest pending item
 * is dropped and counted. Consumers either `drain()` on their own schedule
 * or iterate with `for await`, which ends once the channel is closed and
 * empty.
 */
export class NotificationChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: ((result: IteratorResult<T>) => void)[] = [];
  private droppedCount = 0;
  private isClosed = false;

  constructor(readonly capacity: number = 256) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError(`Channel capacity must be a positive integer, got ${capacity}`, {
        field: "capacity",
      });
    }
  }

  /**
   * Items waiting to be consumed
   */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Items discarded because the channel was full
   */
  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueue an item. Returns false when the channel is closed.
   */
  push(item: T): boolean {
    if (this.isClosed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
    }
    this.buffer.push(item);
    return true;
  }

  /**
   * Take every pending item
   */
  drain(): T[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  /**
   * Wait for the next item; resolves done once closed and empty
   */
  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stop accepting items and release pending consumers. Buffered items can
   * still be drained.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
