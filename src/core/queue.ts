/**
 * BlockingQueue: FIFO queue with blocking pop for async consumers.
 *
 * Consumers waiting on an empty queue park in a FIFO waiter list and are
 * woken by the producer (condition signalling, no polling). Closing the
 * queue is the end-of-input signal: once the buffered items are drained,
 * every pending and future pop() resolves to QUEUE_CLOSED.
 */

export const QUEUE_CLOSED: unique symbol = Symbol('queue.closed');

export type QueueClosed = typeof QUEUE_CLOSED;

export class BlockingQueue<T> {
  private items: T[] = [];
  private waiters: Array<(value: T | QueueClosed) => void> = [];
  private closed = false;

  /**
   * Append an item, handing it straight to the oldest waiter if one is parked.
   * Returns false when the queue is already closed and the item was dropped.
   */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Take the next item, waiting until one arrives or the queue is closed.
   */
  pop(): Promise<T | QueueClosed> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(QUEUE_CLOSED);
    }

    return new Promise<T | QueueClosed>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Take every buffered item without waiting.
   */
  drain(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }

  /**
   * Signal end-of-input. Buffered items stay poppable; parked consumers
   * are released with QUEUE_CLOSED. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(QUEUE_CLOSED);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
