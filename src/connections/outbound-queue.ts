/**
 * Bounded FIFO between the publish path and one connection's writer.
 *
 * `push` is synchronous and never waits: when the queue is full the
 * oldest undelivered droppable item is evicted so a slow client cannot
 * hold up publishers. Items the `droppable` predicate rejects are never
 * evicted; when nothing queued can make room for one, the push is
 * refused. `next` is awaited by the single drain loop of the owning
 * connection.
 */

export const DEFAULT_OUTBOUND_QUEUE_SIZE = 1024;

export interface PushResult {
  /** True when an item (an older one, or this one) was dropped for lack of room */
  dropped: boolean;
  /** Set when the queue is full of undroppable items and this one could not be dropped either */
  refused?: true;
}

export class OutboundQueue<T> {
  private items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private closed = false;

  constructor(
    readonly capacity = DEFAULT_OUTBOUND_QUEUE_SIZE,
    private readonly droppable: (item: T) => boolean = () => true,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`OutboundQueue capacity must be a positive integer (received ${capacity})`);
    }
  }

  push(item: T): PushResult {
    if (this.closed) return { dropped: true };

    // Hand straight to a parked drain loop
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return { dropped: false };
    }

    let dropped = false;
    if (this.items.length >= this.capacity) {
      const oldest = this.items.findIndex(queued => this.droppable(queued));
      if (oldest === -1) {
        return this.droppable(item) ? { dropped: true } : { dropped: false, refused: true };
      }
      this.items.splice(oldest, 1);
      dropped = true;
    }
    this.items.push(item);
    return { dropped };
  }

  /** Resolves with the next item, or undefined once the queue is closed and empty. */
  next(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(undefined);
    if (this.waiter) {
      throw new Error('OutboundQueue supports a single consumer');
    }
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  /** Stop accepting items, discard pending ones and release the consumer. */
  close(): void {
    this.closed = true;
    this.items = [];
    const resolve = this.waiter;
    this.waiter = null;
    resolve?.(undefined);
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
