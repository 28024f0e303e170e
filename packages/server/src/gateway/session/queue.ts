// packages/server/src/gateway/session/queue.ts

/**
 * Bounded FIFO for outbound frames.
 * At capacity the oldest entry is evicted and counted.
 */
export class OutboundQueue<T> {
  private items: T[] = [];
  private dropped = 0;

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new RangeError(`Queue capacity must be at least 1, got ${capacity}`);
    }
  }

  /** Append; returns the evicted item when the queue was full */
  push(item: T): T | undefined {
    let evicted: T | undefined;
    if (this.items.length >= this.capacity) {
      evicted = this.items.shift();
      this.dropped++;
    }
    this.items.push(item);
    return evicted;
  }

  /** Drop every queued item matching the predicate; returns how many went. Not counted as dropped. */
  remove(predicate: (item: T) => boolean): number {
    const before = this.items.length;
    this.items = this.items.filter((item) => !predicate(item));
    return before - this.items.length;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  get size(): number {
    return this.items.length;
  }

  /** Items evicted since creation */
  get droppedTotal(): number {
    return this.dropped;
  }

  clear(): T[] {
    const removed = this.items;
    this.items = [];
    return removed;
  }
}
