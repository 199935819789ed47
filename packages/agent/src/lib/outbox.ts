/**
 * Bounded FIFO for recording events produced while the socket is down.
 * When full, the oldest entry is dropped to make room.
 */
export class Outbox<T> {
  private items: T[] = [];

  constructor(private readonly limit: number) {}

  /** Queue an item; returns the entry evicted to make room, if any */
  push(item: T): T | undefined {
    this.items.push(item);
    return this.items.length > this.limit ? this.items.shift() : undefined;
  }

  /** Remove and return everything, oldest first */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get size(): number {
    return this.items.length;
  }
}
