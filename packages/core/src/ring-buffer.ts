/**
 * Fixed-capacity FIFO. Pushing into a full buffer evicts the oldest item.
 */
export class RingBuffer<T> {
  private items: T[] = [];
  private start = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Ring buffer capacity must be a positive integer`);
    }
  }

  static from<T>(values: Iterable<T>, capacity: number): RingBuffer<T> {
    const buffer = new RingBuffer<T>(capacity);
    for (const value of values) {
      buffer.push(value);
    }
    return buffer;
  }

  push(value: T): void {
    if (this.items.length < this.capacity) {
      this.items.push(value);
      return;
    }
    this.items[this.start] = value;
    this.start = (this.start + 1) % this.capacity;
  }

  /** Oldest first. */
  toArray(): T[] {
    return [...this.items.slice(this.start), ...this.items.slice(0, this.start)];
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
    this.start = 0;
  }
}
