/**
 * CircularBuffer — Fixed-size ring buffer with O(1) push.
 *
 * When full, new items overwrite the oldest.
 * toArray() returns items in insertion order (oldest → newest).
 */
export class CircularBuffer<T> {
  private buffer: Array<T | undefined>;
  private head = 0;    // next write position
  private count = 0;
  private dropped = 0;
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('CircularBuffer capacity must be an integer >= 1');
    }
    this.capacity = capacity;
    this.buffer = new Array<T | undefined>(capacity);
  }

  /**
   * Push an item. If full, overwrites the oldest item and returns it.
   */
  push(item: T): T | undefined {
    const evicted = this.count === this.capacity ? this.buffer[this.head] : undefined;
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.dropped++;
    }
    return evicted;
  }

  toArray(): T[] {
    const result: T[] = [];
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(start + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  get length(): number {
    return this.count;
  }

  /** Items overwritten since creation or the last clear(). */
  get droppedCount(): number {
    return this.dropped;
  }

  get isFull(): boolean {
    return this.count >= this.capacity;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
    this.dropped = 0;
  }
}
