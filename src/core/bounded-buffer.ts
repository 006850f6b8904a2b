/**
 * Hearthside - Bounded Buffer
 *
 * Fixed-capacity circular buffer. Relationship history, gossip, learned
 * behaviours and temporary beliefs all keep "the most recent N" of something;
 * the oldest entry is evicted when a push would exceed capacity.
 */

export class BoundedBuffer<T> {
  private slots: (T | undefined)[];
  private head = 0; // index of the oldest item
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  /**
   * Build a buffer holding the newest `capacity` items of `items`.
   */
  static from<T>(capacity: number, items: Iterable<T>): BoundedBuffer<T> {
    const buffer = new BoundedBuffer<T>(capacity);
    for (const item of items) buffer.push(item);
    return buffer;
  }

  get size(): number {
    return this.count;
  }

  /**
   * Append an item, evicting and returning the oldest one when full.
   */
  push(item: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = item;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Append only if an equal item is not already held. Returns whether the
   * buffer changed.
   */
  pushUnique(item: T): boolean {
    if (this.includes(item)) return false;
    this.push(item);
    return true;
  }

  includes(item: T): boolean {
    return this.toArray().includes(item);
  }

  /** Oldest first. */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  /** The `n` most recent items, oldest first. */
  latest(n: number): T[] {
    if (n <= 0) return [];
    return this.toArray().slice(-n);
  }

  clear(): void {
    this.slots = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
