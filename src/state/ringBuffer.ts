/**
 * Fixed-capacity circular buffer. Once full, each push overwrites the
 * oldest value. Iteration order is always oldest → newest.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest value
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  push(value: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = value;
    if (this.isFull) {
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.count += 1;
    }
  }

  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  toArray(): T[] {
    const out: T[] = [];
    for (const value of this) out.push(value);
    return out;
  }

  every(predicate: (value: T) => boolean): boolean {
    for (const value of this) {
      if (!predicate(value)) return false;
    }
    return true;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i += 1) {
      const value = this.slots[(this.head + i) % this.capacity];
      if (value !== undefined) yield value;
    }
  }
}
