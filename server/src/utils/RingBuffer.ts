/**
 * Fixed-capacity buffer that drops the oldest entry once full.
 * Reads return newest first.
 */
export class RingBuffer<T> {
  private items: T[] = [];
  private capacity: number;

  constructor(capacity: number) {
    this.capacity = RingBuffer.checkCapacity(capacity);
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  /**
   * Newest-first copy, optionally filtered and limited.
   */
  recent(limit?: number, predicate?: (item: T) => boolean): T[] {
    const result: T[] = [];
    for (let i = this.items.length - 1; i >= 0; i--) {
      const item = this.items[i];
      if (predicate && !predicate(item)) continue;
      result.push(item);
      if (limit !== undefined && result.length >= limit) break;
    }
    return result;
  }

  resize(capacity: number): void {
    this.capacity = RingBuffer.checkCapacity(capacity);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }

  get maxSize(): number {
    return this.capacity;
  }

  private static checkCapacity(capacity: number): number {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    return capacity;
  }
}
