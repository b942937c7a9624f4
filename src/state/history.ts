/**
 * Append-only FIFO with a fixed capacity. Appending past the capacity
 * evicts from the front, oldest first.
 */
export class BoundedHistory<T> {
  private items: T[] = [];

  constructor(readonly capacity: number, initial: readonly T[] = []) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.appendAll(initial);
  }

  get length(): number {
    return this.items.length;
  }

  appendAll(entries: readonly T[]): void {
    if (entries.length === 0) return;
    const merged = this.items.concat(entries);
    this.items = merged.length > this.capacity ? merged.slice(merged.length - this.capacity) : merged;
  }

  /** The newest `limit` entries, oldest first. `limit` <= 0 returns everything. */
  tail(limit = 0): T[] {
    if (limit <= 0 || limit >= this.items.length) return this.items.slice();
    return this.items.slice(this.items.length - limit);
  }

  toArray(): T[] {
    return this.items.slice();
  }
}
