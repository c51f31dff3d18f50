/** Occupancy counters exposed by a {@link RingBuffer}. */
export interface RingBufferStats {
  readonly size: number;
  /** Configured capacity; `0` when the buffer is unbounded. */
  readonly capacity: number;
  readonly dropped: number;
}

/**
 * Fixed-capacity FIFO keeping the most recent records. Appending to a full
 * buffer overwrites the oldest slot in O(1) and bumps {@link dropped}. A
 * capacity of zero or less disables eviction entirely.
 */
export class RingBuffer<T> {
  private readonly slots: T[] = [];
  private readonly bound: number;
  /** Index of the oldest record once the bounded buffer wrapped around. */
  private head = 0;
  private droppedCount = 0;

  constructor(capacity: number) {
    this.bound = Number.isFinite(capacity) && capacity > 0 ? Math.floor(capacity) : 0;
  }

  get capacity(): number {
    return this.bound;
  }

  get size(): number {
    return this.slots.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  append(record: T): void {
    if (this.bound === 0 || this.slots.length < this.bound) {
      this.slots.push(record);
      return;
    }
    this.slots[this.head] = record;
    this.head = (this.head + 1) % this.bound;
    this.droppedCount += 1;
  }

  /**
   * Returns up to `limit` of the most recent records (all of them when the
   * limit is omitted), newest first unless `newestFirst` is false. A limit of
   * zero or less yields an empty list.
   */
  snapshot(limit?: number, newestFirst = true): T[] {
    const ordered = [...this.slots.slice(this.head), ...this.slots.slice(0, this.head)];
    const count = limit === undefined ? ordered.length : Math.max(0, Math.floor(limit));
    const recent = count === 0 ? [] : ordered.slice(-count);
    return newestFirst ? recent.reverse() : recent;
  }

  stats(): RingBufferStats {
    return { size: this.size, capacity: this.bound, dropped: this.droppedCount };
  }

  /** Drops every record; the eviction counter keeps its value. */
  clear(): void {
    this.slots.length = 0;
    this.head = 0;
  }
}
