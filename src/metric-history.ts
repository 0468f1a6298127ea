/**
 * Bounded per-session history of metric vectors.
 * Uses a circular buffer for O(1) push regardless of fill level; the oldest
 * vector is overwritten once the buffer is full.
 */

import type { MetricVector } from "./types.js";

export class MetricHistory {
  private buffer: (MetricVector | null)[];
  private head: number; // index of the oldest element
  private count: number;
  private readonly maxSize: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`MetricHistory capacity must be a positive integer, got ${capacity}`);
    }
    this.maxSize = capacity;
    this.buffer = new Array<MetricVector | null>(capacity).fill(null);
    this.head = 0;
    this.count = 0;
  }

  /** Append a vector, evicting the oldest when full. */
  push(vector: MetricVector): void {
    const tail = (this.head + this.count) % this.maxSize;
    this.buffer[tail] = vector;

    if (this.count === this.maxSize) {
      // tail landed on the oldest slot; the next one is now the oldest
      this.head = (this.head + 1) % this.maxSize;
    } else {
      this.count++;
    }
  }

  /** Vectors ordered oldest → newest. */
  toArray(): MetricVector[] {
    const out: MetricVector[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.buffer[(this.head + i) % this.maxSize];
      if (entry !== null) out.push(entry);
    }
    return out;
  }

  latest(): MetricVector | null {
    if (this.count === 0) return null;
    return this.buffer[(this.head + this.count - 1) % this.maxSize];
  }

  clone(): MetricHistory {
    const copy = new MetricHistory(this.maxSize);
    copy.buffer = [...this.buffer];
    copy.head = this.head;
    copy.count = this.count;
    return copy;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  clear(): void {
    this.buffer.fill(null);
    this.head = 0;
    this.count = 0;
  }
}
