// ---------------------------------------------------------------------------
// Ring Buffer — Bounded Recent History
// ---------------------------------------------------------------------------
// Fixed-capacity circular store of the most recent samples.
// Overflow silently discards the oldest data (last writer wins).
// Every method is synchronous, so on the event loop each call completes
// before any other append/getLast can observe the buffer.

/**
 * Circular sample history.
 *
 * Invariant: the last `min(filled, capacity)` appended samples are
 * recoverable in arrival order via `getLast`.
 */
export class RingBuffer {
  private readonly capacity: number;
  private readonly data: Float32Array;
  /** Next write position, in [0, capacity). */
  private cursor: number;
  /** Valid samples held, in [0, capacity]. */
  private filled: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.data = new Float32Array(capacity);
    this.cursor = 0;
    this.filled = 0;
  }

  /** Zero storage and forget all history. */
  clear(): void {
    this.data.fill(0);
    this.cursor = 0;
    this.filled = 0;
  }

  /**
   * Append samples. A batch at least as long as the buffer replaces the whole
   * history with its last `capacity` samples.
   */
  append(samples: ArrayLike<number>): void {
    const n = samples.length;
    if (n === 0) return;

    if (n >= this.capacity) {
      for (let i = 0; i < this.capacity; i++) {
        this.data[i] = samples[n - this.capacity + i]!;
      }
      this.cursor = 0;
      this.filled = this.capacity;
      return;
    }

    // Head: from cursor to end of storage. Tail: wrapped remainder at index 0.
    const head = Math.min(n, this.capacity - this.cursor);
    for (let i = 0; i < head; i++) {
      this.data[this.cursor + i] = samples[i]!;
    }
    for (let i = head; i < n; i++) {
      this.data[i - head] = samples[i]!;
    }

    this.cursor = (this.cursor + n) % this.capacity;
    this.filled = Math.min(this.capacity, this.filled + n);
  }

  /**
   * The most recent `min(n, filled)` samples, oldest first.
   * Always a fresh copy.
   */
  getLast(n: number): Float32Array {
    const count = Math.min(Math.max(0, Math.floor(n)), this.filled);
    if (count === 0) return new Float32Array(0);

    const start = (this.cursor - count + this.capacity) % this.capacity;
    if (start < this.cursor) {
      return this.data.slice(start, this.cursor);
    }

    // Crosses the wrap point: tail of storage, then head.
    const out = new Float32Array(count);
    const tailLen = this.capacity - start;
    out.set(this.data.subarray(start), 0);
    out.set(this.data.subarray(0, this.cursor), tailLen);
    return out;
  }

  /** Number of valid samples currently held. */
  size(): number {
    return this.filled;
  }

  getCapacity(): number {
    return this.capacity;
  }
}
