// ---------------------------------------------------------------------------
// Channel — Bounded Single-Consumer Queue
// ---------------------------------------------------------------------------
// Carries chunks, results and status lines from a producing loop to one
// consumer. When full, the oldest entry is dropped: consumers want the
// freshest data, and a slow consumer must never stall a producer.

/**
 * Bounded FIFO with drop-oldest overflow and async receive.
 * Exactly one consumer may wait on it at a time.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly capacity: number;
  private readonly queue: T[];
  private waiter: ((value: T | undefined) => void) | null;
  private isClosed: boolean;
  private droppedCount: number;

  constructor(capacity: number = 64) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.queue = [];
    this.waiter = null;
    this.isClosed = false;
    this.droppedCount = 0;
  }

  /**
   * Enqueue a value. Returns false if the channel is closed.
   */
  send(value: T): boolean {
    if (this.isClosed) return false;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(value);
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.droppedCount++;
    }
    this.queue.push(value);
    return true;
  }

  /** Dequeue without waiting. */
  tryReceive(): T | undefined {
    return this.queue.shift();
  }

  /**
   * Next value, waiting if the queue is empty.
   * Resolves `undefined` once the channel is closed and drained.
   */
  receive(): Promise<T | undefined> {
    if (this.queue.length > 0) {
      return Promise.resolve(this.queue.shift());
    }
    if (this.isClosed) return Promise.resolve(undefined);
    if (this.waiter) {
      return Promise.reject(new Error('Channel already has a pending receiver'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Stop accepting values; a pending receiver resolves with `undefined`. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
  }

  /** Accept values again after close(). Anything still queued is kept. */
  reopen(): void {
    this.isClosed = false;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Values queued and not yet received. */
  get size(): number {
    return this.queue.length;
  }

  /** Values discarded because the queue was full. */
  get dropped(): number {
    return this.droppedCount;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const value = await this.receive();
      if (value === undefined && this.isClosed && this.queue.length === 0) return;
      if (value !== undefined) yield value;
    }
  }
}
