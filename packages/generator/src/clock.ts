// ---------------------------------------------------------------------------
// Logical Clock
// ---------------------------------------------------------------------------
// Time is a sample count, not wall-clock time, so generated phase is exactly
// reproducible regardless of scheduling jitter. Wall time is kept only for
// diagnostic uptime.

export type NowFn = () => number;

export class LogicalClock {
  private samples = 0;
  private epochMs: number;
  private readonly now: NowFn;

  /** @param now Millisecond wall clock (defaults to `performance.now`). */
  constructor(now: NowFn = () => performance.now()) {
    this.now = now;
    this.epochMs = now();
  }

  /** Sample count → 0 and restart the uptime reference. */
  reset(): void {
    this.samples = 0;
    this.epochMs = this.now();
  }

  advance(n: number): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`Clock can only advance by a non-negative integer, got ${n}`);
    }
    this.samples += n;
  }

  sampleIndex(): number {
    return this.samples;
  }

  /** Seconds of wall time since the last reset. */
  uptime(): number {
    return (this.now() - this.epochMs) / 1000;
  }
}
