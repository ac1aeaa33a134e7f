// ---------------------------------------------------------------------------
// Generator Loop
// ---------------------------------------------------------------------------
// Emits chunks at real time: after each chunk the deadline moves forward by
// the chunk's duration and the loop sleeps until it (at least 1 ms). If the
// loop falls more than a second behind, the deadline is re-anchored to now
// rather than bursting to catch up.
//
// State: idle → running → stopping → stopped. stop() is cooperative and takes
// effect at the next iteration boundary.

import { setTimeout as delay } from 'node:timers/promises';
import type { Chunk, LoopState } from '@wavescope/types';
import { errorFields, silentLogger, type Logger } from '@wavescope/shared';
import type { SignalEngine } from './engine.js';

export type SleepFn = (ms: number) => Promise<void>;

export interface GeneratorLoopOptions {
  engine: SignalEngine;
  /** Receives every non-empty chunk. */
  publish: (chunk: Chunk) => void;
  sleep?: SleepFn;
  /** Millisecond wall clock. */
  now?: () => number;
  logger?: Logger;
  /** Poll interval while paused. */
  idleMs?: number;
}

const MAX_LAG_MS = 1000;

export class GeneratorLoop {
  private readonly engine: SignalEngine;
  private readonly publish: (chunk: Chunk) => void;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly idleMs: number;
  private loopState: LoopState = 'idle';
  private running: Promise<void> | null = null;
  private chunks = 0;

  constructor(options: GeneratorLoopOptions) {
    this.engine = options.engine;
    this.publish = options.publish;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? silentLogger;
    this.idleMs = options.idleMs ?? 50;
  }

  get state(): LoopState {
    return this.loopState;
  }

  /** Chunks published since construction. */
  get published(): number {
    return this.chunks;
  }

  /**
   * Begin generating. Resolves when the loop exits; calling again while it
   * runs returns the same promise.
   */
  start(): Promise<void> {
    if (this.running) return this.running;
    this.loopState = 'running';
    this.running = this.run().finally(() => {
      this.loopState = 'stopped';
      this.running = null;
    });
    return this.running;
  }

  /** Ask the loop to exit and wait for it. */
  async stop(): Promise<void> {
    if (this.loopState !== 'running') return;
    this.loopState = 'stopping';
    await this.running;
  }

  private isRunning(): boolean {
    return this.loopState === 'running';
  }

  private async run(): Promise<void> {
    this.logger.info('generator loop started');
    let deadline = this.now();

    while (this.isRunning()) {
      if (this.engine.isPaused()) {
        await this.sleep(this.idleMs);
        deadline = this.now();
        continue;
      }

      let chunk: Chunk;
      try {
        chunk = this.engine.generateChunk();
        if (chunk.samples.length > 0) {
          this.publish(chunk);
          this.chunks++;
        }
      } catch (err) {
        this.logger.error('generation step failed', errorFields(err));
        await this.sleep(this.idleMs);
        deadline = this.now();
        continue;
      }

      deadline += (chunk.samples.length / chunk.sampleRate) * 1000;
      const t = this.now();
      if (t - deadline > MAX_LAG_MS) {
        this.logger.warn('generator fell behind; re-anchoring', { lagMs: Math.round(t - deadline) });
        deadline = t;
      }
      await this.sleep(Math.max(1, deadline - t));
    }

    this.logger.info('generator loop stopped', { chunks: this.chunks });
  }
}
