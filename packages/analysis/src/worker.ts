// ---------------------------------------------------------------------------
// Analysis Worker
// ---------------------------------------------------------------------------
// Once per frame: take one parameter snapshot, resolve the plugin, pull the
// most recent window from history, transform it and publish the result.
// Runs at its own frame rate, independent of how fast chunks arrive. The
// transform itself goes through a TransformExecutor; the default runs it on
// the calling thread, ThreadedExecutor moves it off the event loop.
//
// A missing plugin or a throwing transform becomes a status message and the
// loop carries on with the next frame. Repeats of the same message are
// reported once until a frame succeeds or the message changes.

import { setTimeout as delay } from 'node:timers/promises';
import type { LoopState, ParamsSnapshot, PluginInfo, TransformResult } from '@wavescope/types';
import { windowLength } from '@wavescope/config';
import { errorFields, silentLogger, type Logger } from '@wavescope/shared';
import type { RingBuffer } from '@wavescope/signal-core';
import { InlineExecutor } from './executor/inline.js';
import type { TransformExecutor } from './executor/types.js';

export type SleepFn = (ms: number) => Promise<void>;

export interface AnalysisWorkerOptions {
  params: { snapshot(): ParamsSnapshot };
  registry: { get(id: string): PluginInfo | undefined };
  /** Current history. Called every frame, so the host may swap buffers. */
  history: () => Pick<RingBuffer, 'getLast'>;
  publish: (result: TransformResult) => void;
  status?: (message: string) => void;
  /** Where transforms run. Defaults to the calling thread, against `registry`. */
  executor?: TransformExecutor;
  sleep?: SleepFn;
  /** Millisecond wall clock. */
  now?: () => number;
  logger?: Logger;
}

export class AnalysisWorker {
  private readonly options: AnalysisWorkerOptions;
  private readonly executor: TransformExecutor;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly logger: Logger;
  private loopState: LoopState = 'idle';
  private running: Promise<void> | null = null;
  private frames = 0;
  private durationMs = 0;
  private lastStatus: string | null = null;

  constructor(options: AnalysisWorkerOptions) {
    this.options = options;
    this.executor = options.executor ?? new InlineExecutor(options.registry);
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? silentLogger;
  }

  get state(): LoopState {
    return this.loopState;
  }

  /** Results published since construction. */
  get published(): number {
    return this.frames;
  }

  /** Wall time of the last successful frame (snapshot to publish). */
  get lastDurationMs(): number {
    return this.durationMs;
  }

  start(): Promise<void> {
    if (this.running) return this.running;
    this.loopState = 'running';
    this.running = this.run().finally(() => {
      this.loopState = 'stopped';
      this.running = null;
    });
    return this.running;
  }

  async stop(): Promise<void> {
    if (this.loopState !== 'running') return;
    this.loopState = 'stopping';
    await this.running;
  }

  /** Run a single frame. Resolves with the published result, if any. */
  step(): Promise<TransformResult | undefined> {
    return this.frame(this.options.params.snapshot());
  }

  private async frame({ settings, transformParams }: ParamsSnapshot): Promise<TransformResult | undefined> {
    const started = this.now();
    const plugin = this.options.registry.get(settings.pluginId);
    if (!plugin) {
      this.report(`Transform plugin not found: ${settings.pluginId}`);
      return undefined;
    }

    try {
      const window = this.options.history().getLast(windowLength(settings));
      const result = await this.executor.run({
        pluginId: settings.pluginId,
        samples: window,
        sampleRate: settings.sampleRate,
        params: transformParams,
      });
      this.options.publish(result);
      this.frames++;
      this.durationMs = this.now() - started;
      this.lastStatus = null;
      return result;
    } catch (err) {
      this.logger.error('transform failed', { pluginId: settings.pluginId, ...errorFields(err, true) });
      const reason = err instanceof Error ? err.message : String(err);
      this.report(`Transform error (${settings.pluginId}): ${reason}`);
      return undefined;
    }
  }

  private report(message: string): void {
    if (message === this.lastStatus) return;
    this.lastStatus = message;
    this.logger.warn('analysis status', { message });
    this.options.status?.(message);
  }

  private async run(): Promise<void> {
    this.logger.info('analysis worker started');
    while (this.loopState === 'running') {
      const started = this.now();
      const snapshot = this.options.params.snapshot();
      await this.frame(snapshot);
      // The frame's own time counts against the period.
      const period = 1000 / Math.max(1, snapshot.settings.frameRate);
      await this.sleep(Math.max(1, period - (this.now() - started)));
    }
    this.logger.info('analysis worker stopped', { frames: this.frames });
  }
}
