// ---------------------------------------------------------------------------
// Signal Engine
// ---------------------------------------------------------------------------
// Sums every enabled component into one fixed-length chunk per call,
// optionally clips, and advances the logical clock. Every method is
// synchronous: on the event loop each one runs to completion, so a chunk
// in progress always sees one consistent configuration.

import type { Chunk, ComponentEntry, ComponentSnapshot } from '@wavescope/types';
import { MAX_CHUNK } from '@wavescope/config';
import { LogicalClock } from './clock.js';
import { createComponent, type Component } from './components/catalog.js';

export interface GlobalParams {
  sampleRate: number;
  chunkLength: number;
  /** 0 disables clipping. */
  amplitudeClip: number;
}

type RawParams = Readonly<Record<string, unknown>>;

function checkGlobals(g: GlobalParams): void {
  if (!Number.isFinite(g.sampleRate) || g.sampleRate <= 0) {
    throw new RangeError(`Sample rate must be positive, got ${g.sampleRate}`);
  }
  if (!Number.isInteger(g.chunkLength) || g.chunkLength < 1) {
    throw new RangeError(`Chunk length must be a positive integer, got ${g.chunkLength}`);
  }
  if (!Number.isFinite(g.amplitudeClip) || g.amplitudeClip < 0) {
    throw new RangeError(`Amplitude clip must be >= 0, got ${g.amplitudeClip}`);
  }
}

export class SignalEngine {
  readonly clock: LogicalClock;
  private globals: GlobalParams;
  private paused = true;
  private components: Component[] = [];
  /** Reused accumulator, sized for the largest chunk. */
  private readonly acc = new Float64Array(MAX_CHUNK);

  constructor(clock: LogicalClock = new LogicalClock(), globals: Partial<GlobalParams> = {}) {
    this.clock = clock;
    const initial = { sampleRate: 2000, chunkLength: 256, amplitudeClip: 0, ...globals };
    checkGlobals(initial);
    this.globals = initial;
  }

  // ─── Globals & transport ────────────────────────────────────────────────

  setGlobalParams(patch: Partial<GlobalParams>): void {
    const next: GlobalParams = {
      sampleRate: patch.sampleRate ?? this.globals.sampleRate,
      chunkLength: patch.chunkLength ?? this.globals.chunkLength,
      amplitudeClip: patch.amplitudeClip ?? this.globals.amplitudeClip,
    };
    checkGlobals(next);
    this.globals = next;
  }

  /** Consistent copy; never read the fields separately. */
  getGlobalParams(): GlobalParams {
    return { ...this.globals };
  }

  play(): void {
    this.paused = false;
  }

  pause(): void {
    this.paused = true;
  }

  isPaused(): boolean {
    return this.paused;
  }

  /** Rewind the logical clock. Components and history are untouched. */
  reset(): void {
    this.clock.reset();
  }

  // ─── Components ─────────────────────────────────────────────────────────

  /** Append a component and return its index. Throws on an unknown kind. */
  addComponent(kind: string, params: RawParams = {}, enabled = true): number {
    const component = createComponent(kind, params, enabled);
    if (!component) throw new Error(`Unknown component kind: ${kind}`);
    this.components.push(component);
    return this.components.length - 1;
  }

  removeComponent(index: number): boolean {
    if (!this.inRange(index)) return false;
    this.components.splice(index, 1);
    return true;
  }

  setComponentEnabled(index: number, enabled: boolean): boolean {
    const component = this.at(index);
    if (!component) return false;
    component.enabled = enabled;
    return true;
  }

  updateComponentParams(index: number, partial: RawParams): boolean {
    const component = this.at(index);
    if (!component) return false;
    component.updateParams(partial);
    return true;
  }

  componentCount(): number {
    return this.components.length;
  }

  snapshotComponents(): ComponentSnapshot[] {
    return this.components.map((c) => ({
      kind: c.kind,
      name: c.name,
      enabled: c.enabled,
      params: c.getParams(),
    }));
  }

  /**
   * Clear and rebuild from saved entries in one step. Unknown kinds are
   * skipped; missing parameters take schema defaults.
   * @returns the number of skipped entries
   */
  replaceComponents(entries: readonly ComponentEntry[]): number {
    const next: Component[] = [];
    let skipped = 0;
    for (const entry of entries) {
      const component = createComponent(entry.kind, entry.params ?? {}, entry.enabled ?? true);
      if (component) next.push(component);
      else skipped++;
    }
    this.components = next;
    return skipped;
  }

  // ─── Generation ─────────────────────────────────────────────────────────

  /**
   * One chunk at the current logical time. While paused the samples are
   * empty and the clock does not move.
   */
  generateChunk(): Chunk {
    const { sampleRate, chunkLength, amplitudeClip } = this.globals;
    const components = [...this.components];
    const startTime = this.clock.sampleIndex() / sampleRate;

    if (this.paused) {
      return { samples: new Float32Array(0), startTime, sampleRate };
    }

    const n = Math.min(chunkLength, MAX_CHUNK);
    const acc = this.acc.subarray(0, n);
    acc.fill(0);
    for (const component of components) {
      if (!component.enabled) continue;
      const part = component.generate(startTime, n, sampleRate);
      for (let i = 0; i < n; i++) acc[i] = acc[i]! + part[i]!;
    }

    if (amplitudeClip > 0) {
      for (let i = 0; i < n; i++) {
        acc[i] = Math.min(amplitudeClip, Math.max(-amplitudeClip, acc[i]!));
      }
    }

    this.clock.advance(n);
    return { samples: new Float32Array(acc), startTime, sampleRate };
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.components.length;
  }

  private at(index: number): Component | undefined {
    return this.inRange(index) ? this.components[index] : undefined;
  }
}
