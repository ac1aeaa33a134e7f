// ---------------------------------------------------------------------------
// Sine tone with parameter smoothing
// ---------------------------------------------------------------------------
// y = dc + A·sin(2πf·t + φ)
// Live changes move the rendered ("current") levels toward the requested
// ("target") ones by alpha = chunk_duration / smooth_time per chunk, capped
// at a full jump.

import type { ParamValues, Schema } from '@wavescope/types';
import { readNumber } from '@wavescope/shared';
import { SignalComponent } from './component.js';

export const SINE_SCHEMA: Schema = [
  {
    key: 'amplitude', label: 'Amplitude', type: 'float', default: 1, min: 0, max: 10, step: 0.01,
    description: 'Amplitude A of A·sin(2πft+φ).',
    examples: ['1.0: base level', '0.2: faint component'],
  },
  {
    key: 'frequency', label: 'Frequency (Hz)', type: 'float', default: 5, min: 0, max: 10_000_000, step: 0.1,
    description: 'Tone frequency. Shows as a horizontal band on the scalogram.',
    examples: ['6 Hz: low', '30 Hz: mid', 'up to fs/2: high'],
  },
  {
    key: 'phase', label: 'Phase (rad)', type: 'float', default: 0, min: -10, max: 10, step: 0.01,
    description: 'Initial phase φ in radians.',
    examples: ['0: no shift', '1.57: quarter period'],
  },
  {
    key: 'dc', label: 'Offset (DC)', type: 'float', default: 0, min: -5, max: 5, step: 0.01,
    description: 'Constant offset added to the tone.',
    examples: ['0: none', '0.5: shifted up'],
  },
  {
    key: 'smooth_ms', label: 'Change smoothing (ms)', type: 'int', default: 150, min: 0, max: 500, step: 10,
    description: 'Time constant for gliding amplitude, frequency, phase and offset to new values.',
    examples: ['0: instant changes', '150-300: smooth transition'],
  },
];

export interface SineLevels {
  amplitude: number;
  frequency: number;
  phase: number;
  dc: number;
}

export interface SineParams extends SineLevels {
  smoothMs: number;
}

export class SineComponent extends SignalComponent<SineParams> {
  readonly kind = 'sine';
  readonly name = 'Sine';
  private current: SineLevels;

  constructor(raw: Readonly<Record<string, unknown>> = {}, enabled = true) {
    super(raw, enabled);
    const { amplitude, frequency, phase, dc } = this.params;
    this.current = { amplitude, frequency, phase, dc };
  }

  schema(): Schema {
    return SINE_SCHEMA;
  }

  protected parse(values: ParamValues): SineParams {
    return {
      amplitude: readNumber(values, 'amplitude', 1),
      frequency: readNumber(values, 'frequency', 5),
      phase: readNumber(values, 'phase', 0),
      dc: readNumber(values, 'dc', 0),
      smoothMs: readNumber(values, 'smooth_ms', 150),
    };
  }

  /** Levels the next chunk starts from. */
  currentLevels(): SineLevels {
    return { ...this.current };
  }

  protected render(out: Float64Array, startTime: number, sampleRate: number): void {
    const n = out.length;
    const target = this.params;
    const alpha = target.smoothMs <= 0
      ? 1
      : Math.min(1, (n / sampleRate) / (target.smoothMs / 1000));

    const c = this.current;
    c.amplitude += alpha * (target.amplitude - c.amplitude);
    c.frequency += alpha * (target.frequency - c.frequency);
    c.phase += alpha * (target.phase - c.phase);
    c.dc += alpha * (target.dc - c.dc);

    const w = 2 * Math.PI * c.frequency;
    for (let i = 0; i < n; i++) {
      const t = startTime + i / sampleRate;
      out[i] = c.dc + c.amplitude * Math.sin(w * t + c.phase);
    }
  }
}
