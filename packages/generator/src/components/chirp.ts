// ---------------------------------------------------------------------------
// Linear chirp
// ---------------------------------------------------------------------------
// y = A·cos(2π(f0·τ + (f1 - f0)/(2·dur)·τ²)),  τ = t - start ∈ [0, dur]
// Zero outside the sweep.

import type { ParamValues, Schema } from '@wavescope/types';
import { readNumber } from '@wavescope/shared';
import { SignalComponent } from './component.js';

export const CHIRP_SCHEMA: Schema = [
  {
    key: 'amplitude', label: 'Amplitude', type: 'float', default: 0.8, min: 0, max: 10, step: 0.01,
    description: 'Amplitude of the linear frequency sweep.',
    examples: ['0.8: base level', '2.0: pronounced sweep'],
  },
  {
    key: 'f0', label: 'Start frequency f0 (Hz)', type: 'float', default: 10, min: 0, max: 10_000_000, step: 0.1,
    description: 'Instantaneous frequency at the start of the sweep.',
    examples: ['10 Hz: low start', '100 Hz: mid'],
  },
  {
    key: 'f1', label: 'End frequency f1 (Hz)', type: 'float', default: 200, min: 0, max: 10_000_000, step: 0.1,
    description: 'Instantaneous frequency at the end of the sweep.',
    examples: ['200 Hz: moderate range'],
  },
  {
    key: 'duration_sec', label: 'Duration (s)', type: 'float', default: 2, min: 0.01, max: 60, step: 0.01,
    description: 'Length of the sweep. The output is zero outside it.',
    examples: ['2.0 s: typical', '0.5 s: short sweep'],
  },
  {
    key: 'start_time_sec', label: 'Start (s)', type: 'float', default: 0, min: 0, max: 60, step: 0.01,
    description: 'Time the sweep begins.',
    examples: ['0: immediately', '1.0: after one second'],
  },
];

export interface ChirpParams {
  amplitude: number;
  f0: number;
  f1: number;
  duration: number;
  start: number;
}

export class ChirpComponent extends SignalComponent<ChirpParams> {
  readonly kind = 'chirp';
  readonly name = 'Linear chirp';

  schema(): Schema {
    return CHIRP_SCHEMA;
  }

  protected parse(values: ParamValues): ChirpParams {
    return {
      amplitude: readNumber(values, 'amplitude', 0.8),
      f0: readNumber(values, 'f0', 10),
      f1: readNumber(values, 'f1', 200),
      duration: readNumber(values, 'duration_sec', 2),
      start: readNumber(values, 'start_time_sec', 0),
    };
  }

  protected render(out: Float64Array, startTime: number, sampleRate: number): void {
    const { amplitude, f0, f1, duration, start } = this.params;
    if (duration <= 0) return;
    const sweep = (f1 - f0) / (2 * duration);

    for (let i = 0; i < out.length; i++) {
      const tau = startTime + i / sampleRate - start;
      if (tau < 0 || tau > duration) continue;
      out[i] = amplitude * Math.cos(2 * Math.PI * (f0 * tau + sweep * tau * tau));
    }
  }
}
