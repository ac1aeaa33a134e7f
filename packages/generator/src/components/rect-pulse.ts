// ---------------------------------------------------------------------------
// Rectangular pulse train
// ---------------------------------------------------------------------------
// Pulse k covers [start + k·period, start + k·period + width), k ≥ 0.
// Only the repetitions that can overlap the requested chunk are visited, so
// cost does not grow with run time.

import type { ParamValues, Schema } from '@wavescope/types';
import { readNumber } from '@wavescope/shared';
import { SignalComponent } from './component.js';

/** Tolerance (in samples) for pulse edges that land on a sample instant. */
const EDGE_EPS = 1e-6;

export const RECT_PULSE_SCHEMA: Schema = [
  {
    key: 'amplitude', label: 'Amplitude', type: 'float', default: 1, min: 0, max: 10, step: 0.01,
    description: 'Height of each pulse.',
    examples: ['1.0: base level', '3.0: pronounced pulses'],
  },
  {
    key: 'width_sec', label: 'Pulse width (s)', type: 'float', default: 0.02, min: 0.0005, max: 2, step: 0.0005,
    description: 'Duration of one pulse.',
    examples: ['0.02 s: short', '0.2 s: wide'],
  },
  {
    key: 'period_sec', label: 'Repetition period (s)', type: 'float', default: 0.3, min: 0.001, max: 10, step: 0.001,
    description: 'Interval between pulse starts. Repetition rate = 1/period.',
    examples: ['0.3 s ≈ 3.33 Hz', '1.0 s = 1 Hz'],
  },
  {
    key: 'start_time_sec', label: 'Start (s)', type: 'float', default: 0, min: 0, max: 60, step: 0.01,
    description: 'Time of the first pulse.',
    examples: ['0: immediately', '1.0: after one second'],
  },
];

export interface RectPulseParams {
  amplitude: number;
  width: number;
  period: number;
  start: number;
}

/**
 * Inclusive range of pulse indices that may overlap `[t0, t1)`.
 * Returns `null` when none can.
 */
export function overlappingPulses(
  t0: number,
  t1: number,
  start: number,
  period: number,
  width: number,
): [number, number] | null {
  if (period <= 0 || t1 <= start) return null;
  const first = Math.max(0, Math.floor((t0 - start - width) / period));
  const last = Math.ceil((t1 - start) / period) - 1;
  return last >= first ? [first, last] : null;
}

export class RectPulseComponent extends SignalComponent<RectPulseParams> {
  readonly kind = 'rect_pulse';
  readonly name = 'Rectangular pulses';

  schema(): Schema {
    return RECT_PULSE_SCHEMA;
  }

  protected parse(values: ParamValues): RectPulseParams {
    return {
      amplitude: readNumber(values, 'amplitude', 1),
      width: readNumber(values, 'width_sec', 0.02),
      period: readNumber(values, 'period_sec', 0.3),
      start: readNumber(values, 'start_time_sec', 0),
    };
  }

  protected render(out: Float64Array, startTime: number, sampleRate: number): void {
    const { amplitude, width, period, start } = this.params;
    const n = out.length;
    const range = overlappingPulses(startTime, startTime + n / sampleRate, start, period, width);
    if (!range) return;

    for (let k = range[0]; k <= range[1]; k++) {
      const pulseStart = start + k * period;
      const i0 = Math.max(0, Math.ceil((pulseStart - startTime) * sampleRate - EDGE_EPS));
      const i1 = Math.min(n, Math.ceil((pulseStart + width - startTime) * sampleRate - EDGE_EPS));
      if (i1 > i0) out.fill(amplitude, i0, i1);
    }
  }
}
