// ---------------------------------------------------------------------------
// Gaussian pulse train
// ---------------------------------------------------------------------------
// y(t) = Σ_k A·exp(-½((t - c_k)/σ)²),  c_k = center + k·period
// A zero period means a single pulse. Centers before t = 0 are never emitted,
// and each pulse is evaluated only within 8σ of its center.

import type { ParamValues, Schema } from '@wavescope/types';
import { readNumber } from '@wavescope/shared';
import { SignalComponent } from './component.js';

const SUPPORT_SIGMAS = 8;

export const GAUSS_PULSE_SCHEMA: Schema = [
  {
    key: 'amplitude', label: 'Amplitude', type: 'float', default: 1, min: 0, max: 10, step: 0.01,
    description: 'Peak height of each pulse.',
    examples: ['1.0: base level', '3.0: pronounced pulse'],
  },
  {
    key: 'sigma_sec', label: 'Width σ (s)', type: 'float', default: 0.01, min: 0.0002, max: 2, step: 0.0002,
    description: 'Standard deviation of the pulse in time.',
    examples: ['0.01 s: short', '0.1 s: broad'],
  },
  {
    key: 'center_time_sec', label: 'Center (s)', type: 'float', default: 1, min: 0, max: 60, step: 0.01,
    description: 'Time of the first pulse maximum.',
    examples: ['1.0 s', '0.2 s: early pulse'],
  },
  {
    key: 'repetition_period_sec', label: 'Repetition period (s, 0 = single)', type: 'float',
    default: 0, min: 0, max: 10, step: 0.01,
    description: 'Spacing between pulse centers. 0 produces a single pulse.',
    examples: ['0: single pulse', '0.5: a pulse every 0.5 s'],
  },
];

export interface GaussPulseParams {
  amplitude: number;
  sigma: number;
  center: number;
  period: number;
}

/** Pulse centers whose 8σ support can reach `[t0, t1)`. */
export function pulseCenters(t0: number, t1: number, params: GaussPulseParams): number[] {
  const reach = SUPPORT_SIGMAS * params.sigma;
  if (params.period <= 0) {
    const c = params.center;
    return c >= 0 && c + reach >= t0 && c - reach < t1 ? [c] : [];
  }
  const kMin = Math.ceil((t0 - reach - params.center) / params.period);
  const kMax = Math.floor((t1 + reach - params.center) / params.period);
  const centers: number[] = [];
  for (let k = kMin; k <= kMax; k++) {
    const c = params.center + k * params.period;
    if (c >= 0) centers.push(c);
  }
  return centers;
}

export class GaussPulseComponent extends SignalComponent<GaussPulseParams> {
  readonly kind = 'gauss_pulse';
  readonly name = 'Gaussian pulses';

  schema(): Schema {
    return GAUSS_PULSE_SCHEMA;
  }

  protected parse(values: ParamValues): GaussPulseParams {
    return {
      amplitude: readNumber(values, 'amplitude', 1),
      sigma: readNumber(values, 'sigma_sec', 0.01),
      center: readNumber(values, 'center_time_sec', 1),
      period: readNumber(values, 'repetition_period_sec', 0),
    };
  }

  protected render(out: Float64Array, startTime: number, sampleRate: number): void {
    const p = this.params;
    if (p.sigma <= 0) return;
    const n = out.length;
    const reach = SUPPORT_SIGMAS * p.sigma;

    for (const c of pulseCenters(startTime, startTime + n / sampleRate, p)) {
      const i0 = Math.max(0, Math.floor((c - reach - startTime) * sampleRate));
      const i1 = Math.min(n, Math.ceil((c + reach - startTime) * sampleRate) + 1);
      for (let i = i0; i < i1; i++) {
        const z = (startTime + i / sampleRate - c) / p.sigma;
        out[i] = out[i]! + p.amplitude * Math.exp(-0.5 * z * z);
      }
    }
  }
}
