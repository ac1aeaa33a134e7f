// ---------------------------------------------------------------------------
// Built-in: Continuous Wavelet Scalogram (frequency axis)
// ---------------------------------------------------------------------------
// Rows are target frequencies in ascending order. Each frequency maps to a
// scale through the wavelet's centre frequency (scale = cf·fs / f). The
// transform runs over ascending scales, i.e. descending frequencies, and the
// rows are flipped back so that row i matches yAxis[i].

import type { ParamValues, PluginMetadata, Schema, TransformPlugin, TransformResult } from '@wavescope/types';
import { BUILTIN_CWT_ID } from '@wavescope/config';
import { coerceParams, readChoice, readNumber } from '@wavescope/shared';
import {
  CONTINUOUS_WAVELETS,
  cwt,
  frequencyToScale,
  type ContinuousWavelet,
} from '@wavescope/signal-core';
import {
  MAGNITUDE_MODES,
  MAGNITUDE_PARAM,
  MIN_TRANSFORM_SAMPLES,
  NORMALIZE_MODES,
  NORMALIZE_PARAM,
  applyMagnitude,
  degenerateResult,
  normalizeImage,
  timeAxis,
} from './common.js';

export const CWT_META: PluginMetadata = {
  id: BUILTIN_CWT_ID,
  name: 'CWT scalogram (frequency axis)',
  kind: 'CWT',
  version: '1.3',
  description: 'Continuous wavelet transform on an FFT grid. The y axis is in Hz.',
};

export const FREQ_SPACINGS = ['linear', 'log'] as const;
export type FreqSpacing = (typeof FREQ_SPACINGS)[number];

export const CWT_SCHEMA: Schema = [
  {
    key: 'wavelet', label: 'Wavelet', type: 'enum', default: 'morl', choices: CONTINUOUS_WAVELETS,
    description: 'Continuous mother wavelet.',
    examples: ['morl: general purpose', 'mexh: good for impulses'],
  },
  MAGNITUDE_PARAM,
  NORMALIZE_PARAM,
  {
    key: 'f_min', label: 'Min frequency (Hz)', type: 'float', default: 5, min: 0.01, max: 10_000_000, step: 0.1,
    description: 'Lower edge of the frequency grid.',
    examples: ['5-10 Hz: slow processes', '20 Hz: skip the low end'],
  },
  {
    key: 'f_max', label: 'Max frequency (Hz)', type: 'float', default: 300, min: 0.01, max: 10_000_000, step: 0.1,
    description: 'Upper edge of the frequency grid, capped just below Nyquist.',
    examples: ['300 Hz: fast detail', 'fs/2: highest possible'],
  },
  {
    key: 'n_freqs', label: 'Frequency bins', type: 'int', default: 128, min: 8, max: 4096, step: 8,
    description: 'Scalogram rows. More rows cost proportionally more CPU.',
    examples: ['64: faster', '256-512: fine detail'],
  },
  {
    key: 'freq_spacing', label: 'Frequency spacing', type: 'enum', default: 'linear', choices: FREQ_SPACINGS,
    description: 'Linear or logarithmic distribution of the grid.',
    examples: ['linear: uniform', 'log: more rows at the low end'],
  },
];

/**
 * Ascending grid of `count` frequencies. Bounds are sanitized the same way
 * for both spacings: f_min ≥ 1e-6, f_max > f_min, at least two points.
 */
export function frequencyGrid(fMin: number, fMax: number, count: number, spacing: FreqSpacing): Float64Array {
  const lo = Math.max(fMin, 1e-6);
  const hi = Math.max(fMax, lo * 1.001);
  const n = Math.max(2, Math.floor(count));
  const grid = new Float64Array(n);

  if (spacing === 'log') {
    const a = Math.log(lo);
    const step = (Math.log(hi) - a) / (n - 1);
    for (let i = 0; i < n; i++) grid[i] = Math.exp(a + i * step);
  } else {
    const step = (hi - lo) / (n - 1);
    for (let i = 0; i < n; i++) grid[i] = lo + i * step;
  }
  grid[0] = lo;
  grid[n - 1] = hi;
  return grid;
}

export class CwtScalogramPlugin implements TransformPlugin {
  describeParameters(): Schema {
    return CWT_SCHEMA;
  }

  transform(samples: Float32Array, sampleRate: number, params: ParamValues): TransformResult {
    const n = samples.length;
    if (n < MIN_TRANSFORM_SAMPLES) return degenerateResult(n, sampleRate, 'Hz');

    const values = coerceParams(CWT_SCHEMA, params);
    const wavelet = readChoice<ContinuousWavelet>(values, 'wavelet', CONTINUOUS_WAVELETS, 'morl');
    const magnitude = readChoice(values, 'magnitude', MAGNITUDE_MODES, 'abs');
    const normalize = readChoice(values, 'normalize', NORMALIZE_MODES, 'none');
    const spacing = readChoice(values, 'freq_spacing', FREQ_SPACINGS, 'linear');
    const fMin = readNumber(values, 'f_min', 5);
    const fMax = Math.min(readNumber(values, 'f_max', 300), sampleRate / 2 - 1e-6);
    const freqs = frequencyGrid(fMin, fMax, readNumber(values, 'n_freqs', 128), spacing);

    // Highest frequency first gives ascending scales.
    const rows = freqs.length;
    const scales = new Float64Array(rows);
    for (let i = 0; i < rows; i++) {
      scales[i] = Math.max(frequencyToScale(wavelet, Math.max(freqs[rows - 1 - i]!, 1e-6), sampleRate), 1e-6);
    }
    const coefs = cwt(samples, scales, wavelet);

    const image: Float32Array[] = [];
    for (let s = 0; s < rows; s++) {
      const re = coefs.re[s]!;
      const im = coefs.im[s]!;
      const row = new Float32Array(n);
      for (let i = 0; i < n; i++) row[i] = applyMagnitude(Math.hypot(re[i]!, im[i]!), magnitude);
      image.push(row);
    }
    image.reverse();
    normalizeImage(image, normalize);

    return {
      image,
      yAxis: freqs,
      xAxis: timeAxis(n, sampleRate),
      yLabel: 'Hz',
      meta: { mode: 'CWT', wavelet, magnitude, normalize, freq_spacing: spacing },
    };
  }
}
