// ---------------------------------------------------------------------------
// Transform Helpers
// ---------------------------------------------------------------------------
// Post-processing shared by the built-in transforms: magnitude mapping,
// whole-image normalization, time axis and the degenerate-window result.

import type { ParamSpec, TransformResult } from '@wavescope/types';

/** Windows shorter than this produce a single zero row. */
export const MIN_TRANSFORM_SAMPLES = 16;

export const MAGNITUDE_MODES = ['abs', 'power'] as const;
export type MagnitudeMode = (typeof MAGNITUDE_MODES)[number];

export const NORMALIZE_MODES = ['none', 'max', 'zscore'] as const;
export type NormalizeMode = (typeof NORMALIZE_MODES)[number];

const ZSCORE_MIN_STD = 1e-9;

export const MAGNITUDE_PARAM: ParamSpec = {
  key: 'magnitude',
  label: 'Coefficient magnitude',
  type: 'enum',
  default: 'abs',
  choices: MAGNITUDE_MODES,
  description: 'Displayed quantity: |coef| or |coef|².',
  examples: ['abs: amplitude', 'power: energy (squared magnitude)'],
};

export const NORMALIZE_PARAM: ParamSpec = {
  key: 'normalize',
  label: 'Normalization',
  type: 'enum',
  default: 'none',
  choices: NORMALIZE_MODES,
  description: 'Normalization applied to the whole coefficient map before display.',
  examples: ['none: raw values', 'max: divide by the global maximum', 'zscore: (x-μ)/σ'],
};

/** |v| or v² of a real value. */
export function applyMagnitude(value: number, mode: MagnitudeMode): number {
  return mode === 'power' ? value * value : Math.abs(value);
}

/**
 * Normalize every row in place against statistics of the whole image.
 * `max` leaves the image alone when its maximum is not positive; `zscore`
 * leaves it alone when the standard deviation is below 1e-9.
 */
export function normalizeImage(image: Float32Array[], mode: NormalizeMode): void {
  if (mode === 'none') return;

  if (mode === 'max') {
    let max = -Infinity;
    for (const row of image) {
      for (let i = 0; i < row.length; i++) {
        if (row[i]! > max) max = row[i]!;
      }
    }
    if (!(max > 0)) return;
    for (const row of image) {
      for (let i = 0; i < row.length; i++) row[i] = row[i]! / max;
    }
    return;
  }

  let count = 0;
  let sum = 0;
  for (const row of image) {
    for (let i = 0; i < row.length; i++) sum += row[i]!;
    count += row.length;
  }
  if (count === 0) return;
  const mean = sum / count;

  let sq = 0;
  for (const row of image) {
    for (let i = 0; i < row.length; i++) {
      const d = row[i]! - mean;
      sq += d * d;
    }
  }
  const std = Math.sqrt(sq / count);
  if (std <= ZSCORE_MIN_STD) return;
  for (const row of image) {
    for (let i = 0; i < row.length; i++) row[i] = (row[i]! - mean) / std;
  }
}

/** Seconds of each sample: i / fs. */
export function timeAxis(length: number, sampleRate: number): Float64Array {
  const axis = new Float64Array(length);
  for (let i = 0; i < length; i++) axis[i] = i / sampleRate;
  return axis;
}

function linspace(start: number, stop: number, count: number): Float64Array {
  const out = new Float64Array(count);
  if (count === 1) {
    out[0] = start;
    return out;
  }
  const step = (stop - start) / (count - 1);
  for (let i = 0; i < count; i++) out[i] = start + i * step;
  return out;
}

/** One zero row spanning the (short) window, used below MIN_TRANSFORM_SAMPLES. */
export function degenerateResult(length: number, sampleRate: number, yLabel: string): TransformResult {
  const width = Math.max(length, 1);
  return {
    image: [new Float32Array(width)],
    yAxis: Float64Array.of(0),
    xAxis: linspace(0, length / sampleRate, width),
    yLabel,
    meta: {},
  };
}

/** Row index as the y value, for ordinal axes. */
export function ordinalAxis(rows: number): Float64Array {
  const axis = new Float64Array(rows);
  for (let i = 0; i < rows; i++) axis[i] = i;
  return axis;
}
