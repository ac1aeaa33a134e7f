// ---------------------------------------------------------------------------
// Discrete Wavelet Transform (DWT) — Mallat's Pyramid Algorithm
// ---------------------------------------------------------------------------
// cA_j[n] = Σ_k h[k]·cA_{j-1}[(2n+k) mod N]  (low-pass + downsample)
// cD_j[n] = Σ_k g[k]·cA_{j-1}[(2n+k) mod N]  (high-pass + downsample)
// Periodic extension; each level halves the length (rounding up).

import type { DiscreteWavelet, DWTResult } from '../types.js';

export const DISCRETE_WAVELETS: readonly DiscreteWavelet[] = [
  'haar', 'db2', 'db4', 'db8', 'sym4', 'coif1', 'coif2',
];

export function isDiscreteWavelet(name: string): name is DiscreteWavelet {
  return DISCRETE_WAVELETS.some((w) => w === name);
}

/** Low-pass decomposition (scaling) filter for each family. */
export function getScalingFilter(wavelet: DiscreteWavelet): Float64Array {
  switch (wavelet) {
    case 'haar':
      return new Float64Array([
        0.7071067811865476,
        0.7071067811865476,
      ]);
    case 'db2':
      return new Float64Array([
        -0.12940952255092145, 0.22414386804185735,
        0.836516303737469, 0.48296291314469025,
      ]);
    case 'db4':
      return new Float64Array([
        -0.010597401784997278, 0.032883011666982945,
        0.030841381835986965, -0.18703481171888114,
        -0.02798376941698385, 0.6308807679295904,
        0.7148465705525415, 0.23037781330885523,
      ]);
    case 'db8':
      return new Float64Array([
        -0.00011747678400228192, 0.0006754494059985568,
        -0.0003917403729959771, -0.00487035299301066,
        0.008746094047015655, 0.013981027917015516,
        -0.04408825393079038, -0.01736930100202211,
        0.128747426620186, 0.00047248457399797254,
        -0.2840155429624281, -0.015829105256023893,
        0.5853546836548691, 0.6756307362980128,
        0.3128715909144659, 0.05441584224308161,
      ]);
    case 'sym4':
      return new Float64Array([
        -0.07576571478927333, -0.02963552764599851,
        0.49761866763201545, 0.8037387518059161,
        0.29785779560527736, -0.09921954357684722,
        -0.012603967262037833, 0.032223100604042702,
      ]);
    case 'coif1':
      return new Float64Array([
        -0.015655728135791993, -0.07273261951252645,
        0.3848648468648578, 0.8525720202116004,
        0.337897662457481, -0.07273261951252645,
      ]);
    case 'coif2':
      return new Float64Array([
        -0.0007205494453645122, -0.0018232088707029932,
        0.0056114348193944995, 0.023680171946334084,
        -0.0594344186464569, -0.0764885990783064,
        0.41700518442169254, 0.8127236354455423,
        0.3861100668211622, -0.06737255472196302,
        -0.04146493678175915, 0.016387336463522112,
      ]);
  }
}

/** High-pass (wavelet) filter from the low-pass via the quadrature mirror relation. */
export function getWaveletFilter(wavelet: DiscreteWavelet): Float64Array {
  const h = getScalingFilter(wavelet);
  const g = new Float64Array(h.length);
  for (let i = 0; i < h.length; i++) {
    g[i] = ((i & 1) === 0 ? 1 : -1) * h[h.length - 1 - i]!;
  }
  return g;
}

/** Filter + downsample by 2 with periodic extension. Output length ceil(N/2). */
export function convolveDownsample(signal: ArrayLike<number>, filter: Float64Array): Float64Array {
  const N = signal.length;
  const L = filter.length;
  const outLen = Math.ceil(N / 2);
  const result = new Float64Array(outLen);

  for (let i = 0; i < outLen; i++) {
    let sum = 0;
    for (let k = 0; k < L; k++) {
      sum += signal[(2 * i + k) % N]! * filter[k]!;
    }
    result[i] = sum;
  }
  return result;
}

/** Deepest useful level for this signal length and filter (at least 1). */
export function maxLevel(signalLength: number, wavelet: DiscreteWavelet): number {
  const filterLen = getScalingFilter(wavelet).length;
  if (signalLength < filterLen) return 1;
  return Math.max(1, Math.floor(Math.log2(signalLength / (filterLen - 1))));
}

/**
 * DWT decomposition. `levels` is clamped to [1, maxLevel].
 */
export function dwtDecompose(
  signal: ArrayLike<number>,
  wavelet: DiscreteWavelet = 'db4',
  levels?: number,
): DWTResult {
  const limit = maxLevel(signal.length, wavelet);
  const nLevels = Math.min(limit, Math.max(1, Math.floor(levels ?? limit)));
  const h = getScalingFilter(wavelet);
  const g = getWaveletFilter(wavelet);

  const details: Float64Array[] = [];
  let approx: Float64Array = Float64Array.from(signal);

  for (let level = 0; level < nLevels; level++) {
    details.push(convolveDownsample(approx, g));
    approx = convolveDownsample(approx, h);
  }

  return {
    approximation: approx,
    details,
    wavelet,
    levels: nLevels,
  };
}
