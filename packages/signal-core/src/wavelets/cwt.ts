// ---------------------------------------------------------------------------
// Continuous Wavelet Transform (CWT) via FFT
// ---------------------------------------------------------------------------
// W(s, n) = IFFT[ X̂(ω) · conj(Ψ̂(s·ω)) ](n)
// Spectra are amplitude-normalized: |Ψ̂| peaks at 1 (2 for analytic families,
// which only see positive frequencies), so a unit sinusoid at a scale's
// centre frequency yields |W| ≈ 1. The signal is zero-padded to at least
// twice its length so the circular product does not wrap.

import type { ContinuousWavelet, CWTResult } from '../types.js';
import { binAngularFrequency, fft, ifftInPlace, nextPow2 } from '../fourier/fft.js';

export const CONTINUOUS_WAVELETS: readonly ContinuousWavelet[] = [
  'morl', 'cmor', 'mexh', 'gaus1', 'gaus2', 'shan',
];

export function isContinuousWavelet(name: string): name is ContinuousWavelet {
  return CONTINUOUS_WAVELETS.some((w) => w === name);
}

const MORLET_W0 = 5;
const SHANNON_BANDWIDTH = 1;
const SHANNON_CENTER = 1.5;

interface Spectrum {
  re: number;
  im: number;
}

/** Integer power of i: i^0 = 1, i^1 = i, i^2 = -1, i^3 = -i. */
function iPow(n: number): Spectrum {
  switch (n % 4) {
    case 0: return { re: 1, im: 0 };
    case 1: return { re: 0, im: 1 };
    case 2: return { re: -1, im: 0 };
    default: return { re: 0, im: -1 };
  }
}

function gaussianDerivative(order: number, omega: number): Spectrum {
  // (iω/√N)^N · e^{(N-ω²)/2}, which peaks at |ω| = √N with magnitude 1.
  const mag = Math.pow(omega / Math.sqrt(order), order) * Math.exp((order - omega * omega) / 2);
  const phase = iPow(order);
  return { re: phase.re * mag, im: phase.im * mag };
}

/**
 * Fourier transform of the mother wavelet at angular frequency ω
 * (radians per unit scale).
 */
export function waveletSpectrum(wavelet: ContinuousWavelet, omega: number): Spectrum {
  switch (wavelet) {
    case 'morl': {
      const a = omega - MORLET_W0;
      const b = omega + MORLET_W0;
      return { re: Math.exp(-0.5 * a * a) + Math.exp(-0.5 * b * b), im: 0 };
    }
    case 'cmor': {
      if (omega <= 0) return { re: 0, im: 0 };
      const a = omega - MORLET_W0;
      return { re: 2 * Math.exp(-0.5 * a * a), im: 0 };
    }
    case 'mexh': {
      const w2 = omega * omega;
      return { re: (w2 / 2) * Math.exp(1 - w2 / 2), im: 0 };
    }
    case 'gaus1':
      return gaussianDerivative(1, omega);
    case 'gaus2':
      return gaussianDerivative(2, omega);
    case 'shan': {
      const lo = 2 * Math.PI * (SHANNON_CENTER - SHANNON_BANDWIDTH / 2);
      const hi = 2 * Math.PI * (SHANNON_CENTER + SHANNON_BANDWIDTH / 2);
      return { re: omega > lo && omega < hi ? 2 : 0, im: 0 };
    }
  }
}

/**
 * Centre frequency in cycles per unit scale: the peak of the wavelet's
 * spectrum divided by 2π. Frequency of scale s is cf·fs/s.
 */
export function centralFrequency(wavelet: ContinuousWavelet): number {
  switch (wavelet) {
    case 'morl':
    case 'cmor':
      return MORLET_W0 / (2 * Math.PI);
    case 'mexh':
    case 'gaus2':
      return Math.SQRT2 / (2 * Math.PI);
    case 'gaus1':
      return 1 / (2 * Math.PI);
    case 'shan':
      return SHANNON_CENTER;
  }
}

/** Scale (in samples) whose centre frequency is `frequency` Hz. */
export function frequencyToScale(wavelet: ContinuousWavelet, frequency: number, sampleRate: number): number {
  return (centralFrequency(wavelet) * sampleRate) / frequency;
}

/**
 * CWT of a real signal at the given scales (in samples). Rows follow the
 * order of `scales`.
 */
export function cwt(
  signal: ArrayLike<number>,
  scales: ArrayLike<number>,
  wavelet: ContinuousWavelet,
): CWTResult {
  const N = signal.length;
  const nfft = nextPow2(Math.max(2, 2 * N));
  const spectrum = fft(signal, nfft);

  const omegas = new Float64Array(nfft);
  for (let k = 0; k < nfft; k++) omegas[k] = binAngularFrequency(k, nfft);

  const re: Float64Array[] = [];
  const im: Float64Array[] = [];
  const prodRe = new Float64Array(nfft);
  const prodIm = new Float64Array(nfft);

  for (let s = 0; s < scales.length; s++) {
    const scale = scales[s]!;
    for (let k = 0; k < nfft; k++) {
      const psi = waveletSpectrum(wavelet, scale * omegas[k]!);
      const xr = spectrum.re[k]!;
      const xi = spectrum.im[k]!;
      // X̂ · conj(Ψ̂)
      prodRe[k] = xr * psi.re + xi * psi.im;
      prodIm[k] = xi * psi.re - xr * psi.im;
    }
    ifftInPlace(prodRe, prodIm);
    re.push(prodRe.slice(0, N));
    im.push(prodIm.slice(0, N));
  }

  return { re, im, scales: Float64Array.from(scales) };
}
