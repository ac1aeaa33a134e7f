// ---------------------------------------------------------------------------
// @wavescope/signal-core — Signal Processing Types
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning uniform values in [0, 1). */
export type PRNG = () => number;

// ---------------------------------------------------------------------------
// Discrete wavelets
// ---------------------------------------------------------------------------

export type DiscreteWavelet = 'haar' | 'db2' | 'db4' | 'db8' | 'sym4' | 'coif1' | 'coif2';

export interface DWTResult {
  approximation: Float64Array;
  /** details[0] is level 1 (finest). */
  details: Float64Array[];
  wavelet: DiscreteWavelet;
  levels: number;
}

export interface PacketNode {
  /** Branch path from the root: 'a' = low-pass, 'd' = high-pass. */
  path: string;
  coefficients: Float64Array;
}

// ---------------------------------------------------------------------------
// Continuous wavelets
// ---------------------------------------------------------------------------

export type ContinuousWavelet = 'morl' | 'cmor' | 'mexh' | 'gaus1' | 'gaus2' | 'shan';

export interface CWTResult {
  /** Complex coefficients per scale, row-major [scale][sample]. */
  re: Float64Array[];
  im: Float64Array[];
  scales: Float64Array;
}

// ---------------------------------------------------------------------------
// PRNG
// ---------------------------------------------------------------------------

/** Seedable 32-bit xorshift PRNG. Same seed, same sequence. */
export function createPRNG(seed: number): PRNG {
  let s0 = seed | 0 || 1;
  let s1 = (seed >>> 16) ^ 0x5DEECE66D;
  if (s1 === 0) s1 = 0xDEADBEEF;
  return () => {
    let x = s0;
    const y = s1;
    s0 = y;
    x ^= x << 23;
    x ^= x >> 17;
    x ^= y;
    x ^= y >> 26;
    s1 = x;
    return ((s0 + s1) >>> 0) / 0x100000000;
  };
}

/**
 * Standard normal deviates from a uniform PRNG (Box–Muller).
 * Caches the second deviate of each pair.
 */
export function createGaussian(rng: PRNG): () => number {
  let spare: number | null = null;
  return () => {
    if (spare !== null) {
      const value = spare;
      spare = null;
      return value;
    }
    // 1 - u keeps the log argument in (0, 1].
    const u1 = 1 - rng();
    const u2 = rng();
    const r = Math.sqrt(-2 * Math.log(u1));
    spare = r * Math.sin(2 * Math.PI * u2);
    return r * Math.cos(2 * Math.PI * u2);
  };
}
