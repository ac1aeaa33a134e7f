// ---------------------------------------------------------------------------
// PRNG & Gaussian Deviate Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { createPRNG, createGaussian } from '../types.js';

describe('createPRNG', () => {
  it('is deterministic per seed', () => {
    const a = createPRNG(1234);
    const b = createPRNG(1234);
    for (let i = 0; i < 50; i++) expect(a()).toBe(b());
  });

  it('differs across seeds', () => {
    const a = createPRNG(1);
    const b = createPRNG(2);
    const seqA = Array.from({ length: 8 }, () => a());
    const seqB = Array.from({ length: 8 }, () => b());
    expect(seqA).not.toEqual(seqB);
  });

  it('stays in [0, 1)', () => {
    const rng = createPRNG(99);
    for (let i = 0; i < 5000; i++) {
      const u = rng();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    }
  });
});

describe('createGaussian', () => {
  it('produces roughly standard normal deviates', () => {
    const gauss = createGaussian(createPRNG(7));
    const n = 20000;
    let sum = 0;
    let sumSq = 0;
    for (let i = 0; i < n; i++) {
      const z = gauss();
      sum += z;
      sumSq += z * z;
    }
    const mean = sum / n;
    const variance = sumSq / n - mean * mean;
    expect(Math.abs(mean)).toBeLessThan(0.05);
    expect(Math.abs(variance - 1)).toBeLessThan(0.06);
  });

  it('replays the same sequence for the same seed', () => {
    const a = createGaussian(createPRNG(5));
    const b = createGaussian(createPRNG(5));
    for (let i = 0; i < 11; i++) expect(a()).toBe(b());
  });
});
