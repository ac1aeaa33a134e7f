// ---------------------------------------------------------------------------
// Gaussian white noise
// ---------------------------------------------------------------------------

import type { ParamValues, Schema } from '@wavescope/types';
import { readNumber } from '@wavescope/shared';
import { createGaussian, createPRNG } from '@wavescope/signal-core';
import { SignalComponent } from './component.js';

export const NOISE_SCHEMA: Schema = [
  {
    key: 'mean', label: 'Mean (μ)', type: 'float', default: 0, min: -5, max: 5, step: 0.01,
    description: 'Expected value of the white Gaussian noise.',
    examples: ['0: noise around zero', '0.2: adds an offset'],
  },
  {
    key: 'sigma', label: 'Std. deviation (σ)', type: 'float', default: 0.2, min: 0, max: 5, step: 0.01,
    description: 'Standard deviation; sets the noise strength.',
    examples: ['0.05: faint', '0.5: strong'],
  },
  {
    key: 'seed', label: 'Seed (0 = random)', type: 'int', default: 0, min: 0, max: 10_000, step: 1,
    description: 'Random seed. A non-zero seed makes the noise reproducible.',
    examples: ['0: a different realisation every run', '123: identical noise for identical settings'],
  },
];

export interface NoiseParams {
  mean: number;
  sigma: number;
  seed: number;
}

export class NoiseComponent extends SignalComponent<NoiseParams> {
  readonly kind = 'noise';
  readonly name = 'Gaussian noise';
  private gaussian: () => number = createGaussian(Math.random);
  private lastSeed: number | null = null;

  schema(): Schema {
    return NOISE_SCHEMA;
  }

  protected parse(values: ParamValues): NoiseParams {
    return {
      mean: readNumber(values, 'mean', 0),
      sigma: readNumber(values, 'sigma', 0.2),
      seed: readNumber(values, 'seed', 0),
    };
  }

  protected render(out: Float64Array): void {
    const { mean, sigma, seed } = this.params;
    if (seed !== this.lastSeed) {
      this.lastSeed = seed;
      this.gaussian = createGaussian(seed === 0 ? Math.random : createPRNG(seed));
    }
    for (let i = 0; i < out.length; i++) {
      out[i] = mean + sigma * this.gaussian();
    }
  }
}
