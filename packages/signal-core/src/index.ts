// ---------------------------------------------------------------------------
// @wavescope/signal-core — Barrel Export
// ---------------------------------------------------------------------------
// Pure-TypeScript numerics and streaming primitives for the analysis
// pipeline. No I/O.

export type {
  PRNG,
  DiscreteWavelet,
  DWTResult,
  PacketNode,
  ContinuousWavelet,
  CWTResult,
} from './types.js';

export { createPRNG, createGaussian } from './types.js';

export * from './fourier/index.js';
export * from './wavelets/index.js';
export * from './streaming/index.js';

export { stretchToLength } from './util/interpolate.js';
