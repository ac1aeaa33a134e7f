// ---------------------------------------------------------------------------
// @wavescope/generator — Barrel Export
// ---------------------------------------------------------------------------

export { LogicalClock, type NowFn } from './clock.js';
export * from './components/index.js';
export { SignalEngine, type GlobalParams } from './engine.js';
export { GeneratorLoop, type GeneratorLoopOptions, type SleepFn } from './loop.js';
