// ---------------------------------------------------------------------------
// @wavescope/analysis — Barrel Export
// ---------------------------------------------------------------------------
// Transform plugins, their registry and the frame loop that drives them.

export * from './plugins/index.js';
export * from './registry/index.js';
export * from './executor/index.js';
export { AnalysisWorker, type AnalysisWorkerOptions, type SleepFn } from './worker.js';
