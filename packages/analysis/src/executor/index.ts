export { InlineExecutor } from './inline.js';
export { ThreadedExecutor, type ThreadedExecutorOptions } from './threaded.js';
export { transferList } from './transfer.js';
export type { TransformExecutor, TransformJob } from './types.js';
