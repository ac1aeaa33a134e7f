import type { ParamValues, TransformResult } from '@wavescope/types';

/** One frame's worth of work, addressed by plugin id. */
export interface TransformJob {
  pluginId: string;
  samples: Float32Array;
  sampleRate: number;
  params: ParamValues;
}

/** Runs transforms by plugin id, on the calling thread or elsewhere. */
export interface TransformExecutor {
  run(job: TransformJob): Promise<TransformResult>;
  /** Rescan plugins wherever the executor keeps its own table. */
  reload(): Promise<void>;
  close(): Promise<void>;
}
