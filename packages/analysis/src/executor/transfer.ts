import type { TransformResult } from '@wavescope/types';

/**
 * Buffers of a result that can be moved rather than copied. Each buffer is
 * listed once; shared memory is left to the structured clone.
 */
export function transferList(result: TransformResult): ArrayBuffer[] {
  const buffers = new Set<ArrayBuffer>();
  for (const view of [...result.image, result.yAxis, result.xAxis]) {
    if (view.buffer instanceof ArrayBuffer) buffers.add(view.buffer);
  }
  return [...buffers];
}
