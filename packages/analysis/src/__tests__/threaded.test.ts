import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { fileURLToPath } from 'node:url';
import { BUILTIN_DWT_ID } from '@wavescope/config';
import { DwtWptPlugin } from '../plugins/dwt-wpt.js';
import { ThreadedExecutor } from '../executor/threaded.js';
import { transferList } from '../executor/transfer.js';

const FIXTURES = fileURLToPath(new URL('./fixtures', import.meta.url));
// Thread start-up compiles the sources it imports.
const THREAD_TIMEOUT = 30_000;

function ramp(length: number): Float32Array {
  return Float32Array.from({ length }, (_, i) => Math.sin(i / 5) + 0.1 * (i % 7));
}

describe('ThreadedExecutor', () => {
  let executor: ThreadedExecutor;

  beforeAll(() => {
    executor = new ThreadedExecutor({ pluginDir: FIXTURES, logLevel: 'error' });
  });

  afterAll(async () => {
    await executor.close();
  });

  it('runs a built-in transform on the thread with the same output', async () => {
    const params = { mode: 'DWT', wavelet: 'haar', maxlevel: 3 };
    const remote = await executor.run({ pluginId: BUILTIN_DWT_ID, samples: ramp(64), sampleRate: 64, params });
    const local = new DwtWptPlugin().transform(ramp(64), 64, params);

    expect(remote.meta).toEqual(local.meta);
    expect(remote.image.map((row) => Array.from(row))).toEqual(local.image.map((row) => Array.from(row)));
    expect(Array.from(remote.xAxis)).toEqual(Array.from(local.xAxis));
  }, THREAD_TIMEOUT);

  it('loads plugins from the directory, under both ids', async () => {
    const samples = Float32Array.of(-1, 0.5);
    const byId = await executor.run({ pluginId: 'example:abs_envelope', samples, sampleRate: 2, params: { gain: 2 } });
    expect(byId.image.map((row) => Array.from(row))).toEqual([[2, 1]]);
    expect(Array.from(byId.xAxis)).toEqual([0, 0.5]);
    expect(byId.yLabel).toBe('envelope');

    const byFile = await executor.run({ pluginId: 'plugin:good', samples, sampleRate: 2, params: {} });
    expect(byFile.image.map((row) => Array.from(row))).toEqual([[1, 0.5]]);
  }, THREAD_TIMEOUT);

  it('rejects an unknown plugin id', async () => {
    await expect(executor.run({ pluginId: 'plugin:nope', samples: ramp(32), sampleRate: 32, params: {} }))
      .rejects.toThrow('Transform plugin not found: plugin:nope');
  }, THREAD_TIMEOUT);

  it('answers a request it cannot validate with an error', async () => {
    await expect(executor.run({ pluginId: BUILTIN_DWT_ID, samples: ramp(32), sampleRate: 32, params: { maxlevel: Number.NaN } }))
      .rejects.toThrow('Malformed transform request (params.maxlevel');
  }, THREAD_TIMEOUT);

  it('rescans the directory on reload', async () => {
    await expect(executor.reload()).resolves.toBeUndefined();
    const result = await executor.run({ pluginId: 'plugin:good', samples: Float32Array.of(-3), sampleRate: 1, params: {} });
    expect(result.image.map((row) => Array.from(row))).toEqual([[3]]);
  }, THREAD_TIMEOUT);

  it('rejects every request once closed', async () => {
    const closing = new ThreadedExecutor({ logLevel: 'error' });
    await closing.close();
    await expect(closing.run({ pluginId: BUILTIN_DWT_ID, samples: ramp(32), sampleRate: 32, params: {} }))
      .rejects.toThrow('Transform thread closed');
  }, THREAD_TIMEOUT);
});

describe('transferList', () => {
  it('lists each underlying buffer once', () => {
    const shared = new Float32Array(8);
    const result = {
      image: [shared.subarray(0, 4), shared.subarray(4)],
      yAxis: Float64Array.of(0, 1),
      xAxis: new Float64Array(4),
      yLabel: 'x',
      meta: {},
    };
    const buffers = transferList(result);
    expect(buffers).toHaveLength(3);
    expect(buffers[0]).toBe(shared.buffer);
  });
});
