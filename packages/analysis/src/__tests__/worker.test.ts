import { describe, it, expect } from 'vitest';
import type { PluginInfo, TransformPlugin, TransformResult } from '@wavescope/types';
import { SharedParams } from '@wavescope/config';
import { createLogger, type LogLevel } from '@wavescope/shared';
import { RingBuffer } from '@wavescope/signal-core';
import { AnalysisWorker } from '../worker.js';
import type { TransformExecutor, TransformJob } from '../executor/types.js';

const firstSample: TransformPlugin = {
  describeParameters: () => [],
  transform: (samples, sampleRate, params) => ({
    image: [samples.slice(0, 1)],
    yAxis: Float64Array.of(0),
    xAxis: Float64Array.of(0),
    yLabel: 'x',
    meta: { length: samples.length, sampleRate, params },
  }),
};

const throwing: TransformPlugin = {
  describeParameters: () => [],
  transform: () => {
    throw new Error('boom');
  },
};

function info(id: string, capability: TransformPlugin): PluginInfo {
  return { id, metadata: { id, name: id, kind: 'test', version: '1', description: '' }, capability };
}

function setup(pluginId = 'test:first') {
  const params = new SharedParams({ sampleRate: 100, windowSeconds: 1, frameRate: 4, pluginId }, { gain: 2 });
  const plugins = new Map([
    ['test:first', info('test:first', firstSample)],
    ['test:throwing', info('test:throwing', throwing)],
  ]);
  const history = new RingBuffer(1000);
  history.append(Float32Array.from({ length: 250 }, (_, i) => i));
  const results: TransformResult[] = [];
  const statuses: string[] = [];
  const lines: Array<{ msg: string; level: LogLevel }> = [];
  const worker = new AnalysisWorker({
    params,
    registry: { get: (id) => plugins.get(id) },
    history: () => history,
    publish: (result) => results.push(result),
    status: (message) => statuses.push(message),
    logger: createLogger('analysis', {
      sink: (line, level) => lines.push({ msg: JSON.parse(line).msg, level }),
    }),
  });
  return { params, history, results, statuses, lines, worker };
}

describe('AnalysisWorker.step', () => {
  it('transforms the most recent window with the snapshot parameters', async () => {
    const s = setup();
    const result = await s.worker.step();

    expect(result).toBeDefined();
    expect(s.results).toHaveLength(1);
    // 1 s at 100 Hz → the last 100 of 250 samples
    expect(result?.meta).toEqual({ length: 100, sampleRate: 100, params: { gain: 2 } });
    expect(result?.image[0]?.[0]).toBe(150);
    expect(s.worker.published).toBe(1);
    expect(s.statuses).toEqual([]);
  });

  it('clamps the window to the minimum length', async () => {
    const s = setup();
    s.params.update({ windowSeconds: 0.01 });
    expect((await s.worker.step())?.meta['length']).toBe(16);
  });

  it('reads the history through the provider on every frame', async () => {
    const s = setup();
    const buffers = [new RingBuffer(8), new RingBuffer(8)];
    buffers[1]!.append([7, 8]);
    let calls = 0;
    const worker = new AnalysisWorker({
      params: s.params,
      registry: { get: () => info('test:first', firstSample) },
      history: () => buffers[Math.min(calls++, 1)]!,
      publish: () => {},
    });
    expect((await worker.step())?.meta['length']).toBe(0);
    expect((await worker.step())?.meta['length']).toBe(2);
  });

  it('reports a missing plugin once until the status changes', async () => {
    const s = setup('test:missing');
    await s.worker.step();
    await s.worker.step();
    await s.worker.step();
    expect(s.statuses).toEqual(['Transform plugin not found: test:missing']);
    expect(s.results).toEqual([]);

    s.params.update({ pluginId: 'test:first' });
    await s.worker.step();
    s.params.update({ pluginId: 'test:missing' });
    await s.worker.step();
    expect(s.statuses).toEqual([
      'Transform plugin not found: test:missing',
      'Transform plugin not found: test:missing',
    ]);
  });

  it('turns a transform error into a status message', async () => {
    const s = setup('test:throwing');
    expect(await s.worker.step()).toBeUndefined();
    expect(s.statuses).toEqual(['Transform error (test:throwing): boom']);
    expect(s.lines.filter((l) => l.level === 'error').map((l) => l.msg)).toEqual(['transform failed']);
  });
});

describe('AnalysisWorker with an executor', () => {
  function recordingExecutor(reply: (job: TransformJob) => TransformResult): TransformExecutor & { jobs: TransformJob[] } {
    const jobs: TransformJob[] = [];
    return {
      jobs,
      run: async (job) => {
        jobs.push(job);
        await new Promise((resolve) => setTimeout(resolve, 0));
        return reply(job);
      },
      reload: async () => {},
      close: async () => {},
    };
  }

  it('hands the window to the executor and publishes its reply', async () => {
    const s = setup();
    const executor = recordingExecutor((job) => ({
      image: [job.samples.slice(-1)],
      yAxis: Float64Array.of(0),
      xAxis: Float64Array.of(0),
      yLabel: 'remote',
      meta: {},
    }));
    const worker = new AnalysisWorker({
      params: s.params,
      registry: { get: (id) => (id === 'test:first' ? info('test:first', throwing) : undefined) },
      history: () => s.history,
      publish: (result) => s.results.push(result),
      executor,
    });

    const result = await worker.step();
    expect(executor.jobs).toHaveLength(1);
    expect(executor.jobs[0]).toMatchObject({ pluginId: 'test:first', sampleRate: 100, params: { gain: 2 } });
    expect(executor.jobs[0]?.samples).toHaveLength(100);
    expect(result?.yLabel).toBe('remote');
    expect(result?.image[0]?.[0]).toBe(249);
    expect(s.results).toEqual([result]);
  });

  it('reports a rejected run like a transform error', async () => {
    const s = setup();
    const statuses: string[] = [];
    const worker = new AnalysisWorker({
      params: s.params,
      registry: { get: () => info('test:first', firstSample) },
      history: () => s.history,
      publish: () => {},
      status: (message) => statuses.push(message),
      executor: recordingExecutor(() => {
        throw new Error('Transform thread closed');
      }),
    });

    expect(await worker.step()).toBeUndefined();
    expect(statuses).toEqual(['Transform error (test:first): Transform thread closed']);
  });
});

describe('AnalysisWorker loop', () => {
  it('subtracts the frame time from the pause', async () => {
    const s = setup();
    let clock = 0;
    const slow: TransformPlugin = {
      describeParameters: () => [],
      transform: (samples, sampleRate, params) => {
        clock += 100;
        return firstSample.transform(samples, sampleRate, params);
      },
    };
    const sleeps: number[] = [];
    let stopping: Promise<void> | undefined;
    const worker: AnalysisWorker = new AnalysisWorker({
      params: s.params,
      registry: { get: () => info('test:first', slow) },
      history: () => s.history,
      publish: () => {},
      now: () => clock,
      sleep: async (ms) => {
        sleeps.push(ms);
        stopping = worker.stop();
      },
    });

    await worker.start();
    await stopping;
    // frameRate 4: 250 ms period, 100 ms of it spent transforming
    expect(sleeps).toEqual([150]);
    expect(worker.lastDurationMs).toBe(100);
  });

  it('runs a frame per tick and sleeps out the rest of 1/frameRate', async () => {
    const s = setup();
    const sleeps: number[] = [];
    let stopping: Promise<void> | undefined;
    const worker: AnalysisWorker = new AnalysisWorker({
      params: s.params,
      registry: { get: () => info('test:first', firstSample) },
      history: () => s.history,
      publish: (result) => s.results.push(result),
      now: () => 0,
      sleep: async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 3) stopping = worker.stop();
      },
    });

    expect(worker.state).toBe('idle');
    await worker.start();
    await stopping;

    expect(worker.state).toBe('stopped');
    expect(sleeps).toEqual([250, 250, 250]);
    expect(s.results).toHaveLength(3);
  });

  it('treats a frame rate below one as one frame per second', async () => {
    const s = setup();
    const params = new SharedParams({ frameRate: 0, pluginId: 'test:first' });
    const sleeps: number[] = [];
    let stopping: Promise<void> | undefined;
    const worker: AnalysisWorker = new AnalysisWorker({
      params,
      registry: { get: () => info('test:first', firstSample) },
      history: () => s.history,
      publish: () => {},
      now: () => 0,
      sleep: async (ms) => {
        sleeps.push(ms);
        stopping = worker.stop();
      },
    });
    await worker.start();
    await stopping;
    expect(sleeps).toEqual([1000]);
  });

  it('keeps running when every transform throws', async () => {
    const s = setup('test:throwing');
    let ticks = 0;
    let stopping: Promise<void> | undefined;
    const worker: AnalysisWorker = new AnalysisWorker({
      params: s.params,
      registry: { get: () => info('test:throwing', throwing) },
      history: () => s.history,
      publish: () => {},
      status: (message) => s.statuses.push(message),
      sleep: async () => {
        ticks++;
        if (ticks === 4) stopping = worker.stop();
      },
    });
    await worker.start();
    await stopping;
    expect(ticks).toBe(4);
    expect(s.statuses).toEqual(['Transform error (test:throwing): boom']);
  });

  it('returns the running promise when started twice', async () => {
    const s = setup();
    let stopping: Promise<void> | undefined;
    const worker: AnalysisWorker = new AnalysisWorker({
      params: s.params,
      registry: { get: () => undefined },
      history: () => s.history,
      publish: () => {},
      sleep: async () => {
        stopping = worker.stop();
      },
    });
    const first = worker.start();
    expect(worker.start()).toBe(first);
    await first;
    await stopping;
    expect(worker.state).toBe('stopped');
  });
});
