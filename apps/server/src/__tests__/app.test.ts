import { describe, it, expect, beforeEach } from 'vitest'
import type { Hono } from 'hono'
import { BUILTIN_CWT_ID, BUILTIN_DWT_ID } from '@wavescope/config'
import { createLogger, type LogLevel } from '@wavescope/shared'
import { Pipeline } from '../pipeline.js'
import { createApp } from '../app.js'

let pipeline: Pipeline
let app: Hono
let lines: Array<{ level: LogLevel; entry: unknown }>

beforeEach(async () => {
  pipeline = new Pipeline({
    sources: [],
    settings: { sampleRate: 100, chunkLength: 10, windowSeconds: 1, frameRate: 8 },
    historySeconds: 2,
  })
  await pipeline.reloadPlugins()
  lines = []
  const logger = createLogger('test', { sink: (line, level) => lines.push({ level, entry: JSON.parse(line) }) })
  app = createApp(pipeline, { logger, nodeEnv: 'test' })
})

function send(method: string, path: string, body?: unknown) {
  return app.request(path, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  })
}

describe('health and status', () => {
  it('reports degraded while the loops are idle', async () => {
    const res = await app.request('/health')
    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ status: 'degraded', checks: { generator: 'idle', analysis: 'idle' } })
  })

  it('returns pipeline status', async () => {
    const res = await app.request('/status')
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ paused: true, history: { size: 0, capacity: 200 }, sampleIndex: 0 })
  })

  it('logs one line per request', async () => {
    await app.request('/status')
    expect(lines.map((l) => l.entry)).toEqual([
      expect.objectContaining({ scope: 'test:http', msg: 'request', method: 'GET', path: '/status', status: 200 }),
    ])
  })

  it('returns 404 for unknown routes', async () => {
    const res = await app.request('/nope')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Not found.' })
  })
})

describe('error handling', () => {
  it('maps range errors to 400', async () => {
    app.get('/boom', () => {
      throw new RangeError('Chunk length must be a positive integer, got 0')
    })
    const res = await app.request('/boom')
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Chunk length must be a positive integer, got 0' })
  })

  it('hides unexpected errors and logs them', async () => {
    app.get('/boom', () => {
      throw new Error('disk on fire')
    })
    const res = await app.request('/boom')
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'Internal server error.' })
    const errors = lines.filter((l) => l.level === 'error').map((l) => l.entry)
    expect(errors).toEqual([expect.objectContaining({ msg: 'unhandled error', path: '/boom', error: 'disk on fire' })])
  })
})

describe('settings', () => {
  it('returns current settings', async () => {
    const res = await app.request('/settings')
    expect(await res.json()).toEqual({
      settings: {
        sampleRate: 100,
        chunkLength: 10,
        amplitudeClip: 0,
        windowSeconds: 1,
        frameRate: 8,
        pluginId: BUILTIN_CWT_ID,
      },
    })
  })

  it('applies a partial update', async () => {
    const res = await send('PATCH', '/settings', { frameRate: 4, amplitudeClip: 1.5 })
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ settings: { frameRate: 4, amplitudeClip: 1.5 } })
    expect(pipeline.engine.getGlobalParams().amplitudeClip).toBe(1.5)
  })

  it('rejects out-of-range values with field errors', async () => {
    const res = await send('PATCH', '/settings', { frameRate: 0 })
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: 'Validation failed.', fields: { frameRate: [expect.any(String)] } })
  })

  it('rejects unknown keys', async () => {
    const res = await send('PATCH', '/settings', { fs: 100 })
    expect(res.status).toBe(400)
  })

  it('returns 404 for an unknown plugin id', async () => {
    const res = await send('PATCH', '/settings', { pluginId: 'plugin:nope' })
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Unknown transform plugin: plugin:nope' })
  })
})

describe('plugins and transforms', () => {
  it('lists registered plugins', async () => {
    const res = await app.request('/plugins')
    expect(await res.json()).toMatchObject({
      current: BUILTIN_CWT_ID,
      plugins: [
        { id: BUILTIN_CWT_ID, kind: 'CWT', parameters: expect.arrayContaining([expect.objectContaining({ key: 'f_min' })]) },
        { id: BUILTIN_DWT_ID, kind: 'DWT/WPT' },
      ],
      failures: [],
    })
  })

  it('reloads plugins', async () => {
    const res = await send('POST', '/plugins/reload')
    expect(await res.json()).toEqual({ loaded: 2, failed: 0, current: BUILTIN_CWT_ID, failures: [] })
  })

  it('selects a transform with parameter overrides', async () => {
    const res = await send('PUT', '/transform', { pluginId: BUILTIN_DWT_ID, params: { mode: 'DWT' } })
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ pluginId: BUILTIN_DWT_ID, params: { mode: 'DWT', wavelet: 'db4' } })
  })

  it('returns 404 for an unknown transform', async () => {
    const res = await send('PUT', '/transform', { pluginId: 'plugin:nope' })
    expect(res.status).toBe(404)
  })

  it('merges parameters and reports dropped values', async () => {
    const res = await send('PATCH', '/transform/params', { n_freqs: 64, junk: { a: 1 } })
    expect(await res.json()).toMatchObject({ params: { n_freqs: 64, f_min: 5 }, dropped: ['junk'] })
  })
})

describe('components', () => {
  it('lists component kinds', async () => {
    const res = await app.request('/components/kinds')
    expect(await res.json()).toMatchObject({
      kinds: [{ kind: 'noise' }, { kind: 'sine' }, { kind: 'rect_pulse' }, { kind: 'gauss_pulse' }, { kind: 'chirp' }],
    })
  })

  it('adds a component', async () => {
    const res = await send('POST', '/components', { kind: 'chirp', enabled: false })
    expect(res.status).toBe(201)
    expect(await res.json()).toMatchObject({ index: 3 })
    expect(pipeline.engine.snapshotComponents()[3]).toMatchObject({ kind: 'chirp', enabled: false })
  })

  it('rejects an unknown kind', async () => {
    const res = await send('POST', '/components', { kind: 'sawtooth' })
    expect(res.status).toBe(400)
  })

  it('toggles and retunes a component', async () => {
    const res = await send('PATCH', '/components/1', { enabled: false, params: { frequency: 9 } })
    expect(res.status).toBe(200)
    expect(pipeline.engine.snapshotComponents()[1]).toMatchObject({ enabled: false, params: { frequency: 9 } })
  })

  it('requires enabled or params', async () => {
    expect((await send('PATCH', '/components/1', {})).status).toBe(400)
  })

  it('returns 404 for an index past the end', async () => {
    const res = await send('PATCH', '/components/9', { enabled: true })
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Component not found.' })
  })

  it('removes a component', async () => {
    const res = await send('DELETE', '/components/0')
    expect(await res.json()).toMatchObject({ components: [{ index: 0, kind: 'sine' }, { index: 1, kind: 'sine' }] })
  })

  it('rejects a non-numeric index', async () => {
    expect((await send('DELETE', '/components/first')).status).toBe(400)
  })
})

describe('transport', () => {
  it('start resets and plays, pause holds', async () => {
    pipeline.clock.advance(50)
    let res = await send('POST', '/transport/start')
    expect(await res.json()).toEqual({ paused: false, sampleIndex: 0, historySize: 0 })

    res = await send('POST', '/transport/pause')
    expect(await res.json()).toMatchObject({ paused: true })

    res = await send('POST', '/transport/play')
    expect(await res.json()).toMatchObject({ paused: false })
  })

  it('reset rewinds only the clock', async () => {
    pipeline.ingest({ samples: Float32Array.of(1, 2), startTime: 0, sampleRate: 100 })
    pipeline.clock.advance(20)
    const res = await send('POST', '/transport/reset')
    expect(await res.json()).toEqual({ paused: true, sampleIndex: 0, historySize: 2 })
  })
})

describe('configuration and data', () => {
  it('round-trips the saved configuration', async () => {
    const saved: unknown = await (await app.request('/config')).json()
    await send('PATCH', '/settings', { frameRate: 2 })

    const res = await send('PUT', '/config', saved)
    expect(await res.json()).toMatchObject({ issues: [], config: { globals: { frame_rate: 8 } } })
    expect(pipeline.params.getSettings().frameRate).toBe(8)
  })

  it('accepts legacy keys', async () => {
    const res = await send('PUT', '/config', { globals: { fs: 50 }, components: [] })
    expect(await res.json()).toMatchObject({ issues: [], config: { globals: { sample_rate: 50 }, components: [] } })
  })

  it('rejects a body that is not JSON', async () => {
    const res = await app.request('/config', { method: 'PUT', body: '{oops' })
    expect(res.status).toBe(400)
  })

  it('serves the latest chunk as plain arrays', async () => {
    expect((await app.request('/chunk/latest')).status).toBe(404)
    pipeline.ingest({ samples: Float32Array.of(0.25, -0.5), startTime: 1.5, sampleRate: 100 })

    const res = await app.request('/chunk/latest')
    expect(await res.json()).toEqual({ samples: [0.25, -0.5], startTime: 1.5, sampleRate: 100 })
  })

  it('serves the latest analysis frame', async () => {
    expect((await app.request('/result/latest')).status).toBe(404)
    pipeline.ingest({ samples: Float32Array.from({ length: 100 }, (_, i) => Math.sin(i)), startTime: 0, sampleRate: 100 })
    await pipeline.analyzeNow()

    const res = await app.request('/result/latest')
    expect(await res.json()).toMatchObject({ yLabel: 'Hz', meta: { mode: 'CWT' } })
  })

  it('exports the window as CSV', async () => {
    pipeline.ingest({ samples: Float32Array.of(1, 0.5), startTime: 0, sampleRate: 100 })
    const res = await app.request('/export.csv')
    expect(res.headers.get('Content-Type')).toBe('text/csv; charset=utf-8')
    expect(await res.text()).toBe('t_sec,x\n0,1\n0.01,0.5\n')
  })
})
