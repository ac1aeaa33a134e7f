import { describe, it, expect } from 'vitest'
import type { PipelineSettings } from '@wavescope/types'
import {
  settingsPatchSchema,
  pluginMetadataSchema,
  addComponentSchema,
  updateComponentSchema,
  componentIndexParam,
  pickParamValues,
  parseSavedConfiguration,
  transformResultSchema,
  transformThreadRequestSchema,
  transformThreadReplySchema,
} from '../schemas/index.js'

const FALLBACK: PipelineSettings = {
  sampleRate: 2000,
  chunkLength: 256,
  amplitudeClip: 0,
  windowSeconds: 4,
  frameRate: 8,
  pluginId: 'builtin:cwt_morlet',
}

// ─── Settings ───────────────────────────────────────────────────────────────

describe('settingsPatchSchema', () => {
  it('accepts a partial patch', () => {
    const result = settingsPatchSchema.safeParse({ sampleRate: 8000 })
    expect(result.success).toBe(true)
  })

  it('rejects a non-positive sample rate', () => {
    expect(settingsPatchSchema.safeParse({ sampleRate: 0 }).success).toBe(false)
  })

  it('rejects a fractional chunk length', () => {
    expect(settingsPatchSchema.safeParse({ chunkLength: 12.5 }).success).toBe(false)
  })

  it('rejects unknown keys', () => {
    expect(settingsPatchSchema.safeParse({ fs: 2000 }).success).toBe(false)
  })
})

// ─── Plugin metadata ────────────────────────────────────────────────────────

describe('pluginMetadataSchema', () => {
  it('defaults the description', () => {
    const result = pluginMetadataSchema.parse({ id: 'x', name: 'X', kind: 'CWT', version: '1.0' })
    expect(result.description).toBe('')
  })

  it('requires an id', () => {
    expect(pluginMetadataSchema.safeParse({ name: 'X', kind: 'CWT', version: '1' }).success).toBe(false)
  })
})

// ─── Control bodies ─────────────────────────────────────────────────────────

describe('control schemas', () => {
  it('accepts a known component kind', () => {
    expect(addComponentSchema.safeParse({ kind: 'chirp', params: { f0: 5 } }).success).toBe(true)
  })

  it('rejects an unknown component kind', () => {
    expect(addComponentSchema.safeParse({ kind: 'square' }).success).toBe(false)
  })

  it('requires at least one field on update', () => {
    expect(updateComponentSchema.safeParse({}).success).toBe(false)
    expect(updateComponentSchema.safeParse({ enabled: false }).success).toBe(true)
  })

  it('coerces the index path parameter', () => {
    expect(componentIndexParam.parse({ index: '3' })).toEqual({ index: 3 })
    expect(componentIndexParam.safeParse({ index: '-1' }).success).toBe(false)
  })
})

describe('pickParamValues', () => {
  it('keeps scalars and string lists, drops everything else', () => {
    const { values, dropped } = pickParamValues({
      a: 1,
      b: 'x',
      c: true,
      d: ['p', 'q'],
      e: { nested: 1 },
      f: null,
      g: [1, 2],
    })
    expect(values).toEqual({ a: 1, b: 'x', c: true, d: ['p', 'q'] })
    expect(dropped).toEqual(['e', 'f', 'g'])
  })

  it('returns nothing for non-objects', () => {
    expect(pickParamValues('nope')).toEqual({ values: {}, dropped: [] })
  })
})

// ─── Saved configuration ────────────────────────────────────────────────────

describe('parseSavedConfiguration', () => {
  it('reads the current format', () => {
    const { config, issues } = parseSavedConfiguration({
      globals: { sample_rate: 4000, chunk_length: 128, window_seconds: 2, frame_rate: 10 },
      transform: { plugin_id: 'builtin:dwt_wpt', params: { mode: 'DWT' } },
      components: [{ kind: 'sine', enabled: false, params: { frequency: 12 } }],
    }, FALLBACK)

    expect(issues).toEqual([])
    expect(config.globals).toEqual({
      sample_rate: 4000,
      chunk_length: 128,
      window_seconds: 2,
      frame_rate: 10,
      amplitude_clip: 0,
    })
    expect(config.transform).toEqual({ plugin_id: 'builtin:dwt_wpt', params: { mode: 'DWT' } })
    expect(config.components).toEqual([{ kind: 'sine', enabled: false, params: { frequency: 12 } }])
  })

  it('accepts legacy spellings', () => {
    const { config } = parseSavedConfiguration({
      globals: { fs: 1000, chunk_size: 64, view_window_sec: 3, scalogram_fps: 5 },
      wavelet: { plugin_id: 'builtin:cwt_morlet', params: { n_freqs: 64, scales_min: 1, n_scales: 10 } },
      components: [{ type: 'noise', params: { sigma: 0.3 } }],
    }, FALLBACK)

    expect(config.globals.sample_rate).toBe(1000)
    expect(config.globals.chunk_length).toBe(64)
    expect(config.globals.window_seconds).toBe(3)
    expect(config.globals.frame_rate).toBe(5)
    expect(config.transform.params).toEqual({ n_freqs: 64 })
    expect(config.components).toEqual([{ kind: 'noise', enabled: true, params: { sigma: 0.3 } }])
  })

  it('falls back on invalid globals and reports them', () => {
    const { config, issues } = parseSavedConfiguration({ globals: { sample_rate: -5 } }, FALLBACK)
    expect(config.globals.sample_rate).toBe(2000)
    expect(issues).toEqual(['globals.sample_rate is invalid; using 2000'])
  })

  it('skips malformed component entries', () => {
    const { config, issues } = parseSavedConfiguration({
      components: [42, { enabled: true }, { kind: 'chirp' }],
    }, FALLBACK)
    expect(config.components).toEqual([{ kind: 'chirp', enabled: true, params: {} }])
    expect(issues).toEqual([
      'components[0] is malformed; skipped',
      'components[1] is malformed; skipped',
    ])
  })

  it('uses defaults for a non-object', () => {
    const { config, issues } = parseSavedConfiguration('garbage', FALLBACK)
    expect(config.globals.sample_rate).toBe(2000)
    expect(config.transform.plugin_id).toBe('builtin:cwt_morlet')
    expect(config.components).toEqual([])
    expect(issues).toEqual(['Configuration is not an object; using defaults'])
  })
})

// ─── Plugin results and thread messages ─────────────────────────────────────

describe('transformResultSchema', () => {
  it('returns copies of typed arrays', () => {
    const row = Float32Array.of(1, 2)
    const axis = Float64Array.of(0, 0.5)
    const parsed = transformResultSchema.parse({ image: [row], yAxis: Float64Array.of(0), xAxis: axis, yLabel: 'x' })

    expect(parsed.image[0]).not.toBe(row)
    expect(parsed.xAxis).not.toBe(axis)
    row[0] = 9
    expect(parsed.image[0]?.[0]).toBe(1)
    expect(parsed.meta).toEqual({})
  })
})

describe('transform thread messages', () => {
  it('requires samples as a Float32Array', () => {
    const base = { type: 'transform', id: 1, pluginId: 'p', sampleRate: 10, params: {} }
    expect(transformThreadRequestSchema.safeParse({ ...base, samples: Float32Array.of(1) }).success).toBe(true)
    expect(transformThreadRequestSchema.safeParse({ ...base, samples: [1] }).success).toBe(false)
  })

  it('parses each reply kind', () => {
    expect(transformThreadReplySchema.parse({ type: 'error', id: 3, message: 'boom' })).toEqual({ type: 'error', id: 3, message: 'boom' })
    expect(transformThreadReplySchema.parse({ type: 'reloaded', id: 4, loaded: 2, failed: 0 }).type).toBe('reloaded')
    expect(transformThreadReplySchema.safeParse({ type: 'result', id: 5, result: { image: [[1]] } }).success).toBe(false)
  })
})
