import { z } from 'zod'
import type { ComponentEntry, PipelineSettings, SavedConfiguration } from '@wavescope/types'
import { pickParamValues } from './params.js'

/** Transform keys written by older presets that no plugin reads any more. */
export const OBSOLETE_TRANSFORM_KEYS = ['use_legacy', 'scales_min', 'scales_max', 'n_scales'] as const

const objectSchema = z.record(z.unknown())
const positiveNumber = z.coerce.number().finite().positive()

const componentEntrySchema = z.object({
  kind: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  enabled: z.boolean().optional(),
  params: z.unknown().optional(),
})

export interface ParsedConfiguration {
  config: SavedConfiguration
  /** Human-readable notes about anything skipped or defaulted. */
  issues: string[]
}

type GlobalKey = keyof SavedConfiguration['globals']

// Current key first, then the spellings older presets used.
const GLOBAL_ALIASES: Record<GlobalKey, readonly string[]> = {
  sample_rate: ['sample_rate', 'fs'],
  chunk_length: ['chunk_length', 'chunk_size'],
  window_seconds: ['window_seconds', 'view_window_sec'],
  frame_rate: ['frame_rate', 'scalogram_fps'],
  amplitude_clip: ['amplitude_clip'],
}

function asObject(raw: unknown): Record<string, unknown> | undefined {
  const parsed = objectSchema.safeParse(raw)
  return parsed.success && !Array.isArray(raw) ? parsed.data : undefined
}

function readGlobal(
  globals: Record<string, unknown>,
  key: GlobalKey,
  fallback: number,
  issues: string[],
  allowZero = false,
): number {
  for (const alias of GLOBAL_ALIASES[key]) {
    if (!(alias in globals)) continue
    const schema = allowZero ? z.coerce.number().finite().min(0) : positiveNumber
    const parsed = schema.safeParse(globals[alias])
    if (parsed.success) return parsed.data
    issues.push(`globals.${alias} is invalid; using ${fallback}`)
    return fallback
  }
  return fallback
}

/**
 * Parse a saved configuration leniently.
 *
 * Missing or malformed globals fall back to `fallback`, malformed component
 * entries are skipped, and obsolete transform keys are dropped. Never throws.
 */
export function parseSavedConfiguration(raw: unknown, fallback: PipelineSettings): ParsedConfiguration {
  const issues: string[] = []
  const root = asObject(raw)
  if (!root) {
    issues.push('Configuration is not an object; using defaults')
  }
  const data = root ?? {}

  const globals = asObject(data['globals']) ?? {}
  const chunkLength = readGlobal(globals, 'chunk_length', fallback.chunkLength, issues)
  const config: SavedConfiguration = {
    globals: {
      sample_rate: readGlobal(globals, 'sample_rate', fallback.sampleRate, issues),
      chunk_length: Math.max(1, Math.round(chunkLength)),
      window_seconds: readGlobal(globals, 'window_seconds', fallback.windowSeconds, issues),
      frame_rate: readGlobal(globals, 'frame_rate', fallback.frameRate, issues),
      amplitude_clip: readGlobal(globals, 'amplitude_clip', fallback.amplitudeClip, issues, true),
    },
    transform: { plugin_id: fallback.pluginId, params: {} },
    components: [],
  }

  const transform = asObject(data['transform']) ?? asObject(data['wavelet'])
  if (transform) {
    const pluginId = z.string().min(1).safeParse(transform['plugin_id'])
    if (pluginId.success) config.transform.plugin_id = pluginId.data
    else if ('plugin_id' in transform) issues.push(`transform.plugin_id is invalid; using ${fallback.pluginId}`)

    const { values, dropped } = pickParamValues(transform['params'])
    for (const key of OBSOLETE_TRANSFORM_KEYS) delete values[key]
    for (const key of dropped) issues.push(`transform.params.${key} is not a valid value; dropped`)
    config.transform.params = values
  }

  const components = data['components']
  if (components !== undefined && !Array.isArray(components)) {
    issues.push('components is not a list; ignored')
  }
  if (Array.isArray(components)) {
    components.forEach((item, i) => {
      const parsed = componentEntrySchema.safeParse(item)
      const kind = parsed.success ? parsed.data.kind ?? parsed.data.type : undefined
      if (!parsed.success || kind === undefined) {
        issues.push(`components[${i}] is malformed; skipped`)
        return
      }
      const { values, dropped } = pickParamValues(parsed.data.params)
      for (const key of dropped) issues.push(`components[${i}].params.${key} is not a valid value; dropped`)
      const entry: ComponentEntry = { kind, enabled: parsed.data.enabled ?? true, params: values }
      config.components.push(entry)
    })
  }

  return { config, issues }
}
