import type { PipelineSettings } from '@wavescope/types'
import { pipelineSettingsSchema } from '@wavescope/shared'

/** Upper bound on samples per generated chunk; the engine preallocates this much. */
export const MAX_CHUNK = 131_072

/** Upper bound on samples handed to a transform (CWT cost grows with n · rows). */
export const MAX_WINDOW_SAMPLES = 2 ** 22

/** Smallest window requested from history; a shorter history is analysed as it is. */
export const MIN_WINDOW_SAMPLES = 16

/** Seconds of history the ring buffer keeps at the current sample rate. */
export const HISTORY_SECONDS = 60

/** Hard cap on ring buffer capacity (64 MiB of float32). */
export const MAX_HISTORY_SAMPLES = 2 ** 24

export const BUILTIN_CWT_ID = 'builtin:cwt_morlet'
export const BUILTIN_DWT_ID = 'builtin:dwt_wpt'

/** Default settings, before any environment override. */
export const DEFAULT_SETTINGS: Readonly<PipelineSettings> = Object.freeze({
  sampleRate: 2000,
  chunkLength: 256,
  amplitudeClip: 0,
  windowSeconds: 4,
  frameRate: 8,
  pluginId: BUILTIN_CWT_ID,
})

/** Environment variable → setting it overrides. */
export const SETTINGS_ENV_KEYS = {
  sampleRate: 'WAVESCOPE_SAMPLE_RATE',
  chunkLength: 'WAVESCOPE_CHUNK_LENGTH',
  windowSeconds: 'WAVESCOPE_WINDOW_SECONDS',
  frameRate: 'WAVESCOPE_FRAME_RATE',
  pluginId: 'WAVESCOPE_PLUGIN_ID',
} as const

export type EnvSource = Record<string, string | undefined>

function readNumber(env: EnvSource, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  return Number(raw)
}

/**
 * Resolve settings: environment override > default.
 * Throws on a malformed override so a bad deployment fails at startup.
 */
export function resolveSettings(env: EnvSource = process.env): PipelineSettings {
  const candidate: PipelineSettings = {
    ...DEFAULT_SETTINGS,
    sampleRate: readNumber(env, SETTINGS_ENV_KEYS.sampleRate) ?? DEFAULT_SETTINGS.sampleRate,
    chunkLength: readNumber(env, SETTINGS_ENV_KEYS.chunkLength) ?? DEFAULT_SETTINGS.chunkLength,
    windowSeconds: readNumber(env, SETTINGS_ENV_KEYS.windowSeconds) ?? DEFAULT_SETTINGS.windowSeconds,
    frameRate: readNumber(env, SETTINGS_ENV_KEYS.frameRate) ?? DEFAULT_SETTINGS.frameRate,
    pluginId: env[SETTINGS_ENV_KEYS.pluginId] || DEFAULT_SETTINGS.pluginId,
  }

  const result = pipelineSettingsSchema.safeParse(candidate)
  if (!result.success) {
    const fields = Object.keys(result.error.flatten().fieldErrors).join(', ')
    throw new Error(`Invalid pipeline settings in environment: ${fields}`)
  }
  return result.data
}

/** Samples analysed per frame for the given settings, clamped to the hard limits. */
export function windowLength(settings: Pick<PipelineSettings, 'sampleRate' | 'windowSeconds'>): number {
  const requested = Math.round(settings.windowSeconds * settings.sampleRate)
  return Math.min(MAX_WINDOW_SAMPLES, Math.max(MIN_WINDOW_SAMPLES, requested))
}

/** Ring buffer capacity holding `seconds` of history at `sampleRate`, clamped to `MAX_HISTORY_SAMPLES`. */
export function historyCapacity(sampleRate: number, seconds: number = HISTORY_SECONDS): number {
  const requested = Math.max(MIN_WINDOW_SAMPLES, Math.round(sampleRate * seconds))
  return Math.min(MAX_HISTORY_SAMPLES, requested)
}
