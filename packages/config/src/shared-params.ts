import type { ParamValues, ParamsSnapshot, PipelineSettings } from '@wavescope/types'
import { pipelineSettingsSchema, settingsPatchSchema, type SettingsPatch } from '@wavescope/shared'
import { DEFAULT_SETTINGS } from './settings.js'

export type ParamsListener = (changed: ReadonlyArray<keyof PipelineSettings | 'transformParams'>) => void

const SETTING_KEYS = [
  'sampleRate',
  'chunkLength',
  'amplitudeClip',
  'windowSeconds',
  'frameRate',
  'pluginId',
] as const satisfies ReadonlyArray<keyof PipelineSettings>

function cloneValues(values: ParamValues): ParamValues {
  const out: ParamValues = {}
  for (const [key, value] of Object.entries(values)) {
    out[key] = Array.isArray(value) ? [...value] : value
  }
  return out
}

/**
 * Configuration handed from the control surface to the loops.
 *
 * Typed settings plus an open map for the selected plugin's parameters.
 * Writers replace values; readers take `snapshot()`, a deep copy, once per
 * iteration, so one iteration never mixes two writes to the same key.
 */
export class SharedParams {
  private settings: PipelineSettings
  private transformParams: ParamValues
  private readonly listeners = new Set<ParamsListener>()

  constructor(initial: Partial<PipelineSettings> = {}, transformParams: ParamValues = {}) {
    this.settings = { ...DEFAULT_SETTINGS, ...initial }
    this.transformParams = cloneValues(transformParams)
  }

  /** Copy of the current settings and transform parameters. */
  snapshot(): ParamsSnapshot {
    return {
      settings: { ...this.settings },
      transformParams: cloneValues(this.transformParams),
    }
  }

  getSettings(): PipelineSettings {
    return { ...this.settings }
  }

  /**
   * Validate and apply a partial settings update.
   * Throws a ZodError on an invalid patch; returns the keys whose value changed.
   */
  update(patch: SettingsPatch): Array<keyof PipelineSettings> {
    const parsed = settingsPatchSchema.parse(patch)
    const changed = SETTING_KEYS.filter((key) => parsed[key] !== undefined && parsed[key] !== this.settings[key])
    if (changed.length === 0) return changed

    const defined = Object.fromEntries(Object.entries(parsed).filter(([, value]) => value !== undefined))
    this.settings = pipelineSettingsSchema.parse({ ...this.settings, ...defined })
    this.notify(changed)
    return changed
  }

  getTransformParams(): ParamValues {
    return cloneValues(this.transformParams)
  }

  setTransformParams(values: ParamValues): void {
    this.transformParams = cloneValues(values)
    this.notify(['transformParams'])
  }

  /** Merge into the transform parameters without dropping other keys. */
  mergeTransformParams(values: ParamValues): void {
    this.transformParams = { ...this.transformParams, ...cloneValues(values) }
    this.notify(['transformParams'])
  }

  subscribe(listener: ParamsListener): () => void {
    this.listeners.add(listener)
    return () => { this.listeners.delete(listener) }
  }

  private notify(changed: ReadonlyArray<keyof PipelineSettings | 'transformParams'>): void {
    for (const listener of this.listeners) listener(changed)
  }
}
