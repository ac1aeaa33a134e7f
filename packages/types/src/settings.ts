import type { ComponentEntry } from './signal.js'
import type { ParamValues } from './params.js'

/** Core-controlled knobs shared between the control surface and the loops. */
export interface PipelineSettings {
  sampleRate: number
  chunkLength: number
  /** 0 disables clipping. */
  amplitudeClip: number
  windowSeconds: number
  frameRate: number
  pluginId: string
}

/** Point-in-time copy of everything the loops read. */
export interface ParamsSnapshot {
  settings: PipelineSettings
  transformParams: ParamValues
}

/** Persisted preset layout (snake_case on disk). */
export interface SavedConfiguration {
  globals: {
    sample_rate: number
    chunk_length: number
    window_seconds: number
    frame_rate: number
    amplitude_clip?: number
  }
  transform: {
    plugin_id: string
    params: ParamValues
  }
  components: ComponentEntry[]
}
