import type { ParamValues, Schema } from './params.js'

/**
 * Output of one transform call.
 *
 * `image[row][col]`: rows are frequency/scale/node index, columns are time.
 * Every call returns fresh arrays; callers own them.
 */
export interface TransformResult {
  image: Float32Array[]
  /** Physical value per row; meaning depends on `yLabel`. */
  yAxis: Float64Array
  /** Seconds per column. */
  xAxis: Float64Array
  /** `"Hz"` when `yAxis` holds frequencies, otherwise an ordinal tag. */
  yLabel: string
  meta: Record<string, unknown>
}

/** Swappable time-frequency analysis capability. */
export interface TransformPlugin {
  describeParameters(): Schema
  transform(samples: Float32Array, sampleRate: number, params: ParamValues): TransformResult
}

export interface PluginMetadata {
  id: string
  name: string
  kind: string
  version: string
  description: string
}

export interface PluginInfo {
  id: string
  metadata: PluginMetadata
  capability: TransformPlugin
}
