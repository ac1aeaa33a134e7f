import type { ParamValues } from './params.js'

/** One batch of generated (or captured) samples. */
export interface Chunk {
  samples: Float32Array
  /** Seconds since the logical clock was last reset. */
  startTime: number
  sampleRate: number
}

export type ComponentKind = 'noise' | 'sine' | 'rect_pulse' | 'gauss_pulse' | 'chirp'

/** Deep-copied view of one engine component. Safe to hand to other tasks. */
export interface ComponentSnapshot {
  kind: ComponentKind
  name: string
  enabled: boolean
  params: ParamValues
}

/** Loosely-typed component entry as found in saved configurations. */
export interface ComponentEntry {
  kind: string
  enabled?: boolean
  params?: ParamValues
}

/** Lifecycle shared by the generation and analysis loops. */
export type LoopState = 'idle' | 'running' | 'stopping' | 'stopped'
