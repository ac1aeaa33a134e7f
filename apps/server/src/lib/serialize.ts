import type { Chunk, TransformResult } from '@wavescope/types'

export interface ChunkBody {
  samples: number[]
  startTime: number
  sampleRate: number
}

export interface ResultBody {
  image: number[][]
  yAxis: number[]
  xAxis: number[]
  yLabel: string
  meta: Record<string, unknown>
}

/** Typed arrays serialize as index maps in JSON; send plain arrays instead. */
export function chunkBody(chunk: Chunk): ChunkBody {
  return { samples: Array.from(chunk.samples), startTime: chunk.startTime, sampleRate: chunk.sampleRate }
}

export function resultBody(result: TransformResult): ResultBody {
  return {
    image: result.image.map((row) => Array.from(row)),
    yAxis: Array.from(result.yAxis),
    xAxis: Array.from(result.xAxis),
    yLabel: result.yLabel,
    meta: result.meta,
  }
}
