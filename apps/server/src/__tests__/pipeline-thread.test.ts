import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { ThreadedExecutor } from '@wavescope/analysis'
import type { Channel } from '@wavescope/signal-core'
import { Pipeline } from '../pipeline.js'

// Thread start-up compiles the sources it imports.
const THREAD_TIMEOUT = 30_000

function discard<T>(channel: Channel<T>): void {
  for (let v = channel.tryReceive(); v !== undefined; v = channel.tryReceive()) {
    // queued before the timed run
  }
}

describe('Pipeline with a transform thread', () => {
  let executor: ThreadedExecutor

  beforeAll(() => {
    executor = new ThreadedExecutor({ logLevel: 'error' })
  })

  afterAll(async () => {
    await executor.close()
  })

  it('keeps chunks on schedule while full-size frames are analysed', async () => {
    const sampleRate = 2000
    const chunkLength = 256
    const p = new Pipeline({
      sources: [],
      executor,
      settings: { sampleRate, chunkLength, windowSeconds: 4, frameRate: 8 },
      historySeconds: 10,
    })
    await p.reloadPlugins()
    // A full 4 s window, so every frame is a 128-row scalogram of 8000 samples.
    p.ingest({ samples: Float32Array.from({ length: 8000 }, (_, i) => Math.sin(i / 10)), startTime: 0, sampleRate })
    expect(await p.analyzeNow()).toBeDefined()
    const framesBefore = p.getStatus().framesPublished
    discard(p.chunks)

    p.play()
    await p.start()
    const arrivals: number[] = []
    const until = performance.now() + 2000
    while (performance.now() < until) {
      if ((await p.chunks.receive()) === undefined) break
      arrivals.push(performance.now())
    }
    await p.stop()

    const gaps = arrivals.slice(1).map((t, i) => t - (arrivals[i] ?? t))
    const period = (chunkLength / sampleRate) * 1000
    expect(p.getStatus().framesPublished - framesBefore).toBeGreaterThanOrEqual(1)
    expect(arrivals.length).toBeGreaterThanOrEqual(10)
    expect(Math.max(...gaps)).toBeLessThan(period * 2.5)
  }, THREAD_TIMEOUT)
})
