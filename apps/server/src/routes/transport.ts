import { Hono } from 'hono'
import type { Pipeline } from '../pipeline.js'

export function transportRoutes(pipeline: Pipeline): Hono {
  const routes = new Hono()

  const state = () => ({
    paused: pipeline.engine.isPaused(),
    sampleIndex: pipeline.clock.sampleIndex(),
    historySize: pipeline.historySize(),
  })

  /** POST /transport/start — reset the clock, clear history and play */
  routes.post('/start', (c) => {
    pipeline.restart()
    return c.json(state())
  })

  routes.post('/play', (c) => {
    pipeline.play()
    return c.json(state())
  })

  routes.post('/pause', (c) => {
    pipeline.pause()
    return c.json(state())
  })

  /** POST /transport/reset — rewind the clock; history and play state are kept */
  routes.post('/reset', (c) => {
    pipeline.resetClock()
    return c.json(state())
  })

  return routes
}
