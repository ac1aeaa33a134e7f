import { Hono } from 'hono'
import type { Pipeline } from '../pipeline.js'
import { readJson, isResponse } from '../lib/validate.js'
import { chunkBody, resultBody } from '../lib/serialize.js'

/** Saved configuration, latest outputs and the CSV export. */
export function dataRoutes(pipeline: Pipeline): Hono {
  const routes = new Hono()

  /** GET /config — the running setup in the saved-configuration format */
  routes.get('/config', (c) => c.json(pipeline.captureConfiguration()))

  /** PUT /config — apply a saved configuration; skipped items come back as issues */
  routes.put('/config', async (c) => {
    const raw = await readJson(c)
    if (isResponse(raw)) return raw

    const { issues } = pipeline.applyConfiguration(raw)
    return c.json({ issues, config: pipeline.captureConfiguration() })
  })

  routes.get('/chunk/latest', (c) => {
    const chunk = pipeline.getLatestChunk()
    if (!chunk) return c.json({ error: 'No chunk generated yet.' }, 404)
    return c.json(chunkBody(chunk))
  })

  routes.get('/result/latest', (c) => {
    const result = pipeline.getLatestResult()
    if (!result) return c.json({ error: 'No analysis frame yet.' }, 404)
    return c.json(resultBody(result))
  })

  /** GET /export.csv — current analysis window as `t_sec,x` */
  routes.get('/export.csv', (c) => {
    c.header('Content-Type', 'text/csv; charset=utf-8')
    c.header('Content-Disposition', 'attachment; filename="signal_window.csv"')
    return c.body(pipeline.exportWindowCsv())
  })

  return routes
}
