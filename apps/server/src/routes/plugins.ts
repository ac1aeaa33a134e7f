import { Hono } from 'hono'
import { pickParamValues, selectTransformSchema } from '@wavescope/shared'
import type { Pipeline } from '../pipeline.js'
import { parseBody, readJson, isResponse } from '../lib/validate.js'

/** Plugin listing, reload and transform selection. */
export function pluginRoutes(pipeline: Pipeline): Hono {
  const routes = new Hono()

  /** GET /plugins — registered transforms with their parameter schemas */
  routes.get('/plugins', (c) => {
    const plugins = pipeline.registry.list().map((info) => ({
      ...info.metadata,
      parameters: info.capability.describeParameters(),
    }))
    return c.json({
      current: pipeline.params.getSettings().pluginId,
      plugins,
      failures: pipeline.registry.failures(),
    })
  })

  /** POST /plugins/reload — rescan built-ins and the plugin directory */
  routes.post('/plugins/reload', async (c) => {
    const summary = await pipeline.reloadPlugins()
    return c.json({ ...summary, current: pipeline.params.getSettings().pluginId, failures: pipeline.registry.failures() })
  })

  /** PUT /transform — select a transform, parameters reset to its defaults */
  routes.put('/transform', async (c) => {
    const data = await parseBody(c, selectTransformSchema)
    if (isResponse(data)) return data

    if (!pipeline.selectPlugin(data.pluginId, data.params)) {
      return c.json({ error: `Unknown transform plugin: ${data.pluginId}` }, 404)
    }
    return c.json({ pluginId: data.pluginId, params: pipeline.params.getTransformParams() })
  })

  /** PATCH /transform/params — merge parameter values into the active transform */
  routes.patch('/transform/params', async (c) => {
    const body = await readJson(c)
    if (isResponse(body)) return body

    const { values, dropped } = pickParamValues(body)
    const params = pipeline.updateTransformParams(values)
    return c.json({ params, dropped })
  })

  return routes
}
