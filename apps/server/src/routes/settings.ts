import { Hono } from 'hono'
import { settingsPatchSchema } from '@wavescope/shared'
import type { Pipeline } from '../pipeline.js'
import { parseBody, isResponse } from '../lib/validate.js'

export function settingsRoutes(pipeline: Pipeline): Hono {
  const routes = new Hono()

  /** GET /settings — current pipeline settings */
  routes.get('/', (c) => c.json({ settings: pipeline.params.getSettings() }))

  /** PATCH /settings — partial update; a pluginId switches the transform */
  routes.patch('/', async (c) => {
    const patch = await parseBody(c, settingsPatchSchema)
    if (isResponse(patch)) return patch

    if (!pipeline.updateSettings(patch)) {
      return c.json({ error: `Unknown transform plugin: ${patch.pluginId}` }, 404)
    }
    return c.json({ settings: pipeline.params.getSettings() })
  })

  return routes
}
