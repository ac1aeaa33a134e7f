import { Hono } from 'hono'
import { COMPONENT_CATALOG } from '@wavescope/generator'
import { addComponentSchema, componentIndexParam, updateComponentSchema } from '@wavescope/shared'
import type { Pipeline } from '../pipeline.js'
import { parseBody, parseParams, isResponse } from '../lib/validate.js'

export function componentRoutes(pipeline: Pipeline): Hono {
  const routes = new Hono()
  const { engine } = pipeline

  const list = () => engine.snapshotComponents().map((component, index) => ({ index, ...component }))

  /** GET /components/kinds — every component kind with its parameter schema */
  routes.get('/kinds', (c) => {
    const kinds = Object.values(COMPONENT_CATALOG).map(({ kind, name, schema }) => ({ kind, name, schema }))
    return c.json({ kinds })
  })

  /** GET /components — current scene */
  routes.get('/', (c) => c.json({ components: list() }))

  /** POST /components — append a component */
  routes.post('/', async (c) => {
    const data = await parseBody(c, addComponentSchema)
    if (isResponse(data)) return data

    const index = engine.addComponent(data.kind, data.params, data.enabled)
    return c.json({ index, components: list() }, 201)
  })

  /** PATCH /components/:index — toggle and/or retune one component */
  routes.patch('/:index', async (c) => {
    const target = parseParams(c, componentIndexParam)
    if (isResponse(target)) return target
    const data = await parseBody(c, updateComponentSchema)
    if (isResponse(data)) return data

    if (target.index >= engine.componentCount()) {
      return c.json({ error: 'Component not found.' }, 404)
    }
    if (data.enabled !== undefined) engine.setComponentEnabled(target.index, data.enabled)
    if (data.params !== undefined) engine.updateComponentParams(target.index, data.params)
    return c.json({ components: list() })
  })

  /** DELETE /components/:index */
  routes.delete('/:index', (c) => {
    const target = parseParams(c, componentIndexParam)
    if (isResponse(target)) return target

    if (!engine.removeComponent(target.index)) {
      return c.json({ error: 'Component not found.' }, 404)
    }
    return c.json({ components: list() })
  })

  return routes
}
