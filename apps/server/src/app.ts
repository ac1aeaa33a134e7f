import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import { ZodError } from 'zod'
import { errorFields, silentLogger, type Logger } from '@wavescope/shared'
import type { Pipeline } from './pipeline.js'
import { requestLogger } from './lib/request-logger.js'
import { settingsRoutes } from './routes/settings.js'
import { pluginRoutes } from './routes/plugins.js'
import { componentRoutes } from './routes/components.js'
import { transportRoutes } from './routes/transport.js'
import { dataRoutes } from './routes/data.js'

export interface AppOptions {
  logger?: Logger
  corsOrigins?: string[]
  /** Stack traces are logged outside production. */
  nodeEnv?: string
}

export function createApp(pipeline: Pipeline, options: AppOptions = {}): Hono {
  const logger = options.logger ?? silentLogger
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse()
    // Out-of-range values rejected by the engine or settings store
    if (err instanceof RangeError) return c.json({ error: err.message }, 400)
    if (err instanceof ZodError) {
      return c.json({ error: 'Validation failed.', fields: err.flatten().fieldErrors }, 400)
    }

    logger.error('unhandled error', {
      method: c.req.method,
      path: c.req.path,
      ...errorFields(err, options.nodeEnv !== 'production'),
    })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger(logger.child('http')))

  // 2. CORS
  app.use(
    '*',
    cors({
      origin: options.corsOrigins ?? ['http://localhost:3000'],
      allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // ---------------------------------------------------------------------------
  // Health & status
  // ---------------------------------------------------------------------------

  app.get('/health', (c) => {
    const { generator, analysis } = pipeline.getStatus()
    const checks = { generator, analysis }
    const healthy = generator === 'running' && analysis === 'running'
    return c.json({ status: healthy ? 'healthy' : 'degraded', checks }, healthy ? 200 : 503)
  })

  app.get('/status', (c) => c.json(pipeline.getStatus()))

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.route('/settings', settingsRoutes(pipeline))
  app.route('/', pluginRoutes(pipeline))
  app.route('/components', componentRoutes(pipeline))
  app.route('/transport', transportRoutes(pipeline))
  app.route('/', dataRoutes(pipeline))

  app.get('/', (c) => c.json({ name: 'Wavescope API', version: '0.1.0' }))

  return app
}
