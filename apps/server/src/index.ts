import { serve } from '@hono/node-server'
import { resolveSettings } from '@wavescope/config'
import { createLogger, errorFields } from '@wavescope/shared'
import { ThreadedExecutor } from '@wavescope/analysis'
import { loadEnv } from './lib/env.js'
import { Pipeline } from './pipeline.js'
import { createApp } from './app.js'

const env = loadEnv()
const logger = createLogger('server', { level: env.LOG_LEVEL })

// Transforms run on their own thread; it loads the same plugin directory.
const executor = new ThreadedExecutor({
  pluginDir: env.PLUGIN_DIR,
  logLevel: env.LOG_LEVEL,
  logger: logger.child('transform-thread'),
})

const pipeline = new Pipeline({
  settings: resolveSettings(),
  pluginDir: env.PLUGIN_DIR,
  executor,
  historySeconds: env.HISTORY_SECONDS,
  logger: logger.child('pipeline'),
})

const app = createApp(pipeline, { logger, corsOrigins: env.CORS_ORIGINS, nodeEnv: env.NODE_ENV })

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const summary = await pipeline.start()
logger.info('plugins loaded', { ...summary })

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info('server started', { port: info.port, env: env.NODE_ENV })
})

function shutdown(signal: string): void {
  logger.info('shutdown', { signal })

  pipeline
    .stop()
    .then(() => executor.close())
    .then(
      () => server.close(() => process.exit(0)),
      (err: unknown) => {
        logger.error('pipeline stop failed', errorFields(err, true))
        process.exit(1)
      },
    )
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
