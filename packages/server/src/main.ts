/**
 * wirehttp Server Entry Point
 * Reads configuration from the environment (and .env) and starts the server
 */

import 'dotenv/config'
import { createLogger } from '@wirehttp/shared/logger'
import { loadServerConfig, toServerOptions } from './config'
import { corsMiddleware, errorHandlerMiddleware, loggerMiddleware } from './core/middleware'
import { createLoggerSink } from './events'
import { WireServer } from './server'

async function start(): Promise<void> {
  const config = loadServerConfig()
  const logger = createLogger({
    level: config.logLevel,
    name: 'wirehttp',
    enableJson: config.logJson,
    enableColor: !config.logJson,
  })

  const server = new WireServer({
    ...toServerOptions(config),
    events: createLoggerSink(logger.child({ component: 'engine' })),
  })

  server.use(loggerMiddleware(logger.child({ component: 'http' })))
  if (config.enableCors) {
    server.use(corsMiddleware())
  }
  server.use(errorHandlerMiddleware())

  const startTime = Date.now()
  server.get('/health', ctx => {
    ctx.json(200, {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - startTime) / 1000),
    })
  })

  if (config.staticRoot) {
    server.serveStatic(config.staticPrefix, config.staticRoot)
    logger.info(`Serving ${config.staticRoot} at ${config.staticPrefix}`)
  }

  await server.listen()

  // Graceful shutdown
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down server...`)
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', error instanceof Error ? error : undefined)
        process.exit(1)
      }
    )
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

start().catch(error => {
  console.error('Failed to start server:', error)
  process.exit(1)
})
