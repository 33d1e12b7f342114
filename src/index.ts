// Main application entry point
import { serve, type ServerType } from '@hono/node-server'
import { pathToFileURL } from 'url'
import { createApp } from './app'
import { DatabaseManager } from './db/manager'
import { parseCorsOrigin } from './middleware/cors.middleware'
import { DrizzleUserRepository } from './repositories/user.repository'
import { DefaultUserService } from './services/user.service'
import { describeConfig, loadConfig } from './utils/config'

export { createApp } from './app'

export async function main(): Promise<void> {
  const config = loadConfig()

  console.warn(`🚀 ${config.APP_NAME} v${config.APP_VERSION} starting...`)
  describeConfig(config).forEach(line => console.warn(`  - ${line}`))

  const dbManager = new DatabaseManager({
    dataDir: config.DATABASE_DIR,
    debug: config.LOG_LEVEL === 'debug'
  })
  await dbManager.initialize()

  const userService = new DefaultUserService(new DrizzleUserRepository(dbManager))

  const app = createApp({
    userService,
    dbManager,
    cors: { origin: parseCorsOrigin(config.CORS_ORIGIN) },
    logger: {
      logLevel: config.LOG_LEVEL,
      logRequests: config.LOG_REQUESTS,
      logResponses: config.LOG_REQUESTS
    }
  })

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  })
  console.warn(`✅ ${config.APP_NAME} is running on http://${config.HOST}:${config.PORT}`)

  const shutdown = (signal: string) => {
    console.warn(`🛑 ${signal} received, shutting down gracefully...`)
    closeServer(server)
      .then(() => dbManager.close())
      .then(() => process.exit(0))
      .catch(error => {
        console.error('Shutdown failed:', error)
        process.exit(1)
      })
  }

  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()))
  })
}

// Start the application if this file is run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(error => {
    console.error('Failed to start:', error)
    process.exit(1)
  })
}
