// Application assembly
import { Hono } from 'hono'
import { requestId } from 'hono/request-id'
import type { DatabaseManager } from './db/manager'
import { corsMiddleware, errorHandler, loggerMiddleware, notFoundHandler, type CorsOptions, type LoggerOptions } from './middleware'
import { createHealthRoutes, createUserRoutes } from './routes'
import type { UserService } from './services/user.service'
import type { AppEnv } from './types/app'
import { API_PREFIX, REQUEST_ID_HEADER } from './utils/constants'

export interface AppOptions {
  userService: UserService
  dbManager?: DatabaseManager // enables the readiness check
  cors?: CorsOptions
  logger?: LoggerOptions | false
}

export function createApp(options: AppOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  // Reuse the caller's X-Request-ID or generate one; echoed on every response
  app.use('*', requestId({ headerName: REQUEST_ID_HEADER }))

  if (options.logger !== false) {
    app.use('*', loggerMiddleware(options.logger))
  }

  app.use('*', corsMiddleware(options.cors))

  app.onError(errorHandler)
  app.notFound(notFoundHandler)

  app.route('/health', createHealthRoutes(options.dbManager))
  app.route(`${API_PREFIX}/users`, createUserRoutes(options.userService))

  return app
}
