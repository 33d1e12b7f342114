// Request logging middleware
import type { MiddlewareHandler } from 'hono'
import type { AppEnv } from '../types/app'
import type { LogLevel } from '../utils/config'

export interface LoggerOptions {
  logLevel?: LogLevel
  logRequests?: boolean
  logResponses?: boolean
  logHeaders?: boolean
  excludePaths?: string[]
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
}

const WRITERS: Record<LogLevel, (...data: unknown[]) => void> = {
  error: (...data) => console.error(...data),
  warn: (...data) => console.warn(...data),
  info: (...data) => console.info(...data),
  debug: (...data) => console.debug(...data)
}

export const loggerMiddleware = (options: LoggerOptions = {}): MiddlewareHandler<AppEnv> => {
  const {
    logLevel = 'info',
    logRequests = true,
    logResponses = true,
    logHeaders = false,
    excludePaths = ['/health', '/health/ready']
  } = options

  const log = (level: LogLevel, message: string, fields: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] <= LEVEL_ORDER[logLevel]) {
      WRITERS[level](message, fields)
    }
  }

  return async (c, next) => {
    const start = Date.now()
    const requestId = c.get('requestId')
    const method = c.req.method
    const path = c.req.path

    if (excludePaths.includes(path)) {
      await next()
      return
    }

    if (logRequests) {
      log('debug', `[${requestId}] → ${method} ${path}`, {
        requestId,
        method,
        path,
        ip: c.req.header('X-Forwarded-For') || c.req.header('X-Real-IP') || 'Unknown',
        userAgent: c.req.header('User-Agent') || 'Unknown',
        ...(logHeaders && { headers: Object.fromEntries(c.req.raw.headers.entries()) })
      })
    }

    await next()

    if (logResponses) {
      const duration = Date.now() - start
      const status = c.res.status
      const level: LogLevel = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info'

      log(level, `[${requestId}] ← ${method} ${path} ${status} (${duration}ms)`, {
        requestId,
        method,
        path,
        status,
        duration: `${duration}ms`,
        timestamp: new Date().toISOString()
      })
    }
  }
}
