// CORS middleware
import type { MiddlewareHandler } from 'hono'
import type { AppEnv } from '../types/app'
import { REQUEST_ID_HEADER } from '../utils/constants'

export interface CorsOptions {
  origin?: string | string[]
  methods?: string[]
  allowedHeaders?: string[]
  exposedHeaders?: string[]
  maxAge?: number
}

/**
 * Parse a comma separated CORS_ORIGIN value into the origin option
 */
export function parseCorsOrigin(value: string): string | string[] {
  const origins = value.split(',').map(origin => origin.trim()).filter(Boolean)
  if (origins.length === 0 || origins.includes('*')) {
    return '*'
  }
  return origins.length === 1 ? origins[0] ?? '*' : origins
}

export const corsMiddleware = (options: CorsOptions = {}): MiddlewareHandler<AppEnv> => {
  const {
    origin = '*',
    methods = ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders = ['Content-Type', REQUEST_ID_HEADER],
    exposedHeaders = [REQUEST_ID_HEADER],
    maxAge = 86400, // 24 hours
  } = options

  return async (c, next) => {
    const requestOrigin = c.req.header('Origin')

    if (origin === '*') {
      c.header('Access-Control-Allow-Origin', '*')
    } else if (typeof origin === 'string') {
      c.header('Access-Control-Allow-Origin', origin)
    } else if (requestOrigin && origin.includes(requestOrigin)) {
      c.header('Access-Control-Allow-Origin', requestOrigin)
      c.header('Vary', 'Origin')
    }

    c.header('Access-Control-Allow-Methods', methods.join(', '))
    c.header('Access-Control-Allow-Headers', allowedHeaders.join(', '))
    if (exposedHeaders.length > 0) {
      c.header('Access-Control-Expose-Headers', exposedHeaders.join(', '))
    }
    c.header('Access-Control-Max-Age', maxAge.toString())

    // Handle preflight requests
    if (c.req.method === 'OPTIONS') {
      return c.body(null, 204)
    }

    await next()
  }
}
