import { Hono } from 'hono'
import type { DatabaseManager } from '../db/manager'
import type { AppEnv } from '../types/app'

/**
 * Liveness and readiness endpoints. Readiness is only mounted with a database.
 */
export function createHealthRoutes(dbManager?: DatabaseManager): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  app.get('/', c => {
    return c.json({
      status: 'ok',
      time: new Date().toISOString(),
    })
  })

  if (dbManager) {
    app.get('/ready', async c => {
      const database = await dbManager.healthCheck()

      if (database.status !== 'healthy') {
        console.error('Readiness check failed:', database.details)
        return c.json({ status: 'unavailable', database: database.status }, 503)
      }

      return c.json({ status: 'ok', database: database.status })
    })
  }

  return app
}
