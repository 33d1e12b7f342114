import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest'
import { z } from 'zod'
import { createApp } from '../app'
import { DatabaseManager } from '../db/manager'
import { DefaultUserService } from '../services/user.service'
import { InMemoryUserRepository } from '../../test/fakes/in-memory-user.repository'

describe('Health Routes', () => {
  let dbManager: DatabaseManager

  beforeAll(async () => {
    dbManager = new DatabaseManager({ autoMigrate: false })
    await dbManager.initialize()
  })

  afterAll(async () => {
    await dbManager.close()
  })

  const createTestApp = (withDatabase: boolean) =>
    createApp({
      userService: new DefaultUserService(new InMemoryUserRepository()),
      ...(withDatabase && { dbManager }),
      logger: false
    })

  it('should report liveness with the current time', async () => {
    const res = await createTestApp(false).request('/health')

    expect(res.status).toBe(200)
    const body = z.object({ status: z.string(), time: z.string() }).parse(await res.json())
    expect(body.status).toBe('ok')
    expect(Number.isNaN(Date.parse(body.time))).toBe(false)
    expect(res.headers.get('X-Request-ID')).not.toBeNull()
  })

  it('should report readiness when the database answers', async () => {
    const res = await createTestApp(true).request('/health/ready')

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok', database: 'healthy' })
  })

  it('should answer 503 when the database does not', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    vi.spyOn(dbManager, 'healthCheck').mockResolvedValueOnce({ status: 'unhealthy', details: 'gone' })

    const res = await createTestApp(true).request('/health/ready')

    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ status: 'unavailable', database: 'unhealthy' })
    vi.restoreAllMocks()
  })

  it('should not expose readiness without a database', async () => {
    const res = await createTestApp(false).request('/health/ready')

    expect(res.status).toBe(404)
  })
})
