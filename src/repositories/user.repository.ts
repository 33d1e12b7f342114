import { asc, count, eq } from 'drizzle-orm'
import { users, type AppDatabase, type DatabaseManager, type User } from '../db'
import { StorageError } from '../middleware/error.middleware'

/**
 * Persistence contract for users. "Not found" is reported as null or false;
 * every other failure is thrown as a StorageError.
 */
export interface UserRepository {
  create(name: string, dob: string, signal?: AbortSignal): Promise<User>
  getById(id: number, signal?: AbortSignal): Promise<User | null>
  list(limit: number, offset: number, signal?: AbortSignal): Promise<User[]>
  count(signal?: AbortSignal): Promise<number>
  update(id: number, name: string, dob: string, signal?: AbortSignal): Promise<User | null>
  delete(id: number, signal?: AbortSignal): Promise<boolean>
}

/**
 * UserRepository backed by the users table through Drizzle ORM.
 * Each method issues exactly one statement with bound parameters.
 */
export class DrizzleUserRepository implements UserRepository {
  private dbManager: DatabaseManager

  constructor(dbManager: DatabaseManager) {
    this.dbManager = dbManager
  }

  async create(name: string, dob: string, signal?: AbortSignal): Promise<User> {
    const created = await this.run('create user', signal, async db => {
      const [row] = await db.insert(users).values({ name, dob }).returning()
      return row
    })

    if (!created) {
      throw new StorageError('Failed to create user')
    }
    return created
  }

  async getById(id: number, signal?: AbortSignal): Promise<User | null> {
    return this.run('get user', signal, async db => {
      const [row] = await db.select().from(users).where(eq(users.id, id))
      return row ?? null
    })
  }

  async list(limit: number, offset: number, signal?: AbortSignal): Promise<User[]> {
    return this.run('list users', signal, async db =>
      db.select().from(users).orderBy(asc(users.id)).limit(limit).offset(offset)
    )
  }

  async count(signal?: AbortSignal): Promise<number> {
    return this.run('count users', signal, async db => {
      const [row] = await db.select({ total: count() }).from(users)
      return row?.total ?? 0
    })
  }

  async update(id: number, name: string, dob: string, signal?: AbortSignal): Promise<User | null> {
    return this.run('update user', signal, async db => {
      const [row] = await db
        .update(users)
        .set({ name, dob, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning()
      return row ?? null
    })
  }

  async delete(id: number, signal?: AbortSignal): Promise<boolean> {
    return this.run('delete user', signal, async db => {
      const deleted = await db.delete(users).where(eq(users.id, id)).returning({ id: users.id })
      return deleted.length > 0
    })
  }

  /**
   * Run one statement, honouring the caller's abort signal before and after it.
   * Driver errors are logged and rethrown with a message safe for clients.
   */
  private async run<T>(
    operation: string,
    signal: AbortSignal | undefined,
    statement: (db: AppDatabase) => Promise<T>
  ): Promise<T> {
    try {
      signal?.throwIfAborted()
      const result = await statement(this.dbManager.getDb())
      signal?.throwIfAborted()
      return result
    } catch (error) {
      console.error(`Failed to ${operation}:`, error)
      throw new StorageError(`Failed to ${operation}`, { cause: error })
    }
  }
}
