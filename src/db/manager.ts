import { PGlite } from '@electric-sql/pglite'
import { drizzle, type PgliteDatabase } from 'drizzle-orm/pglite'
import { readdir, readFile } from 'fs/promises'
import { join } from 'path'
import { fileURLToPath } from 'url'
import * as schema from './schema'

export type AppDatabase = PgliteDatabase<typeof schema>

export interface DatabaseConfig {
  dataDir?: string // undefined for in-memory mode
  debug?: boolean // log every statement Drizzle issues
  migrationDir?: string // directory of plain .sql migrations
  autoMigrate?: boolean // whether to run migrations on initialize
}

export interface QueryResult<T = unknown> {
  rows: T[]
  rowCount: number
}

export interface Transaction {
  query<T>(sql: string, params?: unknown[]): Promise<QueryResult<T>>
  execute(sql: string, params?: unknown[]): Promise<void>
}

const DEFAULT_MIGRATION_DIR = fileURLToPath(new URL('./migrations', import.meta.url))

const MIGRATIONS_TABLE = 'schema_migrations'

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class DatabaseManager {
  private pglite: PGlite | null = null
  private db: AppDatabase | null = null
  private config: DatabaseConfig
  private isInitialized = false

  constructor(config: DatabaseConfig = {}) {
    this.config = {
      autoMigrate: true,
      migrationDir: DEFAULT_MIGRATION_DIR,
      ...config
    }
  }

  /**
   * Open the database and, unless disabled, apply pending migrations
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      return
    }

    try {
      this.pglite = new PGlite(this.config.dataDir)
      await this.pglite.waitReady

      this.db = drizzle(this.pglite, {
        ...(this.config.debug !== undefined && { logger: this.config.debug }),
        schema,
      })

      if (this.config.autoMigrate) {
        await this.runMigrations()
      }

      this.isInitialized = true
    } catch (error) {
      throw new Error(`Failed to initialize database: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error })
    }
  }

  /**
   * Get the Drizzle database instance
   */
  getDb(): AppDatabase {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.')
    }
    return this.db
  }

  /**
   * Get the PGlite instance
   */
  getPGlite(): PGlite {
    if (!this.pglite) {
      throw new Error('Database not initialized. Call initialize() first.')
    }
    return this.pglite
  }

  /**
   * Execute a raw SQL query. Values are always passed as bound parameters.
   */
  async query<T = unknown>(sqlQuery: string, params: unknown[] = []): Promise<QueryResult<T>> {
    const pglite = this.getPGlite()

    try {
      const result = await pglite.query<T>(sqlQuery, params)
      return {
        rows: result.rows,
        rowCount: result.rows.length,
      }
    } catch (error) {
      throw new Error(`Query failed: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error })
    }
  }

  /**
   * Execute a SQL statement without returning results
   */
  async execute(sqlQuery: string, params: unknown[] = []): Promise<void> {
    const pglite = this.getPGlite()

    try {
      if (params.length > 0) {
        await pglite.query(sqlQuery, params)
      } else {
        // exec accepts several statements at once, which migration files need
        await pglite.exec(sqlQuery)
      }
    } catch (error) {
      throw new Error(`Execute failed: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error })
    }
  }

  /**
   * Execute a function within a database transaction.
   * BEGIN and COMMIT go over the single shared connection, so this is for
   * start-up work such as migrations, never for per-request use.
   */
  async transaction<T>(callback: (tx: Transaction) => Promise<T>): Promise<T> {
    await this.execute('BEGIN')

    try {
      const result = await callback({
        query: this.query.bind(this),
        execute: this.execute.bind(this),
      })
      await this.execute('COMMIT')
      return result
    } catch (error) {
      await this.execute('ROLLBACK')
      throw error
    }
  }

  /**
   * Apply every migration file that has not been recorded yet, in file name order.
   *
   * @returns The names of the migrations applied by this call
   */
  async runMigrations(): Promise<string[]> {
    const migrationDir = this.config.migrationDir ?? DEFAULT_MIGRATION_DIR

    let files: string[]
    try {
      files = (await readdir(migrationDir)).filter(file => file.endsWith('.sql')).sort()
    } catch (error) {
      if (isMissingDirectory(error)) {
        return []
      }
      throw new Error(`Migration failed: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error })
    }

    await this.execute(`
      CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `)

    const recorded = await this.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE}`)
    const alreadyApplied = new Set(recorded.rows.map(row => row.name))
    const applied: string[] = []

    for (const file of files) {
      if (alreadyApplied.has(file)) {
        continue
      }

      const statements = await readFile(join(migrationDir, file), 'utf-8')
      await this.transaction(async tx => {
        await tx.execute(statements)
        await tx.execute(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file])
      })
      applied.push(file)
    }

    return applied
  }

  /**
   * Check if database is initialized
   */
  isReady(): boolean {
    return this.isInitialized && this.pglite !== null && this.db !== null
  }

  async healthCheck(): Promise<{ status: 'healthy' | 'unhealthy'; details?: string }> {
    if (!this.isReady()) {
      return { status: 'unhealthy', details: 'Database not initialized' }
    }

    try {
      await this.query('SELECT 1 as health_check')
      return { status: 'healthy' }
    } catch (error) {
      return {
        status: 'unhealthy',
        details: error instanceof Error ? error.message : 'Unknown error'
      }
    }
  }

  /**
   * Close the database connection
   */
  async close(): Promise<void> {
    if (this.pglite) {
      await this.pglite.close()
      this.pglite = null
      this.db = null
      this.isInitialized = false
    }
  }
}
