#!/usr/bin/env node

/**
 * Applies pending SQL migrations to the configured database directory
 */

import { pathToFileURL } from 'url'
import { DatabaseManager } from '../src/db/manager'
import { loadConfig } from '../src/utils/config'

export async function migrateDatabase(): Promise<string[]> {
  const config = loadConfig()

  const dbManager = new DatabaseManager({
    dataDir: config.DATABASE_DIR,
    autoMigrate: false
  })

  try {
    await dbManager.initialize()
    return await dbManager.runMigrations()
  } finally {
    await dbManager.close()
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  migrateDatabase()
    .then(applied => {
      if (applied.length === 0) {
        console.warn('✅ Database is up to date')
      } else {
        applied.forEach(name => console.warn(`✅ Applied ${name}`))
      }
    })
    .catch(error => {
      console.error('❌ Migration failed:', error)
      process.exit(1)
    })
}
