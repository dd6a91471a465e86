import type Database from 'better-sqlite3'
import { SCHEMA_SQL } from './schema'

interface Migration {
  version: number
  description: string
  sql: string
}

/** Ordered by version. A migration never changes once released; add a new one instead. */
const MIGRATIONS: readonly Migration[] = [{ version: 1, description: 'runs and run steps', sql: SCHEMA_SQL }]

const LATEST_SCHEMA_VERSION = MIGRATIONS.reduce((latest, migration) => Math.max(latest, migration.version), 0)

export function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare('SELECT COALESCE(MAX(version), 0) AS version FROM schema_migrations')
    .get() as { version: number } | undefined

  return row?.version ?? 0
}

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `)

  const currentVersion = getSchemaVersion(db)
  if (currentVersion > LATEST_SCHEMA_VERSION) {
    throw new Error(
      `Ledger schema version (${currentVersion}) is newer than this build of dubflow supports (${LATEST_SCHEMA_VERSION})`,
    )
  }

  const record = db.prepare('INSERT INTO schema_migrations(version, description, applied_at) VALUES (?, ?, ?)')
  const pending = MIGRATIONS.filter((migration) => migration.version > currentVersion)
  const applyPending = db.transaction(() => {
    for (const migration of pending) {
      db.exec(migration.sql)
      record.run(migration.version, migration.description, new Date().toISOString())
    }
  })

  applyPending()
}
