import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'
import { runMigrations } from './migrate'
import { RunDao, RunStepDao } from './dao'

export interface DatabaseContext {
  dbPath: string
  db: Database.Database
  runDao: RunDao
  runStepDao: RunStepDao
}

const IN_MEMORY = ':memory:'

/**
 * Open (or create) the run ledger. Each call returns an independent connection;
 * pass `':memory:'` for a throwaway ledger.
 */
export function openDatabase(options: { dbPath: string }): DatabaseContext {
  const { dbPath } = options
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  const db = new Database(dbPath)
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL')
  }
  db.pragma('foreign_keys = ON')

  runMigrations(db)

  return {
    dbPath,
    db,
    runDao: new RunDao(db),
    runStepDao: new RunStepDao(db),
  }
}

export function closeDatabase(context: DatabaseContext): void {
  context.db.close()
}

export { RunDao, RunStepDao } from './dao'
export * from './types'
