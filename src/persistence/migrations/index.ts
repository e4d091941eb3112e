/**
 * Schema migrations for the state database.
 *
 * Applied versions are recorded in `schema_migrations`. Each pending
 * migration runs in its own transaction together with its record, so a crash
 * mid-upgrade leaves the database at the last complete version.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ConductorError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { initialSchemaMigration } from './001-initial-schema.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  version: number
  name: string
  up(db: BetterSqlite3Database): void
}

/** In version order */
export const MIGRATIONS: readonly Migration[] = [initialSchemaMigration]

export const LATEST_SCHEMA_VERSION = Math.max(...MIGRATIONS.map((m) => m.version))

/** Raised for a state database written by a newer release */
export class SchemaVersionError extends ConductorError {
  constructor(found: number) {
    super(
      `State database schema version ${String(found)} is newer than the supported version ${String(LATEST_SCHEMA_VERSION)}`,
      'SCHEMA_VERSION',
      { found, supported: LATEST_SCHEMA_VERSION },
    )
    this.name = 'SchemaVersionError'
  }
}

function ensureMigrationTable(db: BetterSqlite3Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)
}

/** Highest applied version, 0 for a fresh database */
export function currentSchemaVersion(db: BetterSqlite3Database): number {
  ensureMigrationTable(db)
  const row = db.prepare('SELECT COALESCE(MAX(version), 0) AS version FROM schema_migrations').get() as {
    version: number
  }
  return row.version
}

/**
 * Apply every migration above the current version.
 *
 * @returns the versions applied by this call
 * @throws {SchemaVersionError} when the database is ahead of this release
 */
export function runMigrations(db: BetterSqlite3Database): number[] {
  const current = currentSchemaVersion(db)
  if (current > LATEST_SCHEMA_VERSION) {
    throw new SchemaVersionError(current)
  }

  const record = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
  const applied: number[] = []

  for (const migration of MIGRATIONS) {
    if (migration.version <= current) continue
    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, migration.name)
    })()
    applied.push(migration.version)
    logger.info({ version: migration.version, name: migration.name }, 'Migration applied')
  }

  return applied
}
