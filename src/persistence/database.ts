/**
 * SQLite access for the conductor state database.
 *
 * One file (`<state_dir>/state.db`) holds the task queue, the agent status
 * records and the escalation log. Every handle is opened through
 * `openDatabase`, which applies the connection PRAGMAs and brings the schema
 * up to date, so stores never see an unmigrated database.
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { currentSchemaVersion, runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

/** Path understood by better-sqlite3 as a private in-memory database */
export const IN_MEMORY_DATABASE = ':memory:'

export const DEFAULT_BUSY_TIMEOUT_MS = 5000

export interface OpenDatabaseOptions {
  /** How long a writer waits on a lock held by another process */
  busyTimeoutMs?: number
}

// ---------------------------------------------------------------------------
// openDatabase
// ---------------------------------------------------------------------------

/**
 * Open `databasePath`, apply the PRAGMAs and run pending migrations.
 *
 * File databases use WAL so a `status` run can read while a `cycle` writes;
 * in-memory databases keep SQLite's default journal.
 */
export function openDatabase(databasePath: string, options: OpenDatabaseOptions = {}): BetterSqlite3Database {
  const db = new BetterSqlite3(databasePath)
  try {
    if (databasePath !== IN_MEMORY_DATABASE) {
      db.pragma('journal_mode = WAL')
    }
    db.pragma(`busy_timeout = ${String(options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS)}`)
    db.pragma('synchronous = NORMAL')
    db.pragma('foreign_keys = ON')
    runMigrations(db)
  } catch (err) {
    db.close()
    throw err
  }

  logger.debug(
    { path: databasePath, schemaVersion: currentSchemaVersion(db) },
    'State database opened',
  )
  return db
}

/**
 * Open an in-memory database with migrations applied.
 * Used by tests and by callers that only need transient state.
 */
export function openMemoryDatabase(): BetterSqlite3Database {
  return openDatabase(IN_MEMORY_DATABASE)
}

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

/**
 * Owns the state database handle for the lifetime of a command.
 */
export interface DatabaseService extends BaseService {
  readonly path: string
  readonly isOpen: boolean
  /**
   * Raw handle for the stores, which own their prepared statements.
   * @throws {Error} before `initialize()` or after `shutdown()`
   */
  readonly db: BetterSqlite3Database
}

export class DatabaseServiceImpl implements DatabaseService {
  readonly path: string
  private readonly _options: OpenDatabaseOptions
  private _db: BetterSqlite3Database | null = null

  constructor(databasePath: string, options: OpenDatabaseOptions = {}) {
    this.path = databasePath
    this._options = options
  }

  get isOpen(): boolean {
    return this._db !== null
  }

  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error(`State database ${this.path} is not open`)
    }
    return this._db
  }

  async initialize(): Promise<void> {
    if (this._db !== null) return
    this._db = openDatabase(this.path, this._options)
  }

  async shutdown(): Promise<void> {
    if (this._db === null) return
    this._db.close()
    this._db = null
    logger.debug({ path: this.path }, 'State database closed')
  }
}

export function createDatabaseService(databasePath: string, options: OpenDatabaseOptions = {}): DatabaseService {
  return new DatabaseServiceImpl(databasePath, options)
}
