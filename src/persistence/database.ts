/**
 * DatabaseWrapper — owns the better-sqlite3 handle of a build history file.
 *
 * Query modules and BuildHistoryStore receive the raw handle through `db`;
 * the wrapper only decides how the file is opened and closed.
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

/** Path better-sqlite3 treats as a private in-memory database */
export const IN_MEMORY_PATH = ':memory:'

/**
 * Connection settings applied on every open. `journal_mode = WAL` is added
 * for file databases only; an in-memory database stays in "memory" mode.
 */
const CONNECTION_PRAGMAS = [
  'busy_timeout = 5000',
  'synchronous = NORMAL',
  'foreign_keys = ON',
] as const

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /** File the wrapper opens, or `:memory:` */
  get path(): string {
    return this._path
  }

  get inMemory(): boolean {
    return this._path === IN_MEMORY_PATH
  }

  /**
   * Open the database and apply the connection pragmas. No-op when open.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    const db = new BetterSqlite3(this._path)
    if (!this.inMemory) {
      db.pragma('journal_mode = WAL')
    }
    for (const pragma of CONNECTION_PRAGMAS) {
      db.pragma(pragma)
    }
    this._db = db

    logger.debug({ path: this._path }, 'Build history database opened')
  }

  /** Close the database. No-op when closed. */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'Build history database closed')
  }

  /**
   * The open better-sqlite3 handle.
   * @throws {Error} if open() has not been called
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}
