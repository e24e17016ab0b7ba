/**
 * Migration runner for the build history database.
 *
 * Applied versions are tracked in `schema_migrations`. Pending migrations run
 * in version order, each in its own transaction, so `runMigrations` can be
 * called every time a history file is opened.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { BuildHistoryError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { buildHistorySchemaMigration } from './001-build-history-schema.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  /** Unique, increasing schema version */
  version: number
  name: string
  up(db: BetterSqlite3Database): void
}

/** Every migration this release knows, in version order */
export const MIGRATIONS: readonly Migration[] = [buildHistorySchemaMigration]

export const LATEST_SCHEMA_VERSION = MIGRATIONS.reduce((max, m) => Math.max(max, m.version), 0)

/**
 * Bring the database up to LATEST_SCHEMA_VERSION.
 *
 * @throws {BuildHistoryError} if the file was written by a newer schema
 */
export function runMigrations(
  db: BetterSqlite3Database,
  migrations: readonly Migration[] = MIGRATIONS,
): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const applied = db
    .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
    .all()
    .map((row) => row.version)

  const known = migrations.reduce((max, m) => Math.max(max, m.version), 0)
  const newest = Math.max(0, ...applied)
  if (newest > known) {
    throw new BuildHistoryError(
      `Build history schema version ${String(newest)} is newer than supported version ${String(known)}`,
      { schemaVersion: newest, supportedVersion: known },
    )
  }

  const appliedVersions = new Set(applied)
  const pending = migrations
    .filter((m) => !appliedVersions.has(m.version))
    .sort((a, b) => a.version - b.version)

  if (pending.length === 0) {
    return
  }

  const recordMigration = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)',
  )

  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db)
      recordMigration.run(migration.version, migration.name)
    })()
    logger.debug({ version: migration.version, name: migration.name }, 'Migration applied')
  }
}
