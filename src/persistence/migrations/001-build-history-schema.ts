/**
 * Migration 001: Build history schema.
 *
 * Creates:
 *  - builds     (one row per recorded build, with its predecessor reference)
 *  - mutations  (the build's report, one row per mutation)
 *  - Indexes for per-class lookups and predecessor walks
 *
 * Kill counts are not stored; they are derived from `mutations` when read.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const buildHistorySchemaMigration: Migration = {
  version: 1,
  name: '001-build-history-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS builds (
        id                TEXT PRIMARY KEY,
        previous_build_id TEXT REFERENCES builds(id),
        sequence          INTEGER NOT NULL,
        recorded_at       TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS mutations (
        build_id       TEXT    NOT NULL REFERENCES builds(id) ON DELETE CASCADE,
        position       INTEGER NOT NULL,
        class_name     TEXT    NOT NULL,
        mutated_method TEXT    NOT NULL,
        line_number    INTEGER NOT NULL,
        mutation_index INTEGER NOT NULL DEFAULT 0,
        mutator        TEXT    NOT NULL,
        detected       INTEGER NOT NULL CHECK (detected IN (0, 1)),
        source_file    TEXT,
        status         TEXT,
        killing_test   TEXT,
        description    TEXT,
        PRIMARY KEY (build_id, position)
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_builds_sequence ON builds(sequence);
      CREATE INDEX IF NOT EXISTS idx_builds_previous ON builds(previous_build_id);
      CREATE INDEX IF NOT EXISTS idx_mutations_class ON mutations(build_id, class_name);
    `)
  },
}
