/**
 * Mutation query functions for the SQLite persistence layer.
 *
 * A build's report is stored as one row per mutation; `position` keeps the
 * report order so a stored report reads back exactly as it was written.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Mutation row type
// ---------------------------------------------------------------------------

export interface MutationRow {
  build_id: string
  position: number
  class_name: string
  mutated_method: string
  line_number: number
  mutation_index: number
  mutator: string
  /** 0 or 1 */
  detected: number
  source_file: string | null
  status: string | null
  killing_test: string | null
  description: string | null
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert all mutation rows for a build. Callers wrap this in a transaction
 * together with the build insert.
 */
export function insertMutations(db: BetterSqlite3Database, rows: readonly MutationRow[]): void {
  const stmt = db.prepare<
    [
      string,
      number,
      string,
      string,
      number,
      number,
      string,
      number,
      string | null,
      string | null,
      string | null,
      string | null,
    ]
  >(`
    INSERT INTO mutations (
      build_id, position, class_name, mutated_method, line_number,
      mutation_index, mutator, detected, source_file, status,
      killing_test, description
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `)

  for (const row of rows) {
    stmt.run(
      row.build_id,
      row.position,
      row.class_name,
      row.mutated_method,
      row.line_number,
      row.mutation_index,
      row.mutator,
      row.detected,
      row.source_file,
      row.status,
      row.killing_test,
      row.description,
    )
  }
}

/**
 * Fetch all mutation rows for a build, in report order.
 */
export function getMutationsForBuild(db: BetterSqlite3Database, buildId: string): MutationRow[] {
  return db
    .prepare<[string], MutationRow>(
      'SELECT * FROM mutations WHERE build_id = ? ORDER BY position ASC',
    )
    .all(buildId)
}
