/**
 * Build query functions for the SQLite persistence layer.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements — no string interpolation, no ORM.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Build row type
// ---------------------------------------------------------------------------

export interface BuildRow {
  id: string
  previous_build_id: string | null
  sequence: number
  recorded_at: string
}

/** Build row joined with the counts derived from its mutations */
export interface BuildSummaryRow extends BuildRow {
  total_mutations: number
  kill_count: number
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert a build row. `sequence` is assigned as one past the current maximum.
 */
export function insertBuild(
  db: BetterSqlite3Database,
  id: string,
  previousBuildId: string | null,
): void {
  db.prepare<[string, string | null]>(`
    INSERT INTO builds (id, previous_build_id, sequence)
    VALUES (?, ?, (SELECT COALESCE(MAX(sequence), 0) + 1 FROM builds))
  `).run(id, previousBuildId)
}

/**
 * Fetch a single build by id. Returns undefined if not found.
 */
export function getBuild(db: BetterSqlite3Database, id: string): BuildRow | undefined {
  return db
    .prepare<[string], BuildRow>('SELECT id, previous_build_id, sequence, recorded_at FROM builds WHERE id = ?')
    .get(id)
}

/**
 * Fetch the most recently recorded build, or undefined for an empty history.
 */
export function getLatestBuild(db: BetterSqlite3Database): BuildRow | undefined {
  return db
    .prepare<[], BuildRow>(
      'SELECT id, previous_build_id, sequence, recorded_at FROM builds ORDER BY sequence DESC LIMIT 1',
    )
    .get()
}

/**
 * Set the predecessor of a build that has none yet.
 * Returns the number of rows changed (0 when the build already has one).
 */
export function setPreviousBuild(
  db: BetterSqlite3Database,
  id: string,
  previousBuildId: string,
): number {
  return db
    .prepare<[string, string]>(
      'UPDATE builds SET previous_build_id = ? WHERE id = ? AND previous_build_id IS NULL',
    )
    .run(previousBuildId, id).changes
}

/**
 * List builds in recording order (oldest first), each with its mutation
 * counts aggregated from the `mutations` table.
 */
export function listBuildSummaries(db: BetterSqlite3Database, limit?: number): BuildSummaryRow[] {
  const sql = `
    SELECT
      b.id,
      b.previous_build_id,
      b.sequence,
      b.recorded_at,
      COUNT(m.position)                  AS total_mutations,
      COALESCE(SUM(m.detected), 0)       AS kill_count
    FROM builds b
    LEFT JOIN mutations m ON m.build_id = b.id
    GROUP BY b.id
    ORDER BY b.sequence ASC
  `

  if (limit === undefined) {
    return db.prepare<[], BuildSummaryRow>(sql).all()
  }

  // Keep the newest `limit` builds while still returning them oldest first
  return db
    .prepare<[number], BuildSummaryRow>(
      `SELECT * FROM (${sql} ) ORDER BY sequence DESC LIMIT ?`,
    )
    .all(limit)
    .reverse()
}
