/**
 * BuildHistoryStore — SQLite-backed ReportProvider.
 *
 * Each recorded build stores its report as one row per mutation. Kill counts
 * are never stored: reports are rebuilt from their rows, and the summaries
 * returned by `listBuilds()` are aggregated by the query.
 *
 * The database must already be migrated (see `runMigrations`).
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { BuildHistoryError, ReportIntegrityError, ReportNotFoundError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import {
  getBuild,
  getLatestBuild,
  insertBuild,
  listBuildSummaries,
  setPreviousBuild,
} from '../../persistence/queries/builds.js'
import { getMutationsForBuild, insertMutations } from '../../persistence/queries/mutations.js'
import type { MutationRow } from '../../persistence/queries/mutations.js'
import { allMutations, createReport, statsFromCounts } from '../mutation-report/report.js'
import { MutationStatusSchema } from '../mutation-report/schemas.js'
import type { BuildRef, Mutation, MutationStats, Report } from '../mutation-report/types.js'
import type { ReportProvider } from '../report-provider/report-provider.js'

const logger = createLogger('build-history')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One entry of `listBuilds()` */
export interface BuildSummary {
  buildRef: BuildRef
  previousBuildRef?: BuildRef
  /** SQLite datetime('now') at insert, UTC */
  recordedAt: string
  stats: MutationStats
}

// ---------------------------------------------------------------------------
// Row conversion
// ---------------------------------------------------------------------------

function toRow(buildId: string, position: number, mutation: Mutation): MutationRow {
  return {
    build_id: buildId,
    position,
    class_name: mutation.className,
    mutated_method: mutation.mutatedMethod,
    line_number: mutation.lineNumber,
    mutation_index: mutation.index,
    mutator: mutation.mutator,
    detected: mutation.detected ? 1 : 0,
    source_file: mutation.sourceFile ?? null,
    status: mutation.status ?? null,
    killing_test: mutation.killingTest ?? null,
    description: mutation.description ?? null,
  }
}

function fromRow(row: MutationRow): Mutation {
  let status: Mutation['status']
  if (row.status !== null) {
    const parsed = MutationStatusSchema.safeParse(row.status)
    if (!parsed.success) {
      throw new ReportIntegrityError(
        `Stored mutation has unknown status "${row.status}" (build ${row.build_id}, position ${String(row.position)})`,
        { buildRef: row.build_id, position: row.position, status: row.status },
      )
    }
    status = parsed.data
  }

  return {
    className: row.class_name,
    mutatedMethod: row.mutated_method,
    lineNumber: row.line_number,
    index: row.mutation_index,
    mutator: row.mutator,
    detected: row.detected === 1,
    ...(row.source_file !== null ? { sourceFile: row.source_file } : {}),
    ...(status !== undefined ? { status } : {}),
    ...(row.killing_test !== null ? { killingTest: row.killing_test } : {}),
    ...(row.description !== null ? { description: row.description } : {}),
  }
}

// ---------------------------------------------------------------------------
// BuildHistoryStore
// ---------------------------------------------------------------------------

export class BuildHistoryStore implements ReportProvider {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  /**
   * Store a build's report, optionally linked to an earlier build.
   *
   * @throws {BuildHistoryError} if the build already exists or the predecessor is unknown
   */
  recordBuild(buildRef: BuildRef, report: Report, previousBuildRef?: BuildRef): void {
    const record = this._db.transaction(() => {
      if (getBuild(this._db, buildRef) !== undefined) {
        throw new BuildHistoryError(`Build already recorded: ${buildRef}`, { buildRef })
      }
      if (previousBuildRef !== undefined) {
        if (previousBuildRef === buildRef) {
          throw new BuildHistoryError(`Build ${buildRef} cannot be its own predecessor`, { buildRef })
        }
        if (getBuild(this._db, previousBuildRef) === undefined) {
          throw new BuildHistoryError(`Unknown previous build: ${previousBuildRef}`, {
            buildRef,
            previousBuildRef,
          })
        }
      }

      insertBuild(this._db, buildRef, previousBuildRef ?? null)
      const rows: MutationRow[] = []
      for (const mutation of allMutations(report)) {
        rows.push(toRow(buildRef, rows.length, mutation))
      }
      insertMutations(this._db, rows)
    })
    record()

    logger.info(
      {
        buildRef,
        previousBuildRef,
        totalMutations: report.stats.totalMutations,
        killCount: report.stats.killCount,
      },
      'Build recorded',
    )
  }

  /**
   * Link an already-recorded build to its predecessor. Each build gets at most one.
   *
   * @throws {ReportNotFoundError} if the build is unknown
   * @throws {BuildHistoryError} if the predecessor is unknown, the build is
   *   already linked, or the link would create a cycle
   */
  linkPredecessor(buildRef: BuildRef, previousBuildRef: BuildRef): void {
    const link = this._db.transaction(() => {
      const build = getBuild(this._db, buildRef)
      if (build === undefined) {
        throw new ReportNotFoundError(buildRef)
      }
      if (build.previous_build_id !== null) {
        throw new BuildHistoryError(
          `Build ${buildRef} already has a predecessor: ${build.previous_build_id}`,
          { buildRef, previousBuildRef: build.previous_build_id },
        )
      }
      if (getBuild(this._db, previousBuildRef) === undefined) {
        throw new BuildHistoryError(`Unknown previous build: ${previousBuildRef}`, {
          buildRef,
          previousBuildRef,
        })
      }

      // Walk back from the proposed predecessor; reaching buildRef means a cycle
      let cursor: string | null = previousBuildRef
      while (cursor !== null) {
        if (cursor === buildRef) {
          throw new BuildHistoryError(
            `Linking ${buildRef} to ${previousBuildRef} would create a cycle`,
            { buildRef, previousBuildRef },
          )
        }
        cursor = getBuild(this._db, cursor)?.previous_build_id ?? null
      }

      setPreviousBuild(this._db, buildRef, previousBuildRef)
    })
    link()

    logger.info({ buildRef, previousBuildRef }, 'Predecessor linked')
  }

  hasBuild(buildRef: BuildRef): boolean {
    return getBuild(this._db, buildRef) !== undefined
  }

  getReport(buildRef: BuildRef): Report {
    if (getBuild(this._db, buildRef) === undefined) {
      throw new ReportNotFoundError(buildRef)
    }
    return createReport(getMutationsForBuild(this._db, buildRef).map(fromRow))
  }

  getPredecessor(buildRef: BuildRef): BuildRef | undefined {
    return getBuild(this._db, buildRef)?.previous_build_id ?? undefined
  }

  /** Most recently recorded build, or undefined for an empty history */
  getLatestBuildId(): BuildRef | undefined {
    return getLatestBuild(this._db)?.id
  }

  /**
   * Recorded builds, oldest first.
   *
   * @param limit - keep only the newest `limit` builds
   */
  listBuilds(limit?: number): BuildSummary[] {
    return listBuildSummaries(this._db, limit).map((row) => ({
      buildRef: row.id,
      ...(row.previous_build_id !== null ? { previousBuildRef: row.previous_build_id } : {}),
      recordedAt: row.recorded_at,
      stats: statsFromCounts(row.total_mutations, row.kill_count),
    }))
  }
}
