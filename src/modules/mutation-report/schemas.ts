/**
 * Zod schemas for serialised report snapshots.
 *
 * A snapshot is the JSON form of a Report's mutation list, written by the
 * step that parses the mutation-testing tool's own output. An optional
 * `summary` block carries the counts that tool reported; it is checked
 * against the mutation list and never trusted on its own.
 */

import { z } from 'zod'
import { ReportIntegrityError } from '../../core/errors.js'
import { allMutations, assertStatsConsistent, createReport } from './report.js'
import type { Report } from './types.js'

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const MutationStatusSchema = z.enum([
  'KILLED',
  'SURVIVED',
  'NO_COVERAGE',
  'TIMED_OUT',
  'MEMORY_ERROR',
  'RUN_ERROR',
  'NON_VIABLE',
])

export const MutationSchema = z
  .object({
    className: z.string().min(1),
    mutatedMethod: z.string(),
    lineNumber: z.number().int().nonnegative(),
    index: z.number().int().nonnegative().default(0),
    mutator: z.string().min(1),
    detected: z.boolean(),
    sourceFile: z.string().optional(),
    status: MutationStatusSchema.optional(),
    killingTest: z.string().optional(),
    description: z.string().optional(),
  })
  .strict()

export const ReportSummarySchema = z
  .object({
    total: z.number(),
    killed: z.number(),
  })
  .strict()

export const ReportSnapshotSchema = z
  .object({
    mutations: z.array(MutationSchema),
    summary: ReportSummarySchema.optional(),
  })
  .strict()

export type MutationInput = z.input<typeof MutationSchema>
export type ReportSnapshot = z.infer<typeof ReportSnapshotSchema>

// ---------------------------------------------------------------------------
// Parse / serialise
// ---------------------------------------------------------------------------

/**
 * Validate a snapshot and build its Report.
 *
 * @throws {ReportIntegrityError} if the snapshot is malformed, its summary has
 *   killed > total, or its summary disagrees with the mutation list
 */
export function parseReportSnapshot(raw: unknown): Report {
  const result = ReportSnapshotSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  • ${i.path.join('.')}: ${i.message}`)
      .join('\n')
    throw new ReportIntegrityError(`Invalid report snapshot:\n${issues}`, {
      issues: result.error.issues,
    })
  }

  const { mutations, summary } = result.data
  const report = createReport(mutations)

  if (summary !== undefined) {
    assertStatsConsistent({ totalMutations: summary.total, killCount: summary.killed })
    if (summary.total !== report.stats.totalMutations || summary.killed !== report.stats.killCount) {
      throw new ReportIntegrityError(
        `Snapshot summary (${String(summary.killed)}/${String(summary.total)}) does not match its mutations (${String(report.stats.killCount)}/${String(report.stats.totalMutations)})`,
        { summary, derived: report.stats },
      )
    }
  }

  return report
}

/** Serialise a report back into snapshot form, including its summary */
export function toReportSnapshot(report: Report): ReportSnapshot {
  return {
    mutations: [...allMutations(report)].map((m) => ({ ...m })),
    summary: { total: report.stats.totalMutations, killed: report.stats.killCount },
  }
}
