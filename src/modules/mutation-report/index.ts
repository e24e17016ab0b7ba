/**
 * mutation-report module — immutable report data model
 *
 * Public API re-exports for the mutation-report module.
 */

// Types
export type {
  Mutation,
  MutationStatus,
  MutationStats,
  Report,
  BuildRef,
  BuildRecord,
} from './types.js'

// Construction and queries
export {
  mutationKey,
  sameMutation,
  computeStats,
  statsFromCounts,
  assertStatsConsistent,
  createReport,
  createReportFromClasses,
  emptyReport,
  mergeReports,
  mutationsForClass,
  allMutations,
  classNames,
  statsForClass,
  sourceFiles,
} from './report.js'

// Snapshots
export {
  MutationSchema,
  MutationStatusSchema,
  ReportSnapshotSchema,
  ReportSummarySchema,
  parseReportSnapshot,
  toReportSnapshot,
} from './schemas.js'
export type { MutationInput, ReportSnapshot } from './schemas.js'
