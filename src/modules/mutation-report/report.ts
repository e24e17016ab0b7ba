/**
 * Report construction and derived statistics.
 *
 * Reports are built once from a flat mutation list (or an explicit per-class
 * mapping) and frozen. Stats are recomputed from the mutations every time a
 * report is built, so they cannot drift from the data they describe.
 */

import { ReportIntegrityError } from '../../core/errors.js'
import type { Mutation, MutationStats, Report } from './types.js'

const EMPTY_MUTATIONS: readonly Mutation[] = Object.freeze([])

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/**
 * Canonical identity string for a mutation.
 *
 * Includes the `detected` flag, so the same mutation with a different
 * detection outcome yields a different key.
 */
export function mutationKey(mutation: Mutation): string {
  return JSON.stringify([
    mutation.className,
    mutation.mutatedMethod,
    mutation.lineNumber,
    mutation.index,
    mutation.mutator,
    mutation.detected,
  ])
}

/** Whether two mutations are equal by identity and detection outcome */
export function sameMutation(a: Mutation, b: Mutation): boolean {
  return mutationKey(a) === mutationKey(b)
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

/**
 * Compute aggregate stats over a mutation collection.
 */
export function computeStats(mutations: Iterable<Mutation>): MutationStats {
  let totalMutations = 0
  let killCount = 0
  for (const mutation of mutations) {
    totalMutations += 1
    if (mutation.detected) killCount += 1
  }
  return statsFromCounts(totalMutations, killCount)
}

/** Stats for counts aggregated elsewhere, e.g. by a database query */
export function statsFromCounts(totalMutations: number, killCount: number): MutationStats {
  return Object.freeze({
    totalMutations,
    killCount,
    killPercent: totalMutations === 0 ? 0 : (killCount / totalMutations) * 100,
  })
}

/**
 * Reject stats whose counts cannot describe a real mutation run.
 *
 * @throws {ReportIntegrityError} when counts are negative, fractional or killed > total
 */
export function assertStatsConsistent(stats: Pick<MutationStats, 'totalMutations' | 'killCount'>): void {
  const { totalMutations, killCount } = stats
  if (!Number.isInteger(totalMutations) || !Number.isInteger(killCount) || totalMutations < 0 || killCount < 0) {
    throw new ReportIntegrityError(
      `Mutation counts must be non-negative integers (total=${String(totalMutations)}, killed=${String(killCount)})`,
      { totalMutations, killCount },
    )
  }
  if (killCount > totalMutations) {
    throw new ReportIntegrityError(
      `Kill count ${String(killCount)} exceeds total mutations ${String(totalMutations)}`,
      { totalMutations, killCount },
    )
  }
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function freezeReport(classes: Map<string, Mutation[]>): Report {
  const frozen = new Map<string, readonly Mutation[]>()
  for (const [className, mutations] of classes) {
    frozen.set(className, Object.freeze(mutations.map((m) => Object.freeze({ ...m }))))
  }
  const stats = computeStats(allMutations({ classes: frozen }))
  assertStatsConsistent(stats)
  return Object.freeze({ classes: frozen, stats })
}

/**
 * Build a report from a flat mutation list, grouping by class name.
 * Mutations keep their input order within each class.
 */
export function createReport(mutations: Iterable<Mutation>): Report {
  const classes = new Map<string, Mutation[]>()
  for (const mutation of mutations) {
    const list = classes.get(mutation.className)
    if (list === undefined) {
      classes.set(mutation.className, [mutation])
    } else {
      list.push(mutation)
    }
  }
  return freezeReport(classes)
}

/**
 * Build a report from an explicit class → mutations mapping.
 *
 * @throws {ReportIntegrityError} if a mutation is filed under another class
 */
export function createReportFromClasses(byClass: Record<string, readonly Mutation[]>): Report {
  const classes = new Map<string, Mutation[]>()
  for (const [className, mutations] of Object.entries(byClass)) {
    for (const mutation of mutations) {
      if (mutation.className !== className) {
        throw new ReportIntegrityError(
          `Mutation of class "${mutation.className}" listed under class "${className}"`,
          { className, mutationClass: mutation.className, lineNumber: mutation.lineNumber },
        )
      }
    }
    classes.set(className, [...mutations])
  }
  return freezeReport(classes)
}

/** A report with no classes */
export function emptyReport(): Report {
  return freezeReport(new Map())
}

/**
 * Merge several reports of the same build (e.g. one per module).
 * Per-class lists are concatenated in argument order.
 */
export function mergeReports(reports: readonly Report[]): Report {
  const classes = new Map<string, Mutation[]>()
  for (const report of reports) {
    for (const [className, mutations] of report.classes) {
      const list = classes.get(className) ?? []
      list.push(...mutations)
      classes.set(className, list)
    }
  }
  return freezeReport(classes)
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Mutations of a class, or an empty list when the class is not in the report */
export function mutationsForClass(report: Pick<Report, 'classes'>, className: string): readonly Mutation[] {
  return report.classes.get(className) ?? EMPTY_MUTATIONS
}

/** Every mutation in the report, class by class */
export function* allMutations(report: Pick<Report, 'classes'>): Generator<Mutation> {
  for (const mutations of report.classes.values()) {
    yield* mutations
  }
}

/** Class names present in the report */
export function classNames(report: Report): string[] {
  return [...report.classes.keys()]
}

/** Stats over a single class */
export function statsForClass(report: Report, className: string): MutationStats {
  return computeStats(mutationsForClass(report, className))
}

/** Distinct source files referenced by the report's mutations */
export function sourceFiles(report: Report): string[] {
  const files = new Set<string>()
  for (const mutation of allMutations(report)) {
    if (mutation.sourceFile !== undefined) files.add(mutation.sourceFile)
  }
  return [...files]
}
