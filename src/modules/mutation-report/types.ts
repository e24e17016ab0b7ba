/**
 * Shared types for the mutation-report module.
 */

// ---------------------------------------------------------------------------
// Mutation
// ---------------------------------------------------------------------------

/** Outcome recorded by the mutation-testing tool for a single mutation */
export type MutationStatus =
  | 'KILLED'
  | 'SURVIVED'
  | 'NO_COVERAGE'
  | 'TIMED_OUT'
  | 'MEMORY_ERROR'
  | 'RUN_ERROR'
  | 'NON_VIABLE'

/**
 * A single injected fault and whether the test suite detected it.
 *
 * Identity is `className` + location (`mutatedMethod`, `lineNumber`, `index`)
 * + `mutator`. Two values with the same identity and the same `detected`
 * flag are the same mutation regardless of object identity.
 */
export interface Mutation {
  /** Fully-qualified name of the mutated class */
  readonly className: string
  /** Method the mutation was applied to */
  readonly mutatedMethod: string
  /** 1-based source line */
  readonly lineNumber: number
  /** Position of this mutation among mutations of the same kind on the line */
  readonly index: number
  /** Mutation operator, e.g. `ConditionalsBoundaryMutator` */
  readonly mutator: string
  /** True when at least one test failed against the mutant (killed) */
  readonly detected: boolean
  /** Source file the class was compiled from */
  readonly sourceFile?: string
  readonly status?: MutationStatus
  /** Test that killed the mutant, when known */
  readonly killingTest?: string
  /** Human-readable description of the change */
  readonly description?: string
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

/**
 * Aggregate counts over a mutation collection.
 * Always derived from the mutations; never stored on its own.
 */
export interface MutationStats {
  readonly totalMutations: number
  readonly killCount: number
  /** killCount / totalMutations × 100, or 0 when there are no mutations */
  readonly killPercent: number
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

/** Immutable snapshot of one build's mutation-testing run */
export interface Report {
  /** Class name → mutations of that class, in report order */
  readonly classes: ReadonlyMap<string, readonly Mutation[]>
  readonly stats: MutationStats
}

// ---------------------------------------------------------------------------
// Build history
// ---------------------------------------------------------------------------

/** Opaque identifier of a build, e.g. a CI build number */
export type BuildRef = string

/**
 * A build and its report.
 *
 * `previousBuildRef` is a lookup key for the preceding build, resolved through
 * a ReportProvider; a record never holds its predecessor directly.
 */
export interface BuildRecord {
  readonly buildRef: BuildRef
  readonly report: Report
  readonly previousBuildRef?: BuildRef
}
