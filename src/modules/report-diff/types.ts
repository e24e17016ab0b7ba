/**
 * Shared types for the report-diff module.
 */

import type { DiagnosticSink } from '../../core/types.js'
import type { Mutation } from '../mutation-report/types.js'

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

/** Why a comparison could not be made */
export type NotApplicableReason = 'missing-predecessor'

/** Returned instead of a result when there is no previous report */
export interface NotApplicable {
  readonly applicable: false
  readonly reason: NotApplicableReason
}

/** Set-valued diff result, or an explicit marker that no comparison exists */
export type DiffOutcome<T> =
  | { readonly applicable: true; readonly items: ReadonlySet<T> }
  | NotApplicable

// ---------------------------------------------------------------------------
// Regression summary
// ---------------------------------------------------------------------------

/** Changes for one class of the current report */
export interface ClassRegression {
  className: string
  /** New mutations, or mutations whose detection outcome changed */
  differentMutations: Mutation[]
  /** The undetected subset of `differentMutations` */
  newSurvivors: Mutation[]
}

/** Everything that changed between two reports, for presentation */
export interface RegressionReport {
  readonly applicable: true
  /** Classes present now that were absent before */
  newTargets: string[]
  /** Only classes with at least one different mutation, in report order */
  classes: ClassRegression[]
  differentMutationCount: number
  newSurvivorCount: number
}

export type RegressionSummary = RegressionReport | NotApplicable

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DiffOptions {
  /** Receives one summary line per comparison */
  logger?: DiagnosticSink
}
