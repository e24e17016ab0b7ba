/**
 * Shared types for the Quality Gates module.
 */

import type { DiagnosticSink } from '../../core/types.js'
import type { Report } from '../mutation-report/types.js'

// ---------------------------------------------------------------------------
// Build result
// ---------------------------------------------------------------------------

/** Gate outcomes, least severe first */
export const BUILD_RESULTS = ['SUCCESS', 'UNSTABLE', 'FAILURE'] as const

/**
 * Outcome of a gate for one build. Ordered SUCCESS < UNSTABLE < FAILURE;
 * compare with `isWorseThan()`.
 */
export type BuildResult = (typeof BUILD_RESULTS)[number]

const SEVERITY: Readonly<Record<BuildResult, number>> = {
  SUCCESS: 0,
  UNSTABLE: 1,
  FAILURE: 2,
}

/** Whether `result` is strictly more severe than `other` */
export function isWorseThan(result: BuildResult, other: BuildResult): boolean {
  return SEVERITY[result] > SEVERITY[other]
}

/** Most severe of the given results; SUCCESS for none */
export function worstResult(results: Iterable<BuildResult>): BuildResult {
  let worst: BuildResult = 'SUCCESS'
  for (const result of results) {
    if (isWorseThan(result, worst)) worst = result
  }
  return worst
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

/** Sink for the per-condition diagnostic lines */
export type GateLogger = DiagnosticSink

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

/**
 * A single quality criterion. Implementations must be pure: the result may
 * depend only on the reports, and logging must not change it.
 */
export interface Condition {
  /** Stable name used in evaluation output */
  readonly name: string
  evaluate(current: Report, previous: Report | undefined, logger: GateLogger): BuildResult
}

/** Options accepted by registered condition factories */
export interface ConditionOptions {
  /** Human-readable condition name (defaults to the type name) */
  name?: string
  /** Minimum kill percentage in [0, 100], for threshold conditions */
  minKillPercent?: number
}

/** Builds a Condition from options; registered per type name */
export type ConditionFactory = (options: ConditionOptions) => Condition

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export interface EvaluateOptions {
  /** Where diagnostic lines go; defaults to the engine's module logger */
  logger?: GateLogger
}

/** Result of one condition within an evaluation */
export interface ConditionOutcome {
  condition: string
  result: BuildResult
}

/** Overall gate result with the per-condition breakdown */
export interface GateEvaluation {
  result: BuildResult
  conditions: ConditionOutcome[]
}
