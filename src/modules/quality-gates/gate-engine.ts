/**
 * GateEngine interface definition.
 *
 * A gate engine holds an ordered list of conditions and reduces their
 * results to the single most severe BuildResult.
 */

import type { Report } from '../mutation-report/types.js'
import type { BuildResult, Condition, EvaluateOptions, GateEvaluation } from './types.js'

/**
 * Evaluates configured conditions against a report and its predecessor.
 */
export interface GateEngine {
  /** Conditions in evaluation order */
  readonly conditions: readonly Condition[]
  /** Replace the configured conditions */
  configure(conditions: readonly Condition[]): void
  /**
   * Run every condition and return the worst result.
   * SUCCESS when no conditions are configured.
   */
  evaluate(current: Report, previous?: Report, options?: EvaluateOptions): BuildResult
  /** Like `evaluate()`, with each condition's individual result */
  evaluateDetailed(current: Report, previous?: Report, options?: EvaluateOptions): GateEvaluation
}
