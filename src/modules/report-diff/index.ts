/**
 * report-diff module — build-to-build mutation report comparison
 *
 * Public API re-exports for the report-diff module.
 */

// Types
export type {
  NotApplicableReason,
  NotApplicable,
  DiffOutcome,
  ClassRegression,
  RegressionReport,
  RegressionSummary,
  DiffOptions,
} from './types.js'

// Engine interface and implementation
export type { DiffEngine } from './diff-engine.js'
export { DiffEngineImpl, createDiffEngine, requireApplicable } from './diff-engine-impl.js'
