/**
 * quality-gates module — build result gate over mutation reports
 *
 * Public API re-exports for the quality-gates module.
 */

// Types
export type {
  BuildResult,
  GateLogger,
  Condition,
  ConditionOptions,
  ConditionFactory,
  EvaluateOptions,
  ConditionOutcome,
  GateEvaluation,
} from './types.js'
export { BUILD_RESULTS, isWorseThan, worstResult } from './types.js'

// Conditions
export {
  ThresholdCondition,
  ImprovementCondition,
  THRESHOLD_CONDITION_TYPE,
  IMPROVEMENT_CONDITION_TYPE,
} from './conditions.js'

// Engine interface and implementation
export type { GateEngine } from './gate-engine.js'
export { GateEngineImpl, createGateEngine } from './gate-engine-impl.js'

// Registry
export {
  registerConditionType,
  createCondition,
  getRegisteredConditionTypes,
  createConditionsFromConfig,
} from './gate-registry.js'
