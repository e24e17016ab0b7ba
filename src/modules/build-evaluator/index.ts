/**
 * build-evaluator module — gate + diff for one build
 */

export { evaluateBuild } from './build-evaluator.js'
export type { BuildEvaluation, EvaluateBuildOptions } from './build-evaluator.js'
