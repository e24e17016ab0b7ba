/**
 * Build evaluation: the end-to-end path a CI step runs for one build.
 *
 * Resolves the build's report and its predecessor's through a ReportProvider,
 * runs the gate, and summarizes what changed since the previous build.
 */

import type { DiagnosticSink } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { BuildRef, MutationStats, Report } from '../mutation-report/types.js'
import type { GateEngine } from '../quality-gates/gate-engine.js'
import type { BuildResult, ConditionOutcome } from '../quality-gates/types.js'
import type { DiffEngine } from '../report-diff/diff-engine.js'
import { createDiffEngine } from '../report-diff/diff-engine-impl.js'
import type { RegressionSummary } from '../report-diff/types.js'
import type { ReportProvider } from '../report-provider/report-provider.js'

const logger = createLogger('build-evaluator')

export interface EvaluateBuildOptions {
  /** Receives the gate's diagnostic lines and the regression summary line */
  logger?: DiagnosticSink
  /** Diff engine to use; a default one is created when omitted */
  diffEngine?: DiffEngine
}

export interface BuildEvaluation {
  buildRef: BuildRef
  previousBuildRef?: BuildRef
  result: BuildResult
  conditions: ConditionOutcome[]
  stats: MutationStats
  previousStats?: MutationStats
  regressions: RegressionSummary
}

/**
 * Evaluate one build against the engine's conditions.
 *
 * @throws {ReportNotFoundError} if the build, or its recorded predecessor, has no report
 */
export function evaluateBuild(
  provider: ReportProvider,
  buildRef: BuildRef,
  engine: GateEngine,
  options: EvaluateBuildOptions = {},
): BuildEvaluation {
  const sink: DiagnosticSink = options.logger ?? logger
  const current = provider.getReport(buildRef)
  const previousBuildRef = provider.getPredecessor(buildRef)
  const previous: Report | undefined =
    previousBuildRef !== undefined ? provider.getReport(previousBuildRef) : undefined

  const gate = engine.evaluateDetailed(current, previous, { logger: sink })
  const regressions = (options.diffEngine ?? createDiffEngine()).summarizeRegressions(current, previous, {
    logger: sink,
  })

  logger.debug({ buildRef, previousBuildRef, result: gate.result }, 'Build evaluated')

  return {
    buildRef,
    ...(previousBuildRef !== undefined ? { previousBuildRef } : {}),
    result: gate.result,
    conditions: gate.conditions,
    stats: current.stats,
    ...(previous !== undefined ? { previousStats: previous.stats } : {}),
    regressions,
  }
}
