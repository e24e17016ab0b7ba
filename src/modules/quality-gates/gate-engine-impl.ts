/**
 * GateEngine implementation.
 *
 * Runs each configured condition in order and keeps the most severe
 * result. Adding a condition can only keep the outcome or make it worse.
 */

import type { Report } from '../mutation-report/types.js'
import { createLogger } from '../../utils/logger.js'
import type { GateEngine } from './gate-engine.js'
import { worstResult } from './types.js'
import type {
  BuildResult,
  Condition,
  ConditionOutcome,
  EvaluateOptions,
  GateEvaluation,
  GateLogger,
} from './types.js'

const logger = createLogger('quality-gates')

/**
 * Concrete implementation of GateEngine.
 *
 * Holds no per-evaluation state: the logging sink travels with each call,
 * so one engine can serve concurrent callers.
 */
export class GateEngineImpl implements GateEngine {
  private _conditions: readonly Condition[]

  constructor(conditions: readonly Condition[] = []) {
    this._conditions = Object.freeze([...conditions])
  }

  get conditions(): readonly Condition[] {
    return this._conditions
  }

  configure(conditions: readonly Condition[]): void {
    this._conditions = Object.freeze([...conditions])
  }

  evaluate(current: Report, previous?: Report, options: EvaluateOptions = {}): BuildResult {
    return this.evaluateDetailed(current, previous, options).result
  }

  evaluateDetailed(current: Report, previous?: Report, options: EvaluateOptions = {}): GateEvaluation {
    const sink: GateLogger = options.logger ?? logger
    const conditions: ConditionOutcome[] = this._conditions.map((condition) => ({
      condition: condition.name,
      result: condition.evaluate(current, previous, sink),
    }))
    const result = worstResult(conditions.map((c) => c.result))

    logger.debug(
      { result, conditions: conditions.length, hasPrevious: previous !== undefined },
      'Gate evaluated',
    )

    return { result, conditions }
  }
}

/**
 * Factory function to create a GateEngine with an initial condition list.
 */
export function createGateEngine(conditions: readonly Condition[] = []): GateEngine {
  return new GateEngineImpl(conditions)
}
