/**
 * Built-in gate conditions.
 *
 * - ThresholdCondition: fails the build when the kill percentage is below a minimum
 * - ImprovementCondition: compares the kill percentage with the previous build's
 */

import { ConfigurationError } from '../../core/errors.js'
import type { Report } from '../mutation-report/types.js'
import type { BuildResult, Condition, GateLogger } from './types.js'

export const THRESHOLD_CONDITION_TYPE = 'kill-ratio-threshold'
export const IMPROVEMENT_CONDITION_TYPE = 'kill-ratio-must-improve'

// ---------------------------------------------------------------------------
// ThresholdCondition
// ---------------------------------------------------------------------------

/**
 * SUCCESS when `current.stats.killPercent >= minKillPercent`, otherwise FAILURE.
 */
export class ThresholdCondition implements Condition {
  readonly name: string
  readonly minKillPercent: number

  /**
   * @throws {ConfigurationError} if minKillPercent is not a number in [0, 100]
   */
  constructor(minKillPercent: number, name: string = THRESHOLD_CONDITION_TYPE) {
    if (!Number.isFinite(minKillPercent) || minKillPercent < 0 || minKillPercent > 100) {
      throw new ConfigurationError(
        `Minimum kill ratio must be between 0 and 100, got ${String(minKillPercent)}`,
        { minKillPercent },
      )
    }
    this.minKillPercent = minKillPercent
    this.name = name
  }

  evaluate(current: Report, _previous: Report | undefined, logger: GateLogger): BuildResult {
    const { killPercent, killCount, totalMutations } = current.stats
    logger.info(
      { condition: this.name, killPercent, killCount, totalMutations, minKillPercent: this.minKillPercent },
      `Kill ratio is ${String(killPercent)}% (${String(killCount)} / ${String(totalMutations)})`,
    )
    return killPercent >= this.minKillPercent ? 'SUCCESS' : 'FAILURE'
  }
}

// ---------------------------------------------------------------------------
// ImprovementCondition
// ---------------------------------------------------------------------------

/**
 * Compares the kill percentage with the previous build's.
 *
 * SUCCESS when there is no previous report. Otherwise SUCCESS when
 * `current <= previous` and UNSTABLE when the current kill percentage is
 * higher. This is the long-standing rule of this gate and is kept as is,
 * even though the name suggests the opposite comparison.
 */
export class ImprovementCondition implements Condition {
  readonly name: string

  constructor(name: string = IMPROVEMENT_CONDITION_TYPE) {
    this.name = name
  }

  evaluate(current: Report, previous: Report | undefined, logger: GateLogger): BuildResult {
    if (previous === undefined) {
      return 'SUCCESS'
    }
    const previousPercent = previous.stats.killPercent
    logger.info(
      { condition: this.name, previousKillPercent: previousPercent, killPercent: current.stats.killPercent },
      `Previous kill ratio was ${String(previousPercent)}%`,
    )
    return current.stats.killPercent <= previousPercent ? 'SUCCESS' : 'UNSTABLE'
  }
}
