/**
 * DiffEngine implementation.
 */

import { MissingPredecessorError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { mutationKey, mutationsForClass } from '../mutation-report/report.js'
import type { Mutation, Report } from '../mutation-report/types.js'
import type { DiffEngine } from './diff-engine.js'
import type {
  ClassRegression,
  DiffOptions,
  DiffOutcome,
  NotApplicable,
  RegressionSummary,
} from './types.js'

const logger = createLogger('report-diff')

const MISSING_PREDECESSOR: NotApplicable = Object.freeze({
  applicable: false,
  reason: 'missing-predecessor',
})

function applicable<T>(items: Set<T>): DiffOutcome<T> {
  return { applicable: true, items }
}

/**
 * Mutations of `className` in `current` whose key is not in `previous`.
 * Duplicates within `current` collapse to the first occurrence.
 */
function differentMutations(current: Report, previous: Report, className: string): Set<Mutation> {
  const previousKeys = new Set(mutationsForClass(previous, className).map(mutationKey))
  const seen = new Set<string>()
  const result = new Set<Mutation>()
  for (const mutation of mutationsForClass(current, className)) {
    const key = mutationKey(mutation)
    if (previousKeys.has(key) || seen.has(key)) continue
    seen.add(key)
    result.add(mutation)
  }
  return result
}

function survivorsOf(mutations: Iterable<Mutation>): Set<Mutation> {
  const result = new Set<Mutation>()
  for (const mutation of mutations) {
    if (!mutation.detected) result.add(mutation)
  }
  return result
}

/**
 * Concrete implementation of DiffEngine. Stateless.
 */
export class DiffEngineImpl implements DiffEngine {
  findNewTargets(current: Report, previous: Report | undefined): DiffOutcome<string> {
    if (previous === undefined) return MISSING_PREDECESSOR
    const targets = new Set<string>()
    for (const className of current.classes.keys()) {
      if (!previous.classes.has(className)) targets.add(className)
    }
    return applicable(targets)
  }

  findDifferentMutations(
    current: Report,
    previous: Report | undefined,
    className: string,
  ): DiffOutcome<Mutation> {
    if (previous === undefined) return MISSING_PREDECESSOR
    return applicable(differentMutations(current, previous, className))
  }

  findNewSurvivors(
    current: Report,
    previous: Report | undefined,
    className: string,
  ): DiffOutcome<Mutation> {
    if (previous === undefined) return MISSING_PREDECESSOR
    return applicable(survivorsOf(differentMutations(current, previous, className)))
  }

  summarizeRegressions(
    current: Report,
    previous: Report | undefined,
    options: DiffOptions = {},
  ): RegressionSummary {
    if (previous === undefined) {
      logger.debug('No previous report; regression summary not applicable')
      return MISSING_PREDECESSOR
    }

    const newTargets: string[] = []
    for (const className of current.classes.keys()) {
      if (!previous.classes.has(className)) newTargets.push(className)
    }
    const classes: ClassRegression[] = []
    let differentMutationCount = 0
    let newSurvivorCount = 0

    for (const className of current.classes.keys()) {
      const different = differentMutations(current, previous, className)
      if (different.size === 0) continue
      const survivors = survivorsOf(different)
      classes.push({
        className,
        differentMutations: [...different],
        newSurvivors: [...survivors],
      })
      differentMutationCount += different.size
      newSurvivorCount += survivors.size
    }

    options.logger?.info(
      { newTargets: newTargets.length, changedClasses: classes.length, differentMutationCount, newSurvivorCount },
      `${String(newSurvivorCount)} new surviving mutation(s) across ${String(classes.length)} changed class(es)`,
    )

    return { applicable: true, newTargets, classes, differentMutationCount, newSurvivorCount }
  }
}

/**
 * Unwrap a diff outcome, for callers that cannot proceed without a comparison.
 *
 * @throws {MissingPredecessorError} when the outcome is not applicable
 */
export function requireApplicable<T>(outcome: DiffOutcome<T>, buildRef?: string): ReadonlySet<T> {
  if (!outcome.applicable) {
    throw new MissingPredecessorError(buildRef)
  }
  return outcome.items
}

/**
 * Factory function to create a DiffEngine.
 */
export function createDiffEngine(): DiffEngine {
  return new DiffEngineImpl()
}
