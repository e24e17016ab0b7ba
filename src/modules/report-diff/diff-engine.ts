/**
 * DiffEngine interface definition.
 *
 * Compares two reports of the same project taken at different builds.
 * Every operation is pure set algebra; when there is no previous report the
 * operations return a non-applicable outcome rather than throwing.
 */

import type { Mutation, Report } from '../mutation-report/types.js'
import type { DiffOptions, DiffOutcome, RegressionSummary } from './types.js'

export interface DiffEngine {
  /**
   * Class names present in `current` but absent from `previous`.
   * Asymmetric: swapping the arguments does not give the complement.
   */
  findNewTargets(current: Report, previous: Report | undefined): DiffOutcome<string>
  /**
   * Mutations of `className` in `current` that are not in `previous` for the
   * same class, comparing identity and the `detected` flag.
   */
  findDifferentMutations(
    current: Report,
    previous: Report | undefined,
    className: string,
  ): DiffOutcome<Mutation>
  /** The undetected subset of `findDifferentMutations()` */
  findNewSurvivors(
    current: Report,
    previous: Report | undefined,
    className: string,
  ): DiffOutcome<Mutation>
  /** New targets and per-class changes across the whole current report */
  summarizeRegressions(
    current: Report,
    previous: Report | undefined,
    options?: DiffOptions,
  ): RegressionSummary
}
