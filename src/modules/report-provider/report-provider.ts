/**
 * ReportProvider — resolves build references to reports and predecessors.
 *
 * Builds are referenced by key; a build never holds its predecessor's
 * report, so chains of builds stay flat and cannot form ownership cycles.
 */

import type { BuildRef, Report } from '../mutation-report/types.js'

export interface ReportProvider {
  /**
   * Return the report recorded for a build.
   *
   * @throws {ReportNotFoundError} if the build is unknown
   */
  getReport(buildRef: BuildRef): Report

  /** Reference of the build this one is compared against, if any */
  getPredecessor(buildRef: BuildRef): BuildRef | undefined
}
