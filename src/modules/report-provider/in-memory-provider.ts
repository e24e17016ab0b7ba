/**
 * In-memory ReportProvider, for tests and for embedding the gate in
 * another tool without a database.
 */

import { BuildHistoryError, ReportNotFoundError } from '../../core/errors.js'
import type { BuildRecord, BuildRef, Report } from '../mutation-report/types.js'
import type { ReportProvider } from './report-provider.js'

export class InMemoryReportProvider implements ReportProvider {
  private readonly _reports = new Map<BuildRef, Report>()
  private readonly _predecessors = new Map<BuildRef, BuildRef>()

  constructor(records: Iterable<BuildRecord> = []) {
    for (const record of records) {
      this.addBuild(record)
    }
  }

  /**
   * Register a build. A `previousBuildRef` on the record is linked as with
   * `setPredecessor()`; it may name a build that is added later.
   *
   * A rejected link leaves the provider unchanged.
   *
   * @throws {BuildHistoryError} if the build is already registered or the link is rejected
   */
  addBuild(record: BuildRecord): void {
    if (this._reports.has(record.buildRef)) {
      throw new BuildHistoryError(`Build already recorded: ${record.buildRef}`, {
        buildRef: record.buildRef,
      })
    }
    if (record.previousBuildRef !== undefined) {
      this.setPredecessor(record.buildRef, record.previousBuildRef)
    }
    this._reports.set(record.buildRef, record.report)
  }

  /**
   * Link a build to its predecessor. Each build gets at most one.
   *
   * @throws {BuildHistoryError} on a second link, a self reference, or a cycle
   */
  setPredecessor(buildRef: BuildRef, previousBuildRef: BuildRef): void {
    const existing = this._predecessors.get(buildRef)
    if (existing !== undefined) {
      throw new BuildHistoryError(
        `Build ${buildRef} already has a predecessor: ${existing}`,
        { buildRef, previousBuildRef: existing },
      )
    }
    if (buildRef === previousBuildRef) {
      throw new BuildHistoryError(`Build ${buildRef} cannot be its own predecessor`, { buildRef })
    }

    // Walk back from the proposed predecessor; reaching buildRef means a cycle
    let cursor: BuildRef | undefined = previousBuildRef
    while (cursor !== undefined) {
      if (cursor === buildRef) {
        throw new BuildHistoryError(
          `Linking ${buildRef} to ${previousBuildRef} would create a cycle`,
          { buildRef, previousBuildRef },
        )
      }
      cursor = this._predecessors.get(cursor)
    }

    this._predecessors.set(buildRef, previousBuildRef)
  }

  hasBuild(buildRef: BuildRef): boolean {
    return this._reports.has(buildRef)
  }

  getReport(buildRef: BuildRef): Report {
    const report = this._reports.get(buildRef)
    if (report === undefined) {
      throw new ReportNotFoundError(buildRef)
    }
    return report
  }

  getPredecessor(buildRef: BuildRef): BuildRef | undefined {
    return this._predecessors.get(buildRef)
  }
}
