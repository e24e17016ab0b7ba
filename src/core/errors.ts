/**
 * Error definitions for mutant-gate
 * Provides structured error hierarchy for gate, diff and history operations
 */

/** Base error class for all mutant-gate errors */
export class MutantGateError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'MutantGateError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MutantGateError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * Error thrown when a gate or config value is invalid.
 * Raised at setup time so an invalid gate never runs.
 */
export class ConfigurationError extends MutantGateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION_ERROR', context)
    this.name = 'ConfigurationError'
  }
}

/**
 * Error thrown when a comparison needs a previous report and the build has none.
 * Diff operations return a non-applicable outcome instead; this is only raised
 * by callers that explicitly require a comparison.
 */
export class MissingPredecessorError extends MutantGateError {
  constructor(buildRef?: string) {
    super(
      buildRef !== undefined
        ? `No previous report available for build: ${buildRef}`
        : 'No previous report available for comparison',
      'MISSING_PREDECESSOR',
      buildRef !== undefined ? { buildRef } : {},
    )
    this.name = 'MissingPredecessorError'
  }
}

/** Error thrown when a report is internally inconsistent */
export class ReportIntegrityError extends MutantGateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'REPORT_INTEGRITY_ERROR', context)
    this.name = 'ReportIntegrityError'
  }
}

/** Error thrown when a report provider has no report for a build */
export class ReportNotFoundError extends MutantGateError {
  constructor(buildRef: string) {
    super(`No report found for build: ${buildRef}`, 'REPORT_NOT_FOUND', {
      buildRef,
    })
    this.name = 'ReportNotFoundError'
  }
}

/** Error thrown when the build-history chain would be corrupted */
export class BuildHistoryError extends MutantGateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'BUILD_HISTORY_ERROR', context)
    this.name = 'BuildHistoryError'
  }
}
