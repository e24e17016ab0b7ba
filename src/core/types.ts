/**
 * Core types for mutant-gate
 * Shared type definitions used across all modules
 */

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/**
 * Receiver for advisory diagnostic lines emitted while evaluating a build.
 * A pino Logger satisfies it. Passed per call, never stored on an engine.
 */
export interface DiagnosticSink {
  info(obj: Record<string, unknown>, msg: string): void
}
