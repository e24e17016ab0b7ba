/**
 * Logger utility for mutant-gate
 *
 * pino loggers writing to stderr: stdout belongs to command output, which
 * scripts parse when `--output-format json` is given.
 */

import pino from 'pino'
import type { LogLevel } from '../core/types.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: LogLevel
  name?: string
  pretty?: boolean
}

const STDERR_FD = 2

/** Level set from configuration; `LOG_LEVEL` still outranks it */
let configuredLevel: LogLevel | undefined

/** Loggers created without an explicit level follow setLogLevel() */
const levelFollowers = new Set<pino.Logger>()

function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // Plain CLI use: only problems
  return 'warn'
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level: options.level ?? getDefaultLogLevel(),
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  const log = buildLogger(baseOptions, options.pretty ?? isPrettyMode())
  if (options.level === undefined) {
    levelFollowers.add(log)
  }
  return log
}

function buildLogger(baseOptions: pino.LoggerOptions, pretty: boolean): pino.Logger {
  if (pretty) {
    // pino-pretty is a devDependency
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    })
  }

  return pino(baseOptions, pino.destination(STDERR_FD))
}

/**
 * Apply the configured `global.log_level` to every logger created without
 * an explicit level, and to those created later. `undefined` falls back to
 * the environment default. Ignored while `LOG_LEVEL` is set.
 */
export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level
  const effective = getDefaultLogLevel()
  for (const log of levelFollowers) {
    log.level = effective
  }
}

/** Root application logger */
export const logger = createLogger('mutant-gate')

/** Create a child logger with additional context, e.g. `{ buildRef }` */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
