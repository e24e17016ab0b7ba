/**
 * Shared setup for commands that read or write the build history:
 * configuration loading, database path resolution, and opening the store.
 */

import { existsSync, mkdirSync } from 'fs'
import { dirname, isAbsolute, join, resolve } from 'path'
import type { DiagnosticSink } from '../../core/types.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { MutantGateConfig, PartialMutantGateConfig } from '../../modules/config/config-schema.js'
import { BuildHistoryStore } from '../../modules/build-history/build-history-store.js'
import { DatabaseWrapper } from '../../persistence/database.js'
import { runMigrations } from '../../persistence/migrations/index.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'

const logger = createLogger('cli:history')

/** Options every history command accepts */
export interface HistoryCommandOptions {
  projectRoot: string
  /** Overrides `history.database_path` */
  databasePath?: string
  /** Global config directory (default: ~/.mutant-gate) */
  globalConfigDir?: string
  version?: string
}

/**
 * Load the merged configuration for a command run from `projectRoot` and
 * apply its `global.log_level`.
 */
export async function loadCommandConfig(
  options: HistoryCommandOptions,
  overrides: PartialMutantGateConfig = {},
): Promise<MutantGateConfig> {
  const cliOverrides: PartialMutantGateConfig = {
    ...overrides,
    ...(options.databasePath !== undefined
      ? { history: { ...overrides.history, database_path: options.databasePath } }
      : {}),
  }
  const configSystem = createConfigSystem({
    projectConfigDir: join(options.projectRoot, '.mutant-gate'),
    ...(options.globalConfigDir !== undefined ? { globalConfigDir: options.globalConfigDir } : {}),
    cliOverrides,
  })
  await configSystem.load()
  const config = configSystem.getConfig()
  setLogLevel(config.global.log_level)
  logger.debug({ files: configSystem.loadedFiles }, 'Command configuration loaded')
  return config
}

/** Resolve the configured database path against the project root */
export function resolveDatabasePath(projectRoot: string, databasePath: string): string {
  return isAbsolute(databasePath) ? databasePath : resolve(projectRoot, databasePath)
}

/** An open history database; close the wrapper when done */
export interface OpenHistory {
  wrapper: DatabaseWrapper
  store: BuildHistoryStore
}

/**
 * Open (and migrate) the history database.
 *
 * @param create - create the file and its directory when missing
 * @returns null when the database does not exist and `create` is false
 */
export function openHistory(dbPath: string, create: boolean): OpenHistory | null {
  if (!existsSync(dbPath)) {
    if (!create) return null
    mkdirSync(dirname(dbPath), { recursive: true })
  }

  const wrapper = new DatabaseWrapper(dbPath)
  wrapper.open()
  try {
    runMigrations(wrapper.db)
  } catch (err) {
    wrapper.close()
    throw err
  }
  return { wrapper, store: new BuildHistoryStore(wrapper.db) }
}

/**
 * Sink that prints gate and diff diagnostics as plain lines on stderr,
 * keeping stdout for the command's own output.
 */
export function createConsoleSink(stream: NodeJS.WritableStream = process.stderr): DiagnosticSink {
  return {
    info(_obj: Record<string, unknown>, msg: string): void {
      stream.write(`${msg}\n`)
    },
  }
}
