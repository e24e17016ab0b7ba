/**
 * `mutant-gate history` command
 *
 * Lists recorded builds with their kill ratios, oldest first.
 *
 * Usage:
 *   mutant-gate history
 *   mutant-gate history --limit 10
 *   mutant-gate history --output-format json
 *
 * Exit codes:
 *   0 - Success (including an empty history)
 *   1 - Error
 */

import type { Command } from 'commander'
import type { BuildSummary } from '../../modules/build-history/build-history-store.js'
import { createLogger } from '../../utils/logger.js'
import {
  OUTPUT_FORMATS,
  buildJsonOutput,
  formatPercent,
  formatTable,
  parseOutputFormat,
} from '../utils/formatting.js'
import type { OutputFormat, TableColumn } from '../utils/formatting.js'
import { loadCommandConfig, openHistory, resolveDatabasePath } from '../utils/history.js'
import type { HistoryCommandOptions, OpenHistory } from '../utils/history.js'

const logger = createLogger('history-cmd')

export const HISTORY_EXIT_SUCCESS = 0
export const HISTORY_EXIT_ERROR = 1

export interface HistoryActionOptions extends HistoryCommandOptions {
  /** Only the newest `limit` builds */
  limit?: number
  outputFormat: OutputFormat
}

const HISTORY_COLUMNS: readonly TableColumn[] = [
  { header: 'Build', key: 'build' },
  { header: 'Previous', key: 'previous' },
  { header: 'Killed', key: 'killed', align: 'right' },
  { header: 'Total', key: 'total', align: 'right' },
  { header: 'Kill Ratio', key: 'ratio', align: 'right' },
  { header: 'Recorded', key: 'recorded' },
]

/**
 * Format build summaries as a table.
 */
export function formatHistoryTable(builds: BuildSummary[]): string {
  if (builds.length === 0) {
    return 'No builds recorded'
  }

  const rows: Record<string, string>[] = builds.map((b) => ({
    build: b.buildRef,
    previous: b.previousBuildRef ?? '-',
    killed: String(b.stats.killCount),
    total: String(b.stats.totalMutations),
    ratio: formatPercent(b.stats.killPercent),
    recorded: b.recordedAt,
  }))

  return formatTable(HISTORY_COLUMNS, rows)
}

/**
 * Core action for the history command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runHistoryAction(options: HistoryActionOptions): Promise<number> {
  const { limit, projectRoot, outputFormat, version = '0.0.0' } = options

  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    process.stderr.write(`Error: --limit must be a positive integer, got ${String(limit)}\n`)
    return HISTORY_EXIT_ERROR
  }

  let history: OpenHistory | null = null

  try {
    const config = await loadCommandConfig(options)
    const dbPath = resolveDatabasePath(projectRoot, config.history.database_path)
    history = openHistory(dbPath, false)
    const builds = history !== null ? history.store.listBuilds(limit) : []

    if (outputFormat === 'json') {
      const output = buildJsonOutput('mutant-gate history', { builds }, version)
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else {
      process.stdout.write(formatHistoryTable(builds) + '\n')
    }

    return HISTORY_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runHistoryAction failed')
    return HISTORY_EXIT_ERROR
  } finally {
    history?.wrapper.close()
  }
}

/**
 * Register the `mutant-gate history` command with the CLI program.
 */
export function registerHistoryCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('history')
    .description('List recorded builds and their kill ratios')
    .option('--limit <n>', 'Show only the newest n builds')
    .option('--database <path>', 'Build history database (overrides history.database_path)')
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .action(async (opts: { limit?: string; database?: string; outputFormat: string }) => {
      const outputFormat = parseOutputFormat(opts.outputFormat)
      if (outputFormat === undefined) {
        process.stderr.write(
          `Error: Invalid output format '${opts.outputFormat}'. Valid formats: ${OUTPUT_FORMATS.join(', ')}\n`,
        )
        process.exitCode = HISTORY_EXIT_ERROR
        return
      }

      const exitCode = await runHistoryAction({
        ...(opts.limit !== undefined && { limit: Number(opts.limit) }),
        ...(opts.database !== undefined && { databasePath: opts.database }),
        outputFormat,
        projectRoot,
        version,
      })

      process.exitCode = exitCode
    })
}
