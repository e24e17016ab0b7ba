/**
 * `mutant-gate record` command
 *
 * Stores a build's report snapshots in the build history. A build that
 * produced several reports (one per module) is recorded as their merge.
 *
 * Usage:
 *   mutant-gate record <build-id> <snapshot.json>
 *   mutant-gate record <build-id> <core.json> <web.json> --previous <id>
 *   mutant-gate record <build-id> <snapshot.json> --previous-latest
 *
 * Exit codes:
 *   0 - Recorded
 *   1 - Error (unreadable or invalid snapshot, duplicate build, unknown predecessor)
 */

import type { Command } from 'commander'
import { readFile } from 'fs/promises'
import { resolve } from 'path'
import { parseReportSnapshot } from '../../modules/mutation-report/schemas.js'
import { mergeReports } from '../../modules/mutation-report/report.js'
import type { Report } from '../../modules/mutation-report/types.js'
import { createLogger } from '../../utils/logger.js'
import {
  OUTPUT_FORMATS,
  buildJsonOutput,
  formatPercent,
  parseOutputFormat,
} from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'
import {
  loadCommandConfig,
  openHistory,
  resolveDatabasePath,
} from '../utils/history.js'
import type { HistoryCommandOptions, OpenHistory } from '../utils/history.js'

const logger = createLogger('record-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RECORD_EXIT_SUCCESS = 0
export const RECORD_EXIT_ERROR = 1

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecordActionOptions extends HistoryCommandOptions {
  buildId: string
  /** One or more snapshot files, merged into a single report */
  snapshotPaths: string[]
  /** Explicit predecessor */
  previousBuildId?: string
  /** Use the most recently recorded build as predecessor */
  previousLatest?: boolean
  outputFormat: OutputFormat
}

export interface RecordJsonData {
  build_id: string
  previous_build_id: string | null
  total_mutations: number
  kill_count: number
  kill_percent: number
}

async function readSnapshot(filePath: string): Promise<Report> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf-8'))
  return parseReportSnapshot(raw)
}

// ---------------------------------------------------------------------------
// runRecordAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the record command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runRecordAction(options: RecordActionOptions): Promise<number> {
  const { buildId, snapshotPaths, projectRoot, outputFormat, version = '0.0.0' } = options

  if (snapshotPaths.length === 0) {
    process.stderr.write('Error: At least one snapshot is required\n')
    return RECORD_EXIT_ERROR
  }

  if (options.previousBuildId !== undefined && options.previousLatest === true) {
    process.stderr.write('Error: --previous and --previous-latest cannot be combined\n')
    return RECORD_EXIT_ERROR
  }

  let history: OpenHistory | null = null

  try {
    const config = await loadCommandConfig(options)

    const reports: Report[] = []
    for (const snapshotPath of snapshotPaths) {
      reports.push(await readSnapshot(resolve(projectRoot, snapshotPath)))
    }
    const report = mergeReports(reports)

    const dbPath = resolveDatabasePath(projectRoot, config.history.database_path)
    history = openHistory(dbPath, true)
    if (history === null) {
      process.stderr.write(`Error: Could not open build history at ${dbPath}\n`)
      return RECORD_EXIT_ERROR
    }

    const previousBuildId =
      options.previousLatest === true ? history.store.getLatestBuildId() : options.previousBuildId

    history.store.recordBuild(buildId, report, previousBuildId)

    if (outputFormat === 'json') {
      const output = buildJsonOutput<RecordJsonData>(
        'mutant-gate record',
        {
          build_id: buildId,
          previous_build_id: previousBuildId ?? null,
          total_mutations: report.stats.totalMutations,
          kill_count: report.stats.killCount,
          kill_percent: report.stats.killPercent,
        },
        version,
      )
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else {
      const link = previousBuildId !== undefined ? ` (previous: ${previousBuildId})` : ''
      process.stdout.write(
        `Recorded build ${buildId}${link}: ${String(report.stats.killCount)}/${String(report.stats.totalMutations)} mutations killed (${formatPercent(report.stats.killPercent)})\n`,
      )
    }

    return RECORD_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runRecordAction failed')
    return RECORD_EXIT_ERROR
  } finally {
    history?.wrapper.close()
  }
}

// ---------------------------------------------------------------------------
// registerRecordCommand
// ---------------------------------------------------------------------------

/**
 * Register the `mutant-gate record` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param version     - Current package version (for JSON output)
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerRecordCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('record <build-id> <snapshots...>')
    .description('Record a build\'s mutation report snapshots in the build history')
    .option('--previous <id>', 'Build to compare this build against')
    .option('--previous-latest', 'Compare against the most recently recorded build', false)
    .option('--database <path>', 'Build history database (overrides history.database_path)')
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .action(async (buildId: string, snapshots: string[], opts: {
      previous?: string
      previousLatest: boolean
      database?: string
      outputFormat: string
    }) => {
      const outputFormat = parseOutputFormat(opts.outputFormat)
      if (outputFormat === undefined) {
        process.stderr.write(
          `Error: Invalid output format '${opts.outputFormat}'. Valid formats: ${OUTPUT_FORMATS.join(', ')}\n`,
        )
        process.exitCode = RECORD_EXIT_ERROR
        return
      }

      const exitCode = await runRecordAction({
        buildId,
        snapshotPaths: snapshots,
        ...(opts.previous !== undefined && { previousBuildId: opts.previous }),
        previousLatest: opts.previousLatest,
        ...(opts.database !== undefined && { databasePath: opts.database }),
        outputFormat,
        projectRoot,
        version,
      })

      process.exitCode = exitCode
    })
}
