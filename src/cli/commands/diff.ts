/**
 * `mutant-gate diff` command
 *
 * Shows what changed between a recorded build and its predecessor:
 * new classes under test, and per class the mutations that are new or
 * changed outcome, highlighting the ones that survived.
 *
 * Usage:
 *   mutant-gate diff <build-id>
 *   mutant-gate diff <build-id> --class com.example.Foo
 *   mutant-gate diff <build-id> --output-format json
 *
 * Exit codes:
 *   0 - Success (including a build with no predecessor)
 *   1 - Error (no history, unknown build)
 */

import type { Command } from 'commander'
import type { Mutation } from '../../modules/mutation-report/types.js'
import { createDiffEngine } from '../../modules/report-diff/diff-engine-impl.js'
import type { RegressionSummary } from '../../modules/report-diff/types.js'
import { createLogger } from '../../utils/logger.js'
import {
  OUTPUT_FORMATS,
  buildJsonOutput,
  formatTable,
  parseOutputFormat,
} from '../utils/formatting.js'
import type { OutputFormat, TableColumn } from '../utils/formatting.js'
import {
  createConsoleSink,
  loadCommandConfig,
  openHistory,
  resolveDatabasePath,
} from '../utils/history.js'
import type { HistoryCommandOptions, OpenHistory } from '../utils/history.js'

const logger = createLogger('diff-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const DIFF_EXIT_SUCCESS = 0
export const DIFF_EXIT_ERROR = 1

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DiffActionOptions extends HistoryCommandOptions {
  buildId: string
  /** Restrict the output to one class */
  className?: string
  outputFormat: OutputFormat
}

/** Changes for a single class, as shown by `--class` */
export interface ClassDiffData {
  class_name: string
  different_mutations: Mutation[]
  new_survivors: Mutation[]
}

export interface DiffJsonData {
  build_id: string
  previous_build_id: string | null
  regressions: RegressionSummary | ClassDiffData | { applicable: false; reason: string }
}

// ---------------------------------------------------------------------------
// Table formatters
// ---------------------------------------------------------------------------

const MUTATION_COLUMNS: readonly TableColumn[] = [
  { header: 'Class', key: 'className' },
  { header: 'Method', key: 'method' },
  { header: 'Line', key: 'line', align: 'right' },
  { header: 'Mutator', key: 'mutator' },
  { header: 'Detected', key: 'detected' },
]

const CLASS_COLUMNS: readonly TableColumn[] = [
  { header: 'Class', key: 'className' },
  { header: 'Changed', key: 'different', align: 'right' },
  { header: 'New survivors', key: 'survivors', align: 'right' },
]

/**
 * Format mutations as a table, one row per mutation.
 */
export function formatMutationTable(mutations: readonly Mutation[]): string {
  if (mutations.length === 0) {
    return 'No mutations'
  }

  const rows: Record<string, string>[] = mutations.map((m) => ({
    className: m.className,
    method: m.mutatedMethod,
    line: String(m.lineNumber),
    mutator: m.mutator,
    detected: m.detected ? 'yes' : 'no',
  }))

  return formatTable(MUTATION_COLUMNS, rows)
}

/**
 * Format a whole-report regression summary as a human-readable display.
 */
export function formatRegressionTable(summary: RegressionSummary): string {
  if (!summary.applicable) {
    return 'No previous build to compare against'
  }

  const lines: string[] = []

  lines.push(`New classes: ${String(summary.newTargets.length)}`)
  for (const className of summary.newTargets) {
    lines.push(`  ${className}`)
  }
  lines.push('')

  if (summary.classes.length === 0) {
    lines.push('No changed mutations')
    return lines.join('\n')
  }

  const rows: Record<string, string>[] = summary.classes.map((c) => ({
    className: c.className,
    different: String(c.differentMutations.length),
    survivors: String(c.newSurvivors.length),
  }))
  lines.push(formatTable(CLASS_COLUMNS, rows))

  const survivors = summary.classes.flatMap((c) => c.newSurvivors)
  if (survivors.length > 0) {
    lines.push('')
    lines.push(`New surviving mutations: ${String(summary.newSurvivorCount)}`)
    lines.push(formatMutationTable(survivors))
  }

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// runDiffAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the diff command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runDiffAction(options: DiffActionOptions): Promise<number> {
  const { buildId, className, projectRoot, outputFormat, version = '0.0.0' } = options

  let history: OpenHistory | null = null

  try {
    const config = await loadCommandConfig(options)
    const dbPath = resolveDatabasePath(projectRoot, config.history.database_path)
    history = openHistory(dbPath, false)
    if (history === null) {
      process.stderr.write(
        `Error: No build history found at ${dbPath}. Run 'mutant-gate record' first.\n`,
      )
      return DIFF_EXIT_ERROR
    }

    const { store } = history
    const current = store.getReport(buildId)
    const previousBuildId = store.getPredecessor(buildId)
    const previous = previousBuildId !== undefined ? store.getReport(previousBuildId) : undefined
    const engine = createDiffEngine()

    let regressions: DiffJsonData['regressions']
    let table: string

    if (className !== undefined) {
      const different = engine.findDifferentMutations(current, previous, className)
      const survivors = engine.findNewSurvivors(current, previous, className)
      if (!different.applicable || !survivors.applicable) {
        regressions = { applicable: false, reason: 'missing-predecessor' }
        table = 'No previous build to compare against'
      } else {
        const data: ClassDiffData = {
          class_name: className,
          different_mutations: [...different.items],
          new_survivors: [...survivors.items],
        }
        regressions = data
        table = [
          `Class: ${className}`,
          `Changed mutations: ${String(data.different_mutations.length)}`,
          formatMutationTable(data.different_mutations),
          '',
          `New surviving mutations: ${String(data.new_survivors.length)}`,
          formatMutationTable(data.new_survivors),
        ].join('\n')
      }
    } else {
      const summary = engine.summarizeRegressions(current, previous, {
        logger: createConsoleSink(),
      })
      regressions = summary
      table = formatRegressionTable(summary)
    }

    if (outputFormat === 'json') {
      const output = buildJsonOutput<DiffJsonData>(
        'mutant-gate diff',
        {
          build_id: buildId,
          previous_build_id: previousBuildId ?? null,
          regressions,
        },
        version,
      )
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else {
      process.stdout.write(`Build: ${buildId} (previous: ${previousBuildId ?? 'none'})\n\n`)
      process.stdout.write(table + '\n')
    }

    return DIFF_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runDiffAction failed')
    return DIFF_EXIT_ERROR
  } finally {
    history?.wrapper.close()
  }
}

// ---------------------------------------------------------------------------
// registerDiffCommand
// ---------------------------------------------------------------------------

/**
 * Register the `mutant-gate diff` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param version     - Current package version (for JSON output)
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerDiffCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('diff <build-id>')
    .description('Show mutations that changed since the previous build')
    .option('--class <name>', 'Only show changes for this class')
    .option('--database <path>', 'Build history database (overrides history.database_path)')
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .action(async (buildId: string, opts: {
      class?: string
      database?: string
      outputFormat: string
    }) => {
      const outputFormat = parseOutputFormat(opts.outputFormat)
      if (outputFormat === undefined) {
        process.stderr.write(
          `Error: Invalid output format '${opts.outputFormat}'. Valid formats: ${OUTPUT_FORMATS.join(', ')}\n`,
        )
        process.exitCode = DIFF_EXIT_ERROR
        return
      }

      const exitCode = await runDiffAction({
        buildId,
        ...(opts.class !== undefined && { className: opts.class }),
        ...(opts.database !== undefined && { databasePath: opts.database }),
        outputFormat,
        projectRoot,
        version,
      })

      process.exitCode = exitCode
    })
}
