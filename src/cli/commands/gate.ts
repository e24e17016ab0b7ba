/**
 * `mutant-gate gate` command
 *
 * Evaluates a recorded build against the configured quality gate.
 *
 * Usage:
 *   mutant-gate gate <build-id>
 *   mutant-gate gate <build-id> --min-kill-ratio 75
 *   mutant-gate gate <build-id> --must-improve
 *   mutant-gate gate <build-id> --output-format json
 *
 * Exit codes:
 *   0 - SUCCESS
 *   1 - Error (no history, unknown build, invalid configuration)
 *   2 - UNSTABLE
 *   3 - FAILURE
 */

import type { Command } from 'commander'
import type { PartialMutantGateConfig } from '../../modules/config/config-schema.js'
import { evaluateBuild } from '../../modules/build-evaluator/build-evaluator.js'
import type { BuildEvaluation } from '../../modules/build-evaluator/build-evaluator.js'
import type { MutationStats } from '../../modules/mutation-report/types.js'
import { createGateEngine } from '../../modules/quality-gates/gate-engine-impl.js'
import { createConditionsFromConfig } from '../../modules/quality-gates/gate-registry.js'
import type { BuildResult, ConditionOutcome } from '../../modules/quality-gates/types.js'
import { createLogger } from '../../utils/logger.js'
import {
  OUTPUT_FORMATS,
  buildJsonOutput,
  formatPercent,
  formatTable,
  parseOutputFormat,
} from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'
import {
  createConsoleSink,
  loadCommandConfig,
  openHistory,
  resolveDatabasePath,
} from '../utils/history.js'
import type { HistoryCommandOptions, OpenHistory } from '../utils/history.js'

const logger = createLogger('gate-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const GATE_EXIT_SUCCESS = 0
export const GATE_EXIT_ERROR = 1
export const GATE_EXIT_UNSTABLE = 2
export const GATE_EXIT_FAILURE = 3

const EXIT_CODES: Readonly<Record<BuildResult, number>> = {
  SUCCESS: GATE_EXIT_SUCCESS,
  UNSTABLE: GATE_EXIT_UNSTABLE,
  FAILURE: GATE_EXIT_FAILURE,
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GateActionOptions extends HistoryCommandOptions {
  buildId: string
  /** Overrides `gate.minimum_kill_ratio` */
  minKillRatio?: number
  /** Overrides `gate.kill_ratio_must_improve` */
  mustImprove?: boolean
  outputFormat: OutputFormat
}

export interface GateJsonData {
  build_id: string
  previous_build_id: string | null
  result: BuildResult
  conditions: ConditionOutcome[]
  stats: MutationStats
  previous_stats: MutationStats | null
}

// ---------------------------------------------------------------------------
// Table formatters
// ---------------------------------------------------------------------------

function statsLine(stats: MutationStats): string {
  return `${formatPercent(stats.killPercent)} (${String(stats.killCount)}/${String(stats.totalMutations)})`
}

/**
 * Format a gate evaluation as a human-readable display.
 */
export function formatGateTable(evaluation: BuildEvaluation): string {
  const lines: string[] = []

  lines.push(`Build:      ${evaluation.buildRef}`)
  lines.push(`Previous:   ${evaluation.previousBuildRef ?? '(none)'}`)
  lines.push(`Kill ratio: ${statsLine(evaluation.stats)}`)
  if (evaluation.previousStats !== undefined) {
    lines.push(`Was:        ${statsLine(evaluation.previousStats)}`)
  }
  lines.push('')

  if (evaluation.conditions.length === 0) {
    lines.push('No gate conditions configured')
  } else {
    const rows: Record<string, string>[] = evaluation.conditions.map((c) => ({
      condition: c.condition,
      result: c.result,
    }))
    lines.push(formatTable(
      [
        { header: 'Condition', key: 'condition' },
        { header: 'Result', key: 'result' },
      ],
      rows,
    ))
  }

  lines.push('')
  lines.push(`Result: ${evaluation.result}`)

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// runGateAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the gate command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runGateAction(options: GateActionOptions): Promise<number> {
  const { buildId, projectRoot, outputFormat, version = '0.0.0' } = options

  let history: OpenHistory | null = null

  try {
    const gateOverrides: NonNullable<PartialMutantGateConfig['gate']> = {
      ...(options.minKillRatio !== undefined && { minimum_kill_ratio: options.minKillRatio }),
      ...(options.mustImprove === true && { kill_ratio_must_improve: true }),
    }
    const config = await loadCommandConfig(options, { gate: gateOverrides })
    const engine = createGateEngine(createConditionsFromConfig(config.gate))

    const dbPath = resolveDatabasePath(projectRoot, config.history.database_path)
    history = openHistory(dbPath, false)
    if (history === null) {
      process.stderr.write(
        `Error: No build history found at ${dbPath}. Run 'mutant-gate record' first.\n`,
      )
      return GATE_EXIT_ERROR
    }

    const evaluation = evaluateBuild(history.store, buildId, engine, {
      logger: createConsoleSink(),
    })

    if (outputFormat === 'json') {
      const output = buildJsonOutput<GateJsonData>(
        'mutant-gate gate',
        {
          build_id: evaluation.buildRef,
          previous_build_id: evaluation.previousBuildRef ?? null,
          result: evaluation.result,
          conditions: evaluation.conditions,
          stats: evaluation.stats,
          previous_stats: evaluation.previousStats ?? null,
        },
        version,
      )
      process.stdout.write(JSON.stringify(output, null, 2) + '\n')
    } else {
      process.stdout.write(formatGateTable(evaluation) + '\n')
    }

    logger.info({ buildId, result: evaluation.result }, 'Gate evaluated')
    return EXIT_CODES[evaluation.result]
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    logger.error({ err }, 'runGateAction failed')
    return GATE_EXIT_ERROR
  } finally {
    history?.wrapper.close()
  }
}

// ---------------------------------------------------------------------------
// registerGateCommand
// ---------------------------------------------------------------------------

/**
 * Register the `mutant-gate gate` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param version     - Current package version (for JSON output)
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerGateCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('gate <build-id>')
    .description('Evaluate a recorded build against the mutation quality gate')
    .option('--min-kill-ratio <percent>', 'Minimum kill percentage, 0-100 (overrides gate.minimum_kill_ratio)')
    .option('--must-improve', 'Also compare the kill ratio with the previous build', false)
    .option('--database <path>', 'Build history database (overrides history.database_path)')
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .action(async (buildId: string, opts: {
      minKillRatio?: string
      mustImprove: boolean
      database?: string
      outputFormat: string
    }) => {
      const outputFormat = parseOutputFormat(opts.outputFormat)
      if (outputFormat === undefined) {
        process.stderr.write(
          `Error: Invalid output format '${opts.outputFormat}'. Valid formats: ${OUTPUT_FORMATS.join(', ')}\n`,
        )
        process.exitCode = GATE_EXIT_ERROR
        return
      }

      const exitCode = await runGateAction({
        buildId,
        ...(opts.minKillRatio !== undefined && { minKillRatio: Number(opts.minKillRatio) }),
        mustImprove: opts.mustImprove,
        ...(opts.database !== undefined && { databasePath: opts.database }),
        outputFormat,
        projectRoot,
        version,
      })

      process.exitCode = exitCode
    })
}
