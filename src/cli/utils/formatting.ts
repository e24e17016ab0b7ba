/**
 * Output helpers shared by the mutant-gate commands: tables, percentages,
 * `--output-format` parsing and the JSON envelope.
 */

/** One column of a table rendered by formatTable() */
export interface TableColumn {
  header: string
  /** Row property holding the cell text */
  key: string
  /** Numbers read better right-aligned; default left */
  align?: 'left' | 'right'
}

/**
 * Render rows as aligned columns separated by ` | `, with a `-+-` rule under
 * the header. Trailing whitespace is trimmed from every line.
 */
export function formatTable(
  columns: readonly TableColumn[],
  rows: readonly Record<string, string>[],
): string {
  const widths = columns.map((column) =>
    rows.reduce((max, row) => Math.max(max, (row[column.key] ?? '').length), column.header.length),
  )

  const renderLine = (cells: string[]): string =>
    cells
      .map((cell, i) => {
        const width = widths[i] ?? cell.length
        return columns[i]?.align === 'right' ? cell.padStart(width) : cell.padEnd(width)
      })
      .join(' | ')
      .trimEnd()

  const header = renderLine(columns.map((c) => c.header))
  const rule = widths.map((w) => '-'.repeat(w)).join('-+-')
  const body = rows.map((row) => renderLine(columns.map((c) => row[c.key] ?? '')))

  return [header, rule, ...body].join('\n')
}

/**
 * Render a kill percentage for display, e.g. `72.73%`.
 * Display only; gate decisions always use the unrounded value.
 */
export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`
}

/** Output formats accepted by `--output-format` */
export const OUTPUT_FORMATS = ['table', 'json'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

/** Narrow a raw `--output-format` value; undefined when it is not supported */
export function parseOutputFormat(value: string): OutputFormat | undefined {
  return OUTPUT_FORMATS.find((format) => format === value)
}

/** Envelope of every `--output-format json` response */
export interface CLIJsonOutput<T> {
  /** ISO time the command ran */
  timestamp: string
  version: string
  /** e.g. `mutant-gate gate` */
  command: string
  data: T
}

/** Wrap a command's data in the JSON envelope, stamped with the current time. */
export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}
