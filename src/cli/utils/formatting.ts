/**
 * CLI output formatting utilities
 *
 * Aligned text tables for human output and a JSON envelope for machine output.
 */

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by key)
 * @param keys    - Object keys to read from each row (in column order)
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ').trimEnd()

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ').trimEnd()
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

/** Render a list for a table cell; `-` when empty */
export function listCell(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '-'
}

export type OutputFormat = 'human' | 'json'

export function parseOutputFormat(raw: string | undefined): OutputFormat {
  return raw === 'json' ? 'json' : 'human'
}

/**
 * Envelope for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** Package version string */
  version: string
  /** The CLI command that was executed */
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}

/** Write a JSON envelope to stdout */
export function writeJsonOutput<T>(command: string, data: T, version: string): void {
  process.stdout.write(JSON.stringify(buildJsonOutput(command, data, version), null, 2) + '\n')
}
