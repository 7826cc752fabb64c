import type { OutputFormat } from './args.js'

export interface OutputFormatter {
  /** Output successful result to stdout */
  success<T>(data: T): void
  /** Output error to stderr and exit with code 1 */
  error(message: string, details?: unknown): never
}

const hasFormatted = (data: unknown): data is { formatted: string } =>
  typeof data === 'object' && data !== null && 'formatted' in data && typeof data.formatted === 'string'

/**
 * Create an output formatter for the given format. Progress and warnings go
 * through the logger; the formatter only owns the command's result.
 */
export const createFormatter = (format: OutputFormat): OutputFormatter => {
  if (format === 'json') {
    return {
      success: <T>(data: T) => {
        console.log(JSON.stringify(data, null, 2))
      },
      error: (message: string, details?: unknown): never => {
        console.error(JSON.stringify({ success: false, error: message, details }, null, 2))
        process.exit(1)
      },
    }
  }

  return {
    success: <T>(data: T) => {
      if (typeof data === 'string') {
        console.log(data)
      } else if (hasFormatted(data)) {
        console.log(data.formatted)
      } else {
        console.log(JSON.stringify(data, null, 2))
      }
    },
    error: (message: string, details?: unknown): never => {
      console.error(`Error: ${message}`)
      if (details) {
        console.error(details)
      }
      process.exit(1)
    },
  }
}

/**
 * Create a simple text table from data
 *
 * @example
 * formatTable(['Name', 'Total'], [['Food', '€10.00']])
 * // Name  Total
 * // ----  ------
 * // Food  €10.00
 */
export const formatTable = (
  headers: string[],
  rows: string[][],
  columnWidths?: number[]
): string => {
  const widths = columnWidths || headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map(r => (r[i] || '').length))
    return Math.max(h.length, maxRowWidth)
  })

  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => (cell || '').padEnd(widths[i] ?? 0)).join('  ').trimEnd()

  const headerLine = formatRow(headers)
  const separator = widths.map(w => '-'.repeat(w)).join('  ')
  const dataLines = rows.map(formatRow)

  return [headerLine, separator, ...dataLines].join('\n')
}
