import type { ReportOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import type { Logger } from '../../shared/logger.js'
import { formatMoney } from '../../shared/money.js'
import { createFormatter, formatTable } from '../output.js'
import { runAndPersist, type RunDependencies } from '../../pipeline/run-report.js'
import type { RunResult } from '../../pipeline/report-sinks.js'
import type { Dataset, Provenance, StatisticsReport, Trend } from '../../reporting/index.js'

const MONTHS_SHOWN = 12

export interface ReportResult {
  success: true
  provenance: Provenance
  snapshot: string | null
  recordCount: number
  rejectedCount: number
  report: StatisticsReport
  formatted?: string
}

const PROVENANCE_LABELS: Record<Provenance, string> = {
  'remote-cache': 'Google Drive snapshot',
  'local-cache': 'local snapshot',
  'live-fetch': 'live fetch from Splitwise',
}

/**
 * Formats a trend as a signed percentage, `new` or `-`.
 *
 * @example
 * formatTrend({ direction: 'up', percent: 12.5 }) // => '+12.5%'
 * formatTrend({ direction: 'new', percent: null }) // => 'new'
 */
export const formatTrend = (trend: Trend): string => {
  switch (trend.direction) {
    case 'new':
      return 'new'
    case 'undefined':
      return '-'
    default:
      return `${trend.percent > 0 ? '+' : ''}${trend.percent.toFixed(1)}%`
  }
}

const describeTrend = (trend: Trend): string => {
  switch (trend.direction) {
    case 'up':
      return 'above average'
    case 'down':
      return 'below average'
    case 'stable':
      return 'about average'
    default:
      return 'no average yet'
  }
}

const describeSource = (dataset: Dataset): string => {
  const label = PROVENANCE_LABELS[dataset.provenance]
  return dataset.snapshot ? `${label} (${dataset.snapshot.name})` : label
}

/**
 * Generates a formatted text report for terminal display.
 */
export const formatTextReport = (title: string, { dataset, report }: RunResult): string => {
  const lines: string[] = []
  const divider = '─'.repeat(60)
  const money = (milliunits: number) => formatMoney(milliunits, report.currencyCode ?? undefined)

  // Header
  lines.push('')
  lines.push(`  ${title}: ${report.lastCompleteMonth.label}`)
  lines.push(`  Source: ${describeSource(dataset)}`)
  lines.push(`  Generated: ${report.generatedAt}`)
  lines.push('')
  lines.push(divider)

  // Summary Section
  lines.push('')
  lines.push('  SUMMARY')
  lines.push('')
  lines.push(`  Last Month:     ${money(report.lastMonthTotal)} (${report.lastMonthExpenseCount} expenses)`)
  lines.push(`  Avg Monthly:    ${money(report.monthlyAverage)} over ${report.totalMonths} months`)
  lines.push(`  vs Average:     ${formatTrend(report.trend)} (${describeTrend(report.trend)})`)

  // Category Breakdown
  lines.push('')
  lines.push(divider)
  lines.push('')
  lines.push('  TOP CATEGORIES')
  lines.push('')

  if (report.topCategories.length === 0) {
    lines.push(`  No expenses in ${report.lastCompleteMonth.label}.`)
  } else {
    const categoryRows = report.topCategories.map((category) => [
      category.name.slice(0, 24),
      money(category.total),
      money(category.priorTotal),
      formatTrend(category.trend),
    ])
    lines.push(formatTable(['Category', 'Spent', 'Month Before', 'Trend'], categoryRows))
  }

  // Month history
  if (report.months.length > 0) {
    lines.push('')
    lines.push(divider)
    lines.push('')
    lines.push(`  MONTHLY TOTALS (last ${Math.min(MONTHS_SHOWN, report.months.length)} months)`)
    lines.push('')
    const monthRows = report.months
      .slice(-MONTHS_SHOWN)
      .map((bucket) => [bucket.key, money(bucket.total), String(bucket.expenseCount)])
    lines.push(formatTable(['Month', 'Spent', 'Expenses'], monthRows))
  }

  if (dataset.rejected.length > 0) {
    lines.push('')
    lines.push(divider)
    lines.push('')
    lines.push(`  SKIPPED ENTRIES: ${dataset.rejected.length}`)
    for (const rejection of dataset.rejected.slice(0, 5)) {
      lines.push(`  ${rejection.id ?? '(no id)'}: ${rejection.reason}`)
    }
  }

  lines.push('')
  lines.push(divider)
  lines.push('')

  return lines.join('\n')
}

/**
 * Shapes a run into the command's output, adding the text rendering for
 * text mode.
 */
export const buildReportResult = (
  result: RunResult,
  options: Pick<ReportOptions, 'format'>,
  title: string
): ReportResult => ({
  success: true,
  provenance: result.dataset.provenance,
  snapshot: result.dataset.snapshot?.name ?? null,
  recordCount: result.dataset.records.length,
  rejectedCount: result.dataset.rejected.length,
  report: result.report,
  ...(options.format === 'text' ? { formatted: formatTextReport(title, result) } : {}),
})

/**
 * Report CLI command implementation.
 *
 * @example
 * ledger-digest report --local --format text
 */
export const reportCommand = async (
  options: ReportOptions,
  config: AppConfig,
  deps: RunDependencies
): Promise<ReportResult> => {
  const formatter = createFormatter(options.format)
  const logger: Logger = deps.logger

  logger.info(`Generating ${config.reporting.title} report...`)

  const result = await runAndPersist(
    {
      preferCache: options.local,
      upload: options.upload,
      save: options.save,
      topCategories: options.top,
    },
    deps
  )

  const output = buildReportResult(result, options, config.reporting.title)
  formatter.success(output)
  return output
}
