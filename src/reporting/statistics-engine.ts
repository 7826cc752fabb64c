import { isCountableExpense } from '../expenses/record-normalizer.js'
import { UNCATEGORIZED } from '../expenses/expense-types.js'
import {
  monthKey,
  monthLabel,
  monthOfDate,
  monthOfInstant,
  monthRange,
  previousMonth,
  type Month,
} from '../expenses/month.js'
import {
  STABLE_TREND_THRESHOLD,
  type CategoryAggregate,
  type Dataset,
  type LedgerRecord,
  type MonthBucket,
  type StatisticsOptions,
  type StatisticsReport,
  type Trend,
} from './types.js'

export { UNCATEGORIZED }

const UNDEFINED_TREND: Trend = { direction: 'undefined', percent: null }

const roundPercent = (value: number): number => {
  const rounded = Math.round(value * 10) / 10
  return rounded === 0 ? 0 : rounded
}

/**
 * Compares `current` with `baseline`. A zero baseline never divides: it is
 * `new` when there is current spending, `undefined` otherwise.
 *
 * @example
 * calculateTrend(150, 100) // => { direction: 'up', percent: 50 }
 * calculateTrend(80, 0)    // => { direction: 'new', percent: null }
 */
export const calculateTrend = (current: number, baseline: number): Trend => {
  if (baseline === 0) {
    return current > 0 ? { direction: 'new', percent: null } : UNDEFINED_TREND
  }

  const percent = roundPercent(((current - baseline) / baseline) * 100)
  if (Math.abs(percent) < STABLE_TREND_THRESHOLD) return { direction: 'stable', percent }
  return { direction: percent > 0 ? 'up' : 'down', percent }
}

/**
 * Expense records that count toward statistics: no settlements, no zero costs.
 */
export const filterCountableExpenses = (records: readonly LedgerRecord[]): LedgerRecord[] =>
  records.filter(isCountableExpense)

/**
 * One bucket per month from the earliest to the latest expense, inclusive.
 * Months without expenses get a zero bucket.
 *
 * @example
 * // expenses only in 2024-01 and 2024-06
 * buildMonthBuckets(expenses).map((b) => b.key)
 * // => ['2024-01', '2024-02', '2024-03', '2024-04', '2024-05', '2024-06']
 */
export const buildMonthBuckets = (expenses: readonly LedgerRecord[]): MonthBucket[] => {
  if (expenses.length === 0) return []

  let earliest = expenses[0].date
  let latest = expenses[0].date
  const sums = new Map<string, { total: number; expenseCount: number }>()

  for (const record of expenses) {
    if (record.date < earliest) earliest = record.date
    if (record.date > latest) latest = record.date

    const key = record.date.slice(0, 7)
    const sum = sums.get(key) ?? { total: 0, expenseCount: 0 }
    sum.total += record.cost
    sum.expenseCount += 1
    sums.set(key, sum)
  }

  const buckets: MonthBucket[] = []
  for (const month of monthRange(monthOfDate(earliest), monthOfDate(latest))) {
    const key = monthKey(month)
    const sum = sums.get(key)
    buckets.push({ month, key, total: sum?.total ?? 0, expenseCount: sum?.expenseCount ?? 0 })
  }
  return buckets
}

/**
 * Mean monthly spending with empty months counted, so quiet months pull the
 * average down. Returns 0 for no buckets.
 *
 * @example
 * // totals [100, 0, 0, 200]
 * calculateMonthlyAverage(buckets) // => 75
 */
export const calculateMonthlyAverage = (buckets: readonly MonthBucket[]): number => {
  if (buckets.length === 0) return 0
  const total = buckets.reduce((sum, bucket) => sum + bucket.total, 0)
  return total / buckets.length
}

/**
 * Per-category totals for `month` and the month before it, ranked by the
 * `month` total (highest first, ties by name) and cut to `limit`.
 */
export const aggregateCategories = (
  expenses: readonly LedgerRecord[],
  month: Month,
  limit: number
): CategoryAggregate[] => {
  const currentKey = monthKey(month)
  const priorKey = monthKey(previousMonth(month))
  const accumulator = new Map<string, { total: number; priorTotal: number; expenseCount: number }>()

  for (const record of expenses) {
    const key = record.date.slice(0, 7)
    if (key !== currentKey && key !== priorKey) continue

    const name = record.category?.name ?? UNCATEGORIZED
    const entry = accumulator.get(name) ?? { total: 0, priorTotal: 0, expenseCount: 0 }
    if (key === currentKey) {
      entry.total += record.cost
      entry.expenseCount += 1
    } else {
      entry.priorTotal += record.cost
    }
    accumulator.set(name, entry)
  }

  return [...accumulator.entries()]
    .map(([name, entry]) => ({
      name,
      ...entry,
      trend: calculateTrend(entry.total, entry.priorTotal),
    }))
    .sort((a, b) => b.total - a.total || a.name.localeCompare(b.name))
    .slice(0, Math.max(0, limit))
}

const mostCommonCurrency = (expenses: readonly LedgerRecord[]): string | null => {
  const counts = new Map<string, number>()
  let best: string | null = null
  let bestCount = 0

  for (const record of expenses) {
    const count = (counts.get(record.currencyCode) ?? 0) + 1
    counts.set(record.currencyCode, count)
    if (count > bestCount) {
      best = record.currencyCode
      bestCount = count
    }
  }
  return best
}

/**
 * Produces the statistics report for a dataset. Pure: same dataset and
 * options, same report.
 *
 * The last complete month is always the month before `now`, whether or not
 * it has expenses. An empty dataset gives a zeroed report with undefined
 * trends.
 *
 * @example
 * const report = computeStatistics(dataset, { now: new Date(), topCategories: 5 })
 */
export const computeStatistics = (dataset: Dataset, options: StatisticsOptions): StatisticsReport => {
  const expenses = filterCountableExpenses(dataset.records)
  const lastComplete = previousMonth(monthOfInstant(options.now))
  const lastCompleteKey = monthKey(lastComplete)

  const months = buildMonthBuckets(expenses)
  const monthlyAverage = calculateMonthlyAverage(months)
  const lastMonthBucket = months.find((bucket) => bucket.key === lastCompleteKey)
  const lastMonthTotal = lastMonthBucket?.total ?? 0

  return {
    generatedAt: options.now.toISOString(),
    lastCompleteMonth: {
      month: lastComplete,
      key: lastCompleteKey,
      label: monthLabel(lastComplete),
    },
    lastMonthTotal,
    lastMonthExpenseCount: lastMonthBucket?.expenseCount ?? 0,
    monthlyAverage: Math.round(monthlyAverage),
    totalMonths: months.length,
    trend: monthlyAverage === 0 ? UNDEFINED_TREND : calculateTrend(lastMonthTotal, monthlyAverage),
    months,
    topCategories: aggregateCategories(expenses, lastComplete, options.topCategories),
    currencyCode: mostCommonCurrency(expenses),
  }
}
