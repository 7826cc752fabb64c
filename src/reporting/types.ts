/**
 * Types for the monthly statistics report.
 *
 * These types back both the CLI output (JSON/text) and the Ink dashboard.
 * All monetary values are milliunits (1000 = 1.00).
 */

import type { Month } from '../expenses/month.js'

export type { Dataset, LedgerRecord, Provenance } from '../expenses/expense-types.js'

/**
 * Default number of categories listed in a report.
 */
export const DEFAULT_TOP_CATEGORIES = 5

/**
 * Changes smaller than this many percent count as stable.
 */
export const STABLE_TREND_THRESHOLD = 5

/**
 * A change against a baseline.
 *
 * - `up` / `down` / `stable`: the baseline was non-zero, `percent` is defined
 * - `new`: the baseline was zero but the current value is not
 * - `undefined`: there is nothing to compare against
 *
 * @example
 * const trend: Trend = { direction: 'up', percent: 12.2 }
 */
export type Trend =
  | { direction: 'up' | 'down' | 'stable'; percent: number }
  | { direction: 'new'; percent: null }
  | { direction: 'undefined'; percent: null }

export type TrendDirection = Trend['direction']

/**
 * Expense total for one calendar month. Months without expenses are present
 * with a zero total.
 */
export interface MonthBucket {
  month: Month
  /** YYYY-MM */
  key: string
  total: number
  expenseCount: number
}

/**
 * One category in the last complete month, compared with the month before.
 *
 * @example
 * const food: CategoryAggregate = {
 *   name: 'Groceries',
 *   total: 456780,
 *   priorTotal: 400000,
 *   expenseCount: 12,
 *   trend: { direction: 'up', percent: 14.2 },
 * }
 */
export interface CategoryAggregate {
  name: string
  /** Spent in the last complete month */
  total: number
  /** Spent in the month before that */
  priorTotal: number
  /** Number of expenses in the last complete month */
  expenseCount: number
  trend: Trend
}

export interface StatisticsOptions {
  /** The run's current instant; the month it falls in is never "complete" */
  now: Date
  topCategories: number
}

/**
 * Complete statistics for one run.
 */
export interface StatisticsReport {
  /** ISO timestamp of `now` */
  generatedAt: string
  lastCompleteMonth: {
    month: Month
    /** YYYY-MM */
    key: string
    /** e.g. "March 2024" */
    label: string
  }
  /** Expense total in the last complete month (0 when history doesn't reach it) */
  lastMonthTotal: number
  lastMonthExpenseCount: number
  /** Mean of all month buckets, zero months included */
  monthlyAverage: number
  /** Number of month buckets */
  totalMonths: number
  /** Last month against the monthly average */
  trend: Trend
  months: MonthBucket[]
  /** Ranked by last-month total, highest first */
  topCategories: CategoryAggregate[]
  /** Most common currency among counted expenses; informational only */
  currencyCode: string | null
}
