/**
 * Monthly statistics feature.
 *
 * Turns a reconciled dataset into last-month totals, gap-filled averages and
 * category trends for the CLI report and the dashboard.
 */

// Engine
export {
  computeStatistics,
  calculateTrend,
  filterCountableExpenses,
  buildMonthBuckets,
  calculateMonthlyAverage,
  aggregateCategories,
  UNCATEGORIZED,
} from './statistics-engine.js'

// Types
export { DEFAULT_TOP_CATEGORIES, STABLE_TREND_THRESHOLD } from './types.js'
export type {
  Trend,
  TrendDirection,
  MonthBucket,
  CategoryAggregate,
  StatisticsOptions,
  StatisticsReport,
  Dataset,
  LedgerRecord,
  Provenance,
} from './types.js'
