import type { MonthBucket } from '../reporting/index.js'

export interface MonthBar {
  key: string
  total: number
  /** Filled cells, 0..width */
  filled: number
}

/**
 * Scales the most recent `limit` buckets to bars of at most `width` cells,
 * relative to the largest total shown. Non-zero totals get at least one cell;
 * zero and negative totals get none.
 *
 * @example
 * scaleMonthBars(buckets, 12, 20).map((bar) => bar.filled)
 * // totals [100, 50, 0] => [20, 10, 0]
 */
export const scaleMonthBars = (buckets: readonly MonthBucket[], limit: number, width: number): MonthBar[] => {
  const shown = buckets.slice(-limit)
  const max = Math.max(0, ...shown.map((bucket) => bucket.total))

  return shown.map((bucket) => {
    if (max === 0 || bucket.total <= 0) return { key: bucket.key, total: bucket.total, filled: 0 }
    const filled = Math.max(1, Math.round((bucket.total / max) * width))
    return { key: bucket.key, total: bucket.total, filled }
  })
}
