/**
 * Calendar month value. `month` is 1-12.
 */
export interface Month {
  readonly year: number
  readonly month: number
}

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
]

const monthIndex = ({ year, month }: Month): number => year * 12 + (month - 1)

const fromIndex = (index: number): Month => ({
  year: Math.floor(index / 12),
  month: (index % 12) + 1,
})

/**
 * Total ordering of months: negative, zero or positive like a sort comparator.
 */
export const compareMonths = (a: Month, b: Month): number => monthIndex(a) - monthIndex(b)

export const isSameMonth = (a: Month, b: Month): boolean => compareMonths(a, b) === 0

export const addMonths = (month: Month, delta: number): Month => fromIndex(monthIndex(month) + delta)

export const previousMonth = (month: Month): Month => addMonths(month, -1)

/**
 * Number of months from `start` to `end` inclusive (0 when end is before start).
 */
export const countMonths = (start: Month, end: Month): number =>
  Math.max(0, compareMonths(end, start) + 1)

/**
 * Month of a `YYYY-MM-DD` calendar date. Uses string slicing so no timezone
 * conversion can shift the day into a neighbouring month.
 */
export const monthOfDate = (date: string): Month => ({
  year: Number(date.slice(0, 4)),
  month: Number(date.slice(5, 7)),
})

/**
 * Month of an instant, in UTC.
 */
export const monthOfInstant = (instant: Date): Month => ({
  year: instant.getUTCFullYear(),
  month: instant.getUTCMonth() + 1,
})

/**
 * @example
 * monthKey({ year: 2024, month: 3 }) // => '2024-03'
 */
export const monthKey = ({ year, month }: Month): string =>
  `${year}-${String(month).padStart(2, '0')}`

/**
 * @example
 * monthLabel({ year: 2024, month: 3 }) // => 'March 2024'
 */
export const monthLabel = ({ year, month }: Month): string => `${MONTH_NAMES[month - 1]} ${year}`

/**
 * Inclusive range of months. The returned iterable is lazy and can be
 * iterated any number of times.
 *
 * @example
 * [...monthRange({ year: 2023, month: 11 }, { year: 2024, month: 1 })].map(monthKey)
 * // => ['2023-11', '2023-12', '2024-01']
 */
export const monthRange = (start: Month, end: Month): Iterable<Month> => ({
  *[Symbol.iterator]() {
    const last = monthIndex(end)
    for (let index = monthIndex(start); index <= last; index++) {
      yield fromIndex(index)
    }
  },
})
