import { parseMilliunits } from '../shared/money.js'
import type { Logger } from '../shared/logger.js'
import {
  rawEntrySchema,
  UNCATEGORIZED,
  type CategoryRef,
  type LedgerRecord,
  type NormalizeResult,
  type RawEntry,
  type RecordRejection,
} from './expense-types.js'

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|T)/

const DEFAULT_CURRENCY = 'EUR'

/**
 * Extracts the calendar day from a date or ISO timestamp. Rejects impossible
 * dates such as 2024-02-30.
 */
export const parseCalendarDate = (value: string): string | null => {
  const match = DATE_PREFIX.exec(value)
  if (!match) return null

  const [, year, month, day] = match
  const check = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  const valid =
    check.getUTCFullYear() === Number(year) &&
    check.getUTCMonth() === Number(month) - 1 &&
    check.getUTCDate() === Number(day)
  if (!valid) return null
  if (value.length === 10) return `${year}-${month}-${day}`

  // Timestamps with an offset can land on a neighbouring UTC day
  const instant = new Date(value)
  if (Number.isNaN(instant.getTime())) return null
  return instant.toISOString().slice(0, 10)
}

const readId = (entry: unknown): string | null => {
  if (entry && typeof entry === 'object' && 'id' in entry) {
    const { id } = entry
    if (typeof id === 'number' || (typeof id === 'string' && id.length > 0)) return String(id)
  }
  return null
}

const toCategory = (raw: RawEntry): CategoryRef | null => {
  if (!raw.category) return null
  const { id, name, parent } = raw.category
  return {
    id,
    name: name || UNCATEGORIZED,
    parent: typeof parent?.id === 'number' ? { id: parent.id, name: parent.name || null } : null,
  }
}

/**
 * Converts one raw ledger entry into a LedgerRecord.
 *
 * Deleted entries are dropped. Entries without a cost are kept with cost 0.
 * Payments between members become settlements. A missing id or a malformed
 * date or cost rejects the entry.
 */
export const normalizeEntry = (entry: unknown): NormalizeResult => {
  const parsed = rawEntrySchema.safeParse(entry)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return {
      status: 'rejected',
      rejection: {
        id: readId(entry),
        reason: issue ? `${issue.path.join('.') || 'entry'}: ${issue.message}` : 'invalid entry',
      },
    }
  }

  const raw = parsed.data
  const id = String(raw.id)

  if (raw.deleted_at) {
    return { status: 'dropped', id, reason: `deleted at ${raw.deleted_at}` }
  }

  const date = raw.date ? parseCalendarDate(raw.date) : null
  if (!date) {
    return { status: 'rejected', rejection: { id, reason: `malformed date: ${String(raw.date)}` } }
  }

  let cost = 0
  if (raw.cost !== null && raw.cost !== undefined && raw.cost !== '') {
    const parsedCost = parseMilliunits(raw.cost)
    if (parsedCost === null) {
      return { status: 'rejected', rejection: { id, reason: `malformed cost: ${String(raw.cost)}` } }
    }
    cost = parsedCost
  }

  const record: LedgerRecord = {
    id,
    kind: raw.payment === true ? 'settlement' : 'expense',
    date,
    cost,
    currencyCode: raw.currency_code || DEFAULT_CURRENCY,
    category: raw.payment === true ? null : toCategory(raw),
    description: raw.description ?? '',
    raw,
  }

  return { status: 'accepted', record }
}

export interface NormalizedEntries {
  records: LedgerRecord[]
  rejected: RecordRejection[]
  droppedCount: number
  duplicateCount: number
}

/**
 * Normalizes a batch of raw entries into a dataset body: ids unique (first
 * copy wins), ordered by date. Rejections are logged as warnings and returned.
 */
export const normalizeEntries = (entries: readonly unknown[], logger: Logger): NormalizedEntries => {
  const seen = new Set<string>()
  const records: LedgerRecord[] = []
  const rejected: RecordRejection[] = []
  let droppedCount = 0
  let duplicateCount = 0

  for (const entry of entries) {
    const result = normalizeEntry(entry)

    switch (result.status) {
      case 'dropped':
        droppedCount++
        break
      case 'rejected':
        rejected.push(result.rejection)
        logger.warn(`Skipping ledger entry ${result.rejection.id ?? '(no id)'}: ${result.rejection.reason}`)
        break
      case 'accepted':
        if (seen.has(result.record.id)) {
          duplicateCount++
          break
        }
        seen.add(result.record.id)
        records.push(result.record)
        break
    }
  }

  if (duplicateCount > 0) {
    logger.debug(`Removed ${duplicateCount} duplicate ledger entries`)
  }
  if (droppedCount > 0) {
    logger.debug(`Dropped ${droppedCount} deleted ledger entries`)
  }

  // Array.prototype.sort is stable, so same-day records keep source order
  records.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))

  return { records, rejected, droppedCount, duplicateCount }
}

/**
 * Records that count toward statistics and dashboard views.
 */
export const isCountableExpense = (record: LedgerRecord): boolean =>
  record.kind === 'expense' && record.cost !== 0
