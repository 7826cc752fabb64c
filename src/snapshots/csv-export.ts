import { stringify } from 'csv-stringify/sync'
import type { LedgerRecord } from '../expenses/expense-types.js'
import { formatDecimal } from '../shared/money.js'

export const CSV_EXPORT_SUFFIX = '_expenses.csv'

export const CSV_COLUMNS = ['id', 'date', 'cost', 'currency', 'category', 'description', 'kind'] as const

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string>

export const csvExportName = (date: string): string => `${date}${CSV_EXPORT_SUFFIX}`

const toRow = (record: LedgerRecord): CsvRow => ({
  id: record.id,
  date: record.date,
  cost: formatDecimal(record.cost),
  currency: record.currencyCode,
  category: record.category?.name ?? '',
  description: record.description,
  kind: record.kind,
})

/**
 * Spreadsheet-friendly export of the normalized records, one row each, in
 * dataset order. Unlike the JSON snapshot it cannot be read back.
 */
export const encodeCsvExport = (records: readonly LedgerRecord[]): string =>
  stringify(records.map(toRow), { header: true, columns: [...CSV_COLUMNS] })
