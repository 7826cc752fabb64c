import { vi } from 'vitest'
import type { Logger } from '../shared/logger.js'
import type { Dataset, LedgerRecord, Provenance, RawEntry, SnapshotRef } from '../expenses/expense-types.js'
import type { LedgerSource } from '../fetching/paginator.js'
import { SnapshotNotFoundError, TransientError } from '../shared/errors.js'
import { parseSnapshotDate } from '../snapshots/snapshot-codec.js'
import type { SnapshotStore } from '../snapshots/snapshot-store.js'

let nextId = 1000

/**
 * Creates a raw Splitwise-style entry with sensible defaults
 */
export const createMockRawEntry = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: nextId++,
  group_id: 1,
  description: 'Weekly shop',
  payment: false,
  cost: '50.00',
  currency_code: 'EUR',
  date: '2024-03-05T12:00:00Z',
  category: { id: 12, name: 'Groceries' },
  deleted_at: null,
  ...overrides,
})

/**
 * Creates a normalized LedgerRecord. `raw` mirrors the record's fields.
 */
export const createMockRecord = (overrides: Partial<LedgerRecord> = {}): LedgerRecord => {
  const id = overrides.id ?? String(nextId++)
  const date = overrides.date ?? '2024-03-05'
  const cost = overrides.cost ?? 50000
  const category = overrides.category === undefined ? { id: 12, name: 'Groceries', parent: null } : overrides.category
  const kind = overrides.kind ?? 'expense'
  const raw: RawEntry = {
    id,
    date,
    cost: (cost / 1000).toFixed(3),
    payment: kind === 'settlement',
    currency_code: overrides.currencyCode ?? 'EUR',
    description: overrides.description ?? 'Weekly shop',
    category: category ? { id: category.id, name: category.name } : null,
  }

  return {
    id,
    kind,
    date,
    cost,
    currencyCode: 'EUR',
    category,
    description: 'Weekly shop',
    raw,
    ...overrides,
  }
}

export const createMockDataset = (
  records: LedgerRecord[],
  provenance: Provenance = 'live-fetch',
  snapshot: SnapshotRef | null = null
): Dataset => ({ records, provenance, snapshot, rejected: [] })

/**
 * Logger whose methods are spies
 */
export const createMockLogger = () =>
  ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }) satisfies Logger

/**
 * Snapshot store held in a Map keyed by file name
 */
export const createMemorySnapshotStore = (label: string, files: Record<string, string> = {}) => {
  const contents = new Map(Object.entries(files))

  const store: SnapshotStore = {
    label,
    listSnapshots: vi.fn(async () =>
      [...contents.keys()].flatMap((name) => {
        const date = parseSnapshotDate(name)
        return date ? [{ id: name, name, date }] : []
      })
    ),
    read: vi.fn(async (ref: SnapshotRef) => {
      const content = contents.get(ref.id)
      if (content === undefined) throw new SnapshotNotFoundError(ref.name)
      return content
    }),
    write: vi.fn(async (name: string, content: string) => {
      contents.set(name, content)
      return { id: name, name, date: parseSnapshotDate(name) ?? '' }
    }),
  }

  return { store, contents }
}

/**
 * Serves `entries` by offset. `failures` maps a cursor to the errors thrown
 * (in order) before that page succeeds.
 */
export const createPagedSource = (
  entries: unknown[],
  failures: Record<number, Error[]> = {},
  label = 'test source'
) => {
  const pending = new Map(Object.entries(failures).map(([cursor, errors]) => [Number(cursor), [...errors]]))

  const fetchPage = vi.fn(async (cursor: number, pageSize: number) => {
    const error = pending.get(cursor)?.shift()
    if (error) throw error
    const page = entries.slice(cursor, cursor + pageSize)
    return { entries: page, hasMore: page.length === pageSize }
  })

  const source: LedgerSource = { label, fetchPage }
  return { source, fetchPage }
}

export const transient = (message = 'HTTP 503') => new TransientError(message)

/**
 * Sleep that resolves immediately
 */
export const createInstantSleep = () => vi.fn((_ms: number) => Promise.resolve())
