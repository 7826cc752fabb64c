import { z } from 'zod'

/**
 * Shape of one entry as the Splitwise API (and our snapshot backups) return
 * it. Only the fields the normalizer reads are declared; everything else
 * (created_by, users, repayments, receipt, ...) passes through untouched.
 */
export const rawCategorySchema = z
  .object({
    id: z.number(),
    name: z.string().nullable().optional(),
    parent: z
      .object({ id: z.number().nullable().optional(), name: z.string().nullable().optional() })
      .nullable()
      .optional(),
  })
  .passthrough()

export const rawEntrySchema = z
  .object({
    id: z.union([z.number().int(), z.string().min(1)]),
    payment: z.boolean().nullable().optional(),
    date: z.string().nullable().optional(),
    cost: z.union([z.string(), z.number()]).nullable().optional(),
    currency_code: z.string().nullable().optional(),
    category: rawCategorySchema.nullable().optional(),
    description: z.string().nullable().optional(),
    deleted_at: z.string().nullable().optional(),
    group_id: z.number().nullable().optional(),
  })
  .passthrough()

export type RawEntry = z.infer<typeof rawEntrySchema>

export type RecordKind = 'expense' | 'settlement'

/** Label for expenses whose category has no name */
export const UNCATEGORIZED = 'Uncategorized'

export interface CategoryRef {
  id: number
  name: string
  /** `name` is null when the source left the parent unnamed */
  parent: { id: number; name: string | null } | null
}

/**
 * One normalized ledger entry.
 *
 * @example
 * const groceries: LedgerRecord = {
 *   id: '3021',
 *   kind: 'expense',
 *   date: '2024-03-05',
 *   cost: 50000, // 50.00 in milliunits
 *   currencyCode: 'EUR',
 *   category: { id: 12, name: 'Groceries', parent: null },
 *   description: 'Weekly shop',
 *   raw: { ... },
 * }
 */
export interface LedgerRecord {
  readonly id: string
  readonly kind: RecordKind
  /** Calendar day, YYYY-MM-DD */
  readonly date: string
  /** Milliunits; 0 when the source had no cost */
  readonly cost: number
  readonly currencyCode: string
  readonly category: CategoryRef | null
  readonly description: string
  /** The validated source entry, kept verbatim for backups */
  readonly raw: RawEntry
}

export type Provenance = 'remote-cache' | 'local-cache' | 'live-fetch'

export interface RecordRejection {
  /** Source id when one could be read */
  id: string | null
  reason: string
}

export type NormalizeResult =
  | { status: 'accepted'; record: LedgerRecord }
  | { status: 'dropped'; id: string; reason: string }
  | { status: 'rejected'; rejection: RecordRejection }

/**
 * Identifier of a snapshot in a store. `date` is the YYYY-MM-DD embedded in
 * the snapshot's name.
 */
export interface SnapshotRef {
  id: string
  name: string
  date: string
}

/**
 * The canonical dataset for one run. Replaced wholesale every run.
 */
export interface Dataset {
  /** Ordered by date ascending, ids unique */
  readonly records: readonly LedgerRecord[]
  readonly provenance: Provenance
  /** Cache snapshot the records came from; null for live fetches */
  readonly snapshot: SnapshotRef | null
  readonly rejected: readonly RecordRejection[]
}
