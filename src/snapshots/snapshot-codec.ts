import { z } from 'zod'
import { SnapshotFormatError } from '../shared/errors.js'
import type { LedgerRecord, SnapshotRef } from '../expenses/expense-types.js'

/**
 * Snapshots are named `YYYY-MM-DD_expenses.json`. The date in the name, not
 * any file timestamp, decides which snapshot is the most recent.
 */
export const SNAPSHOT_SUFFIX = '_expenses.json'

const SNAPSHOT_NAME = /^(\d{4}-\d{2}-\d{2})_expenses\.json$/

export const snapshotName = (date: string): string => `${date}${SNAPSHOT_SUFFIX}`

/**
 * Date embedded in a snapshot name, or null if the name does not follow the
 * convention.
 */
export const parseSnapshotDate = (name: string): string | null => SNAPSHOT_NAME.exec(name)?.[1] ?? null

/**
 * Most recent snapshot by embedded date; equal dates fall back to comparing
 * names.
 */
export const selectLatestSnapshot = (refs: readonly SnapshotRef[]): SnapshotRef | null => {
  let latest: SnapshotRef | null = null
  for (const ref of refs) {
    if (
      latest === null ||
      ref.date > latest.date ||
      (ref.date === latest.date && ref.name > latest.name)
    ) {
      latest = ref
    }
  }
  return latest
}

/**
 * Serializes records as a backup: the verbatim source entries, in dataset
 * order. Decoding and normalizing the result reproduces the same records.
 */
export const encodeSnapshot = (records: readonly LedgerRecord[]): string =>
  `${JSON.stringify(
    records.map((record) => record.raw),
    null,
    2
  )}\n`

const snapshotSchema = z.array(z.unknown())

/**
 * Parses snapshot content into raw entries.
 */
export const decodeSnapshot = (content: string): unknown[] => {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new SnapshotFormatError('Snapshot is not valid JSON', error)
  }

  const result = snapshotSchema.safeParse(parsed)
  if (!result.success) {
    throw new SnapshotFormatError('Snapshot is not a JSON array of entries', result.error)
  }
  return result.data
}
