import type { SnapshotRef } from '../expenses/expense-types.js'

export type { SnapshotRef }

/**
 * Where snapshot backups live. Two instances are used: the remote store
 * (Google Drive) and the local store (a directory).
 *
 * Implementations fail with SnapshotNotFoundError or SnapshotStoreError.
 */
export interface SnapshotStore {
  readonly label: string
  /** Snapshots whose names carry a YYYY-MM-DD date; others are ignored */
  listSnapshots: () => Promise<SnapshotRef[]>
  read: (ref: SnapshotRef) => Promise<string>
  /** Creates or replaces the snapshot called `name` */
  write: (name: string, content: string) => Promise<SnapshotRef>
}
