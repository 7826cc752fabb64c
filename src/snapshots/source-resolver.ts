import { CacheMissError, errorMessage, type CacheTier } from '../shared/errors.js'
import type { Logger } from '../shared/logger.js'
import { normalizeEntries } from '../expenses/record-normalizer.js'
import type { Dataset, Provenance } from '../expenses/expense-types.js'
import { decodeSnapshot, selectLatestSnapshot } from './snapshot-codec.js'
import type { SnapshotRef, SnapshotStore } from './snapshot-store.js'

export interface ResolveDatasetOptions {
  /** When false the caches are skipped and a live fetch is mandatory */
  preferCache: boolean
  remote: SnapshotStore | null
  local: SnapshotStore | null
  /** Paginates the live ledger; only called when no cache tier supplies data */
  fetchLive: () => Promise<unknown[]>
  logger: Logger
}

const PROVENANCE: Record<CacheTier, Provenance> = {
  remote: 'remote-cache',
  local: 'local-cache',
}

/**
 * Loads the most recent snapshot of one cache tier. Every way this can go
 * wrong (nothing listed, unreadable, undecodable, empty) is a CacheMissError.
 */
export const loadFromCache = async (tier: CacheTier, store: SnapshotStore, logger: Logger): Promise<Dataset> => {
  let refs: SnapshotRef[]
  try {
    refs = await store.listSnapshots()
  } catch (error) {
    throw new CacheMissError(tier, `Cannot list snapshots in ${store.label}: ${errorMessage(error)}`, error)
  }

  const latest = selectLatestSnapshot(refs)
  if (!latest) {
    throw new CacheMissError(tier, `No snapshots in ${store.label}`)
  }

  let entries: unknown[]
  try {
    entries = decodeSnapshot(await store.read(latest))
  } catch (error) {
    throw new CacheMissError(tier, `Cannot load ${latest.name} from ${store.label}: ${errorMessage(error)}`, error)
  }

  if (entries.length === 0) {
    throw new CacheMissError(tier, `Snapshot ${latest.name} in ${store.label} is empty`)
  }

  logger.info(`Loading cached data from ${store.label}: ${latest.name}`)
  const { records, rejected } = normalizeEntries(entries, logger)
  return { records, provenance: PROVENANCE[tier], snapshot: latest, rejected }
}

/**
 * Produces the run's dataset: remote snapshot, then local snapshot, then a
 * live fetch. Cache tiers are only consulted when `preferCache` is set; a
 * failing tier falls through to the next one. Live fetch errors propagate.
 */
export const resolveDataset = async ({
  preferCache,
  remote,
  local,
  fetchLive,
  logger,
}: ResolveDatasetOptions): Promise<Dataset> => {
  if (preferCache) {
    const tiers: Array<[CacheTier, SnapshotStore | null]> = [
      ['remote', remote],
      ['local', local],
    ]

    for (const [tier, store] of tiers) {
      if (!store) {
        logger.debug(`No ${tier} snapshot store configured`)
        continue
      }
      try {
        return await loadFromCache(tier, store, logger)
      } catch (error) {
        if (!(error instanceof CacheMissError)) throw error
        logger.warn(`Cache miss (${tier}): ${error.message}`)
      }
    }

    logger.info('No cached data found, fetching from the ledger')
  }

  const entries = await fetchLive()
  const { records, rejected } = normalizeEntries(entries, logger)
  logger.info(`Fetched ${records.length} records from the ledger`)

  return { records, provenance: 'live-fetch', snapshot: null, rejected }
}
