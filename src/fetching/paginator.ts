import type { Logger } from '../shared/logger.js'
import { withRetry, type RetryPolicy, type Sleep } from './retry-policy.js'

export interface LedgerPage {
  entries: unknown[]
  hasMore: boolean
}

/**
 * Anything that can serve pages of raw ledger entries by offset.
 * Fails with AuthError (not retried) or TransientError (retried).
 */
export interface LedgerSource {
  readonly label: string
  fetchPage: (cursor: number, pageSize: number) => Promise<LedgerPage>
}

export interface PaginateOptions {
  pageSize: number
  startCursor?: number
  /** Stop once this many entries have been collected */
  maxRecords?: number
  retryPolicy: RetryPolicy
  sleep: Sleep
  logger: Logger
}

/**
 * Fetches every page from `source` starting at `startCursor`.
 *
 * Stops on a short page, on `hasMore: false`, or at `maxRecords`. A page that
 * keeps failing aborts the whole run with FetchError; partial results are
 * never returned. Entries come back in page order, duplicates included.
 */
export const fetchAllEntries = async (source: LedgerSource, options: PaginateOptions): Promise<unknown[]> => {
  const { pageSize, startCursor = 0, maxRecords, retryPolicy, sleep, logger } = options
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`)
  }

  const entries: unknown[] = []
  let cursor = startCursor

  for (;;) {
    const page = await withRetry(
      `${source.label} page at offset ${cursor}`,
      () => source.fetchPage(cursor, pageSize),
      retryPolicy,
      {
        sleep,
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            `${source.label}: attempt ${attempt} at offset ${cursor} failed (${error.message}), retrying in ${delayMs}ms`
          ),
      }
    )

    entries.push(...page.entries)
    logger.debug(`${source.label}: fetched ${page.entries.length} entries at offset ${cursor}`)

    if (maxRecords !== undefined && entries.length >= maxRecords) {
      return entries.slice(0, maxRecords)
    }
    if (page.entries.length < pageSize || !page.hasMore) {
      return entries
    }

    cursor += page.entries.length
  }
}

/**
 * Paginates several sources (one per group) in sequence and concatenates the
 * results. The same entry can appear under more than one group; callers must
 * dedupe by id.
 */
export const fetchAllGroups = async (
  sources: readonly LedgerSource[],
  options: PaginateOptions
): Promise<unknown[]> => {
  const all: unknown[] = []
  for (const source of sources) {
    const entries = await fetchAllEntries(source, options)
    options.logger.info(`Fetched ${entries.length} entries from ${source.label}`)
    all.push(...entries)
  }
  return all
}
