import { z } from 'zod'
import { AuthError, FetchError, TransientError, errorMessage } from './errors.js'
import type { LedgerPage, LedgerSource } from '../fetching/paginator.js'

export const SPLITWISE_API_URL = 'https://secure.splitwise.com/api/v3.0'

const expensesResponseSchema = z.object({
  expenses: z.array(z.unknown()),
})

export type FetchFn = typeof fetch

export interface SplitwiseClientOptions {
  apiKey: string
  /** Restrict to one group; omitted means every group the user belongs to */
  groupId?: number
  timeoutMs: number
  baseUrl?: string
  fetch?: FetchFn
}

const isTransientStatus = (status: number): boolean => status === 429 || status >= 500

/**
 * Creates a LedgerSource over the Splitwise expenses endpoint.
 *
 * @example
 * const source = createSplitwiseClient({ apiKey, groupId: 123, timeoutMs: 30000 })
 * const page = await source.fetchPage(0, 100)
 */
export const createSplitwiseClient = ({
  apiKey,
  groupId,
  timeoutMs,
  baseUrl = SPLITWISE_API_URL,
  fetch: fetchFn = fetch,
}: SplitwiseClientOptions): LedgerSource => {
  const label = groupId === undefined ? 'Splitwise (all groups)' : `Splitwise group ${groupId}`

  const fetchPage = async (cursor: number, pageSize: number): Promise<LedgerPage> => {
    const params = new URLSearchParams({ limit: String(pageSize), offset: String(cursor) })
    if (groupId !== undefined) params.set('group_id', String(groupId))

    let response: Response
    try {
      response = await fetchFn(`${baseUrl}/get_expenses?${params.toString()}`, {
        headers: { Authorization: `Bearer ${apiKey}`, Accept: 'application/json' },
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      // Network failures and AbortSignal timeouts both land here
      throw new TransientError(`${label}: request failed: ${errorMessage(error)}`, { cause: error })
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`${label}: API key rejected (HTTP ${response.status})`)
    }
    if (isTransientStatus(response.status)) {
      throw new TransientError(`${label}: HTTP ${response.status}`, { details: { status: response.status } })
    }
    if (!response.ok) {
      throw new FetchError(`${label}: unexpected HTTP ${response.status}`, { details: { status: response.status } })
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new TransientError(`${label}: response body was not JSON`, { cause: error })
    }

    const parsed = expensesResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new FetchError(`${label}: response has no expenses array`, { cause: parsed.error })
    }

    const entries = parsed.data.expenses
    return { entries, hasMore: entries.length === pageSize }
  }

  return { label, fetchPage }
}

/**
 * One source per configured group, or a single all-groups source.
 */
export const createSplitwiseSources = (
  options: Omit<SplitwiseClientOptions, 'groupId'> & { groupIds: readonly number[] }
): LedgerSource[] => {
  const { groupIds, ...clientOptions } = options
  if (groupIds.length === 0) return [createSplitwiseClient(clientOptions)]
  return groupIds.map((groupId) => createSplitwiseClient({ ...clientOptions, groupId }))
}
