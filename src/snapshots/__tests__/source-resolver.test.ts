import { describe, it, expect, vi } from 'vitest'
import { loadFromCache, resolveDataset } from '../source-resolver.js'
import type { SnapshotStore } from '../snapshot-store.js'
import { CacheMissError, FetchError, SnapshotStoreError } from '../../shared/errors.js'
import { createMemorySnapshotStore, createMockLogger, createMockRawEntry } from '../../test-utils/fixtures.js'

const snapshotOf = (...entries: Array<Record<string, unknown>>) => `${JSON.stringify(entries, null, 2)}\n`

const createUnreachableStore = (label: string): SnapshotStore => ({
  label,
  listSnapshots: vi.fn(async () => {
    throw new SnapshotStoreError('connection refused')
  }),
  read: vi.fn(async () => '[]'),
  write: vi.fn(async (name: string) => ({ id: name, name, date: '' })),
})

const liveEntries = [createMockRawEntry({ id: 'live-1' }), createMockRawEntry({ id: 'live-2' })]

describe('resolveDataset', () => {
  it('fetches live without touching the caches when caching is off', async () => {
    const remote = createMemorySnapshotStore('Drive', { '2024-04-01_expenses.json': snapshotOf(createMockRawEntry()) })
    const local = createMemorySnapshotStore('local', { '2024-04-01_expenses.json': snapshotOf(createMockRawEntry()) })
    const fetchLive = vi.fn(async () => liveEntries)

    const dataset = await resolveDataset({
      preferCache: false,
      remote: remote.store,
      local: local.store,
      fetchLive,
      logger: createMockLogger(),
    })

    expect(dataset.provenance).toBe('live-fetch')
    expect(dataset.snapshot).toBeNull()
    expect(dataset.records.map((r) => r.id)).toEqual(['live-1', 'live-2'])
    expect(remote.store.listSnapshots).not.toHaveBeenCalled()
    expect(local.store.listSnapshots).not.toHaveBeenCalled()
  })

  it('prefers the latest remote snapshot', async () => {
    const remote = createMemorySnapshotStore('Drive', {
      '2024-03-01_expenses.json': snapshotOf(createMockRawEntry({ id: 'old' })),
      '2024-04-01_expenses.json': snapshotOf(createMockRawEntry({ id: 'new' })),
    })
    const local = createMemorySnapshotStore('local', { '2024-05-01_expenses.json': snapshotOf(createMockRawEntry()) })
    const fetchLive = vi.fn(async () => liveEntries)

    const dataset = await resolveDataset({
      preferCache: true,
      remote: remote.store,
      local: local.store,
      fetchLive,
      logger: createMockLogger(),
    })

    expect(dataset.provenance).toBe('remote-cache')
    expect(dataset.snapshot?.name).toBe('2024-04-01_expenses.json')
    expect(dataset.records.map((r) => r.id)).toEqual(['new'])
    expect(local.store.listSnapshots).not.toHaveBeenCalled()
    expect(fetchLive).not.toHaveBeenCalled()
  })

  it('falls back to the local snapshot when the remote store is unreachable', async () => {
    const logger = createMockLogger()
    const local = createMemorySnapshotStore('local', {
      '2024-04-01_expenses.json': snapshotOf(createMockRawEntry({ id: 'cached' })),
    })
    const fetchLive = vi.fn(async () => liveEntries)

    const dataset = await resolveDataset({
      preferCache: true,
      remote: createUnreachableStore('Drive'),
      local: local.store,
      fetchLive,
      logger,
    })

    expect(dataset.provenance).toBe('local-cache')
    expect(dataset.records.map((r) => r.id)).toEqual(['cached'])
    expect(fetchLive).not.toHaveBeenCalled()
    expect(logger.warn).toHaveBeenCalledWith(
      'Cache miss (remote): Cannot list snapshots in Drive: connection refused'
    )
  })

  it('treats an empty snapshot as a miss', async () => {
    const remote = createMemorySnapshotStore('Drive', { '2024-04-01_expenses.json': '[]\n' })
    const fetchLive = vi.fn(async () => liveEntries)

    const dataset = await resolveDataset({
      preferCache: true,
      remote: remote.store,
      local: null,
      fetchLive,
      logger: createMockLogger(),
    })

    expect(dataset.provenance).toBe('live-fetch')
    expect(fetchLive).toHaveBeenCalledTimes(1)
  })

  it('treats a corrupted snapshot as a miss', async () => {
    const logger = createMockLogger()
    const local = createMemorySnapshotStore('local', { '2024-04-01_expenses.json': '[{"id": 1,' })

    const dataset = await resolveDataset({
      preferCache: true,
      remote: null,
      local: local.store,
      fetchLive: async () => liveEntries,
      logger,
    })

    expect(dataset.provenance).toBe('live-fetch')
    expect(logger.warn).toHaveBeenCalledWith(
      'Cache miss (local): Cannot load 2024-04-01_expenses.json from local: Snapshot is not valid JSON'
    )
  })

  it('fetches live when no store has snapshots', async () => {
    const remote = createMemorySnapshotStore('Drive')
    const local = createMemorySnapshotStore('local', { 'notes.txt': 'hello' })

    const dataset = await resolveDataset({
      preferCache: true,
      remote: remote.store,
      local: local.store,
      fetchLive: async () => liveEntries,
      logger: createMockLogger(),
    })

    expect(dataset.provenance).toBe('live-fetch')
    expect(dataset.records).toHaveLength(2)
  })

  it('propagates live fetch failures', async () => {
    const fetchLive = async (): Promise<unknown[]> => {
      throw new FetchError('Splitwise group 1 page at offset 0 failed after 4 attempts: HTTP 503')
    }

    await expect(
      resolveDataset({ preferCache: true, remote: null, local: null, fetchLive, logger: createMockLogger() })
    ).rejects.toBeInstanceOf(FetchError)
  })

  it('returns the same dataset for the same cache contents', async () => {
    const local = createMemorySnapshotStore('local', {
      '2024-04-01_expenses.json': snapshotOf(
        createMockRawEntry({ id: 1, date: '2024-03-02T00:00:00Z' }),
        createMockRawEntry({ id: 2, date: '2024-03-01T00:00:00Z', cost: '7.5' })
      ),
    })
    const options = {
      preferCache: true,
      remote: null,
      local: local.store,
      fetchLive: async () => liveEntries,
      logger: createMockLogger(),
    }

    const first = await resolveDataset(options)
    const second = await resolveDataset(options)

    expect(second).toEqual(first)
    expect(first.records.map((r) => r.id)).toEqual(['2', '1'])
  })

  it('reports rejected entries from a snapshot', async () => {
    const local = createMemorySnapshotStore('local', {
      '2024-04-01_expenses.json': snapshotOf(createMockRawEntry({ id: 1 }), createMockRawEntry({ id: 2, cost: 'ten' })),
    })

    const dataset = await resolveDataset({
      preferCache: true,
      remote: null,
      local: local.store,
      fetchLive: async () => liveEntries,
      logger: createMockLogger(),
    })

    expect(dataset.records).toHaveLength(1)
    expect(dataset.rejected).toEqual([{ id: '2', reason: 'malformed cost: ten' }])
  })
})

describe('loadFromCache', () => {
  it('raises a cache miss naming the tier', async () => {
    const error = await loadFromCache('local', createMemorySnapshotStore('local').store, createMockLogger()).catch(
      (e: unknown) => e
    )

    expect(error).toBeInstanceOf(CacheMissError)
    expect(error).toMatchObject({ tier: 'local', message: 'No snapshots in local' })
  })
})
