import { describe, it, expect } from 'vitest'
import { appConfigSchema, driveConfigSchema } from '../config-types.js'

describe('appConfigSchema', () => {
  it('fills every section with defaults', () => {
    expect(appConfigSchema.parse({})).toEqual({
      splitwise: { groupIds: [], pageSize: 100, timeoutMs: 30000 },
      retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30000 },
      storage: { outputDir: 'output' },
      reporting: { title: 'Family Expenses', topCategories: 5 },
    })
  })

  it('keeps provided values', () => {
    const config = appConfigSchema.parse({
      splitwise: { apiKey: 'test-secret', groupIds: [12], pageSize: 50, maxRecords: 500 },
      reporting: { title: 'Flat 3B' },
    })

    expect(config.splitwise).toEqual({ apiKey: 'test-secret', groupIds: [12], pageSize: 50, maxRecords: 500, timeoutMs: 30000 })
    expect(config.reporting).toEqual({ title: 'Flat 3B', topCategories: 5 })
  })

  it('rejects a page size outside the API limits', () => {
    expect(appConfigSchema.safeParse({ splitwise: { pageSize: 0 } }).success).toBe(false)
    expect(appConfigSchema.safeParse({ splitwise: { pageSize: 5000 } }).success).toBe(false)
  })

  it('rejects an empty API key', () => {
    expect(appConfigSchema.safeParse({ splitwise: { apiKey: '' } }).success).toBe(false)
  })

  it('rejects non-positive group ids', () => {
    expect(appConfigSchema.safeParse({ splitwise: { groupIds: [0] } }).success).toBe(false)
  })
})

describe('driveConfigSchema', () => {
  it('requires all four credentials', () => {
    expect(
      driveConfigSchema.safeParse({ clientId: 'id', clientSecret: 'test-secret', refreshToken: 'test-refresh' }).success
    ).toBe(false)
    expect(
      driveConfigSchema.safeParse({
        clientId: 'id',
        clientSecret: 'test-secret',
        refreshToken: 'test-refresh',
        folderId: 'folder-1',
      }).success
    ).toBe(true)
  })
})
