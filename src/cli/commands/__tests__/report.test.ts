import { describe, it, expect } from 'vitest'
import { buildReportResult, formatTextReport, formatTrend } from '../report.js'
import { computeStatistics } from '../../../reporting/index.js'
import type { RunResult } from '../../../pipeline/report-sinks.js'
import { createMockDataset, createMockRecord } from '../../../test-utils/fixtures.js'

const snapshot = { id: 'f1', name: '2024-04-01_expenses.json', date: '2024-04-01' }

const createRunResult = (): RunResult => {
  const dataset = createMockDataset(
    [createMockRecord({ id: '1', date: '2024-03-05', cost: 50000 })],
    'local-cache',
    snapshot
  )
  const report = computeStatistics(dataset, { now: new Date('2024-04-15T10:00:00Z'), topCategories: 5 })
  return { dataset, report }
}

describe('formatTrend', () => {
  it('signs percentages', () => {
    expect(formatTrend({ direction: 'up', percent: 12.5 })).toBe('+12.5%')
    expect(formatTrend({ direction: 'down', percent: -3 })).toBe('-3.0%')
    expect(formatTrend({ direction: 'stable', percent: 0 })).toBe('0.0%')
  })

  it('labels trends without a percentage', () => {
    expect(formatTrend({ direction: 'new', percent: null })).toBe('new')
    expect(formatTrend({ direction: 'undefined', percent: null })).toBe('-')
  })
})

describe('formatTextReport', () => {
  const lines = formatTextReport('Family Expenses', createRunResult()).split('\n')

  it('names the month and the data source', () => {
    expect(lines).toContain('  Family Expenses: March 2024')
    expect(lines).toContain('  Source: local snapshot (2024-04-01_expenses.json)')
    expect(lines).toContain('  Generated: 2024-04-15T10:00:00.000Z')
  })

  it('summarizes last month against the average', () => {
    expect(lines).toContain('  Last Month:     €50.00 (1 expenses)')
    expect(lines).toContain('  Avg Monthly:    €50.00 over 1 months')
    expect(lines).toContain('  vs Average:     0.0% (about average)')
  })

  it('lists top categories with their trend', () => {
    expect(lines).toContain('Category   Spent   Month Before  Trend')
    expect(lines).toContain('Groceries  €50.00  €0.00         new')
  })

  it('lists monthly totals', () => {
    expect(lines).toContain('  MONTHLY TOTALS (last 1 months)')
    expect(lines).toContain('2024-03  €50.00  1')
  })

  it('mentions skipped entries', () => {
    const result = createRunResult()
    const withRejections: RunResult = {
      ...result,
      dataset: { ...result.dataset, rejected: [{ id: '9', reason: 'malformed date: yesterday' }] },
    }

    const text = formatTextReport('Family Expenses', withRejections).split('\n')

    expect(text).toContain('  SKIPPED ENTRIES: 1')
    expect(text).toContain('  9: malformed date: yesterday')
  })

  it('says when last month had no expenses', () => {
    const dataset = createMockDataset([])
    const report = computeStatistics(dataset, { now: new Date('2024-04-15T10:00:00Z'), topCategories: 5 })

    const text = formatTextReport('Family Expenses', { dataset, report }).split('\n')

    expect(text).toContain('  No expenses in March 2024.')
    expect(text).toContain('  Source: live fetch from Splitwise')
    expect(text).toContain('  vs Average:     - (no average yet)')
  })
})

describe('buildReportResult', () => {
  it('includes the text rendering only in text mode', () => {
    const result = createRunResult()

    const json = buildReportResult(result, { format: 'json' }, 'Family Expenses')
    const text = buildReportResult(result, { format: 'text' }, 'Family Expenses')

    expect(json).toEqual({
      success: true,
      provenance: 'local-cache',
      snapshot: '2024-04-01_expenses.json',
      recordCount: 1,
      rejectedCount: 0,
      report: result.report,
    })
    expect(text.formatted).toBe(formatTextReport('Family Expenses', result))
  })
})
