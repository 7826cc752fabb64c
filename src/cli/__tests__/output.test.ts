import { describe, it, expect, vi, afterEach } from 'vitest'
import { createFormatter, formatTable } from '../output.js'

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    const table = formatTable(['Name', 'Total'], [['Food', '€10.00'], ['Rent', '€950.00']])

    expect(table.split('\n')).toEqual(['Name  Total', '----  -------', 'Food  €10.00', 'Rent  €950.00'])
  })

  it('uses explicit column widths', () => {
    expect(formatTable(['A', 'B'], [['x', 'y']], [3, 1])).toBe('A    B\n---  -\nx    y')
  })

  it('renders only the header without rows', () => {
    expect(formatTable(['Month', 'Spent'], [])).toBe('Month  Spent\n-----  -----')
  })
})

describe('createFormatter', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints JSON results', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    createFormatter('json').success({ success: true, total: 5 })

    expect(log).toHaveBeenCalledWith(JSON.stringify({ success: true, total: 5 }, null, 2))
  })

  it('prints the formatted text in text mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)

    createFormatter('text').success({ success: true, formatted: 'March 2024: €50.00' })

    expect(log).toHaveBeenCalledWith('March 2024: €50.00')
  })

  it('writes errors to stderr and exits with code 1', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`)
    })

    expect(() => createFormatter('text').error('Missing required configuration: SPLITWISE_API_KEY')).toThrow(
      'process.exit(1)'
    )

    expect(error).toHaveBeenCalledWith('Error: Missing required configuration: SPLITWISE_API_KEY')
    expect(exit).toHaveBeenCalledWith(1)
  })
})
