/**
 * Money helpers. Amounts are integer milliunits (1000 = 1.00) so sums never
 * drift the way binary floating point does.
 */

export const MILLIUNITS_PER_UNIT = 1000

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/

/**
 * Parses a decimal amount ("50", "12.5", "-0.125") into milliunits.
 * Returns null when the value is not a plain decimal or has non-zero digits
 * beyond the third fractional place.
 *
 * @example
 * parseMilliunits('50.00') // => 50000
 * parseMilliunits('0.1234') // => null
 */
export const parseMilliunits = (value: string | number): number | null => {
  const text = typeof value === 'number' ? numberToDecimal(value) : value.trim()
  if (text === null) return null

  const match = DECIMAL_PATTERN.exec(text)
  if (!match) return null

  const [, sign, whole, fraction = ''] = match
  if (/[1-9]/.test(fraction.slice(3))) return null

  const milli = Number(whole) * MILLIUNITS_PER_UNIT + Number(fraction.slice(0, 3).padEnd(3, '0'))
  if (!Number.isSafeInteger(milli)) return null

  return sign === '-' && milli !== 0 ? -milli : milli
}

const numberToDecimal = (value: number): string | null => {
  if (!Number.isFinite(value)) return null
  // Avoid exponent notation for tiny or huge numbers
  const text = String(value)
  return /e/i.test(text) ? null : text
}

/**
 * Formats milliunits as currency.
 *
 * @example
 * formatMoney(12345, 'EUR') // => '€12.35'
 */
export const formatMoney = (milliunits: number, currencyCode = 'EUR'): string => {
  const amount = milliunits / MILLIUNITS_PER_UNIT
  try {
    return new Intl.NumberFormat('en-US', {
      style: 'currency',
      currency: currencyCode,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    }).format(amount)
  } catch {
    // Unknown ISO code: fall back to a plain number with the code appended
    return `${amount.toFixed(2)} ${currencyCode}`
  }
}

const currencySymbol = (currencyCode: string): string => {
  try {
    const parts = new Intl.NumberFormat('en-US', { style: 'currency', currency: currencyCode }).formatToParts(0)
    return parts.find((part) => part.type === 'currency')?.value ?? currencyCode
  } catch {
    return currencyCode
  }
}

/**
 * Compact form for narrow terminal columns.
 *
 * @example
 * formatCompactMoney(1_250_000, 'EUR') // => '€1.3k'
 */
export const formatCompactMoney = (milliunits: number, currencyCode = 'EUR'): string => {
  const units = Math.abs(milliunits) / MILLIUNITS_PER_UNIT
  if (units >= 1000) {
    const sign = milliunits < 0 ? '-' : ''
    return `${sign}${currencySymbol(currencyCode)}${(units / 1000).toFixed(1)}k`
  }
  return formatMoney(milliunits, currencyCode)
}

/**
 * Plain decimal with two or three fractional digits, exact for any
 * milliunit amount.
 *
 * @example
 * formatDecimal(50000)  // => '50.00'
 * formatDecimal(-12345) // => '-12.345'
 */
export const formatDecimal = (milliunits: number): string => {
  const sign = milliunits < 0 ? '-' : ''
  const abs = Math.abs(milliunits)
  const whole = Math.floor(abs / MILLIUNITS_PER_UNIT)
  const fraction = String(abs % MILLIUNITS_PER_UNIT)
    .padStart(3, '0')
    .replace(/0$/, '')
  return `${sign}${whole}.${fraction}`
}
