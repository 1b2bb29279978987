export interface DecimalRange {
  start: number
  end: number
}

const DIGITS = /^\d+$/

function parseNonNegativeInt(value: string): number | null {
  if (!DIGITS.test(value)) return null
  const parsed = Number(value)
  return Number.isSafeInteger(parsed) ? parsed : null
}

/**
 * Parse the "Decimal" column of the protocol numbers table.
 *
 * Accepts a single number (`6`) or an inclusive range (`148-252`). Text such
 * as `Reserved` or anything else that does not parse yields null, and so does
 * a range whose end is below its start.
 */
export function parseDecimalField(raw: string): DecimalRange | null {
  const value = raw.trim()
  if (value === '') return null

  const first = value.charCodeAt(0)
  if (first < 48 || first > 57) return null

  const dash = value.indexOf('-')
  if (dash === -1) {
    const n = parseNonNegativeInt(value)
    return n === null ? null : { start: n, end: n }
  }

  const start = parseNonNegativeInt(value.slice(0, dash).trim())
  const end = parseNonNegativeInt(value.slice(dash + 1).trim())
  if (start === null || end === null || end < start) return null

  return { start, end }
}
