import { numericQuantity } from 'numeric-quantity'

/** Unicode fraction map for normalization. */
const UNICODE_FRACTIONS: Record<string, string> = {
  '¼': '1/4',  // ¼
  '½': '1/2',  // ½
  '¾': '3/4',  // ¾
  '⅓': '1/3',  // ⅓
  '⅔': '2/3',  // ⅔
  '⅕': '1/5',  // ⅕
  '⅖': '2/5',  // ⅖
  '⅗': '3/5',  // ⅗
  '⅘': '4/5',  // ⅘
  '⅙': '1/6',  // ⅙
  '⅚': '5/6',  // ⅚
  '⅛': '1/8',  // ⅛
  '⅜': '3/8',  // ⅜
  '⅝': '5/8',  // ⅝
  '⅞': '7/8',  // ⅞
}

/** Replace unicode fraction characters with ASCII equivalents. */
export function normalizeUnicodeFractions(text: string): string {
  let result = text
  for (const [unicode, ascii] of Object.entries(UNICODE_FRACTIONS)) {
    // Insert space before the fraction when preceded by a digit (e.g. "1½" → "1 1/2")
    result = result.replace(new RegExp(`(\\d)${unicode}`, 'g'), `$1 ${ascii}`)
    result = result.replace(new RegExp(unicode, 'g'), ascii)
  }
  return result
}

/** Mixed numbers, fractions, decimals with either separator, whole numbers. */
export const NUMBER_SOURCE = String.raw`\d+\s+\d+\/\d+|\d+\/\d+|\d+[.,]\d+|\d+`

const QTY_PATTERN = new RegExp(`^(${NUMBER_SOURCE})`)

/** Two quantities separated by dash/to/bis, e.g. "1-2", "1,5 bis 2". */
const RANGE_PATTERN = new RegExp(`^(${NUMBER_SOURCE})\\s*(?:[-–—]|to\\b|bis\\b)\\s*(${NUMBER_SOURCE})`)

export interface QuantityResult {
  qty: number | null
  remainder: string
}

/**
 * Convert one number token to a float. Accepts "," as decimal separator,
 * so "70,9" and "70.9" give the same value. NaN when not a number.
 */
export function toNumber(token: string): number {
  return numericQuantity(token.trim().replace(',', '.'))
}

/**
 * Parse a numeric quantity from the front of a string.
 * Ranges resolve to their midpoint.
 */
export function parseQuantity(text: string): QuantityResult {
  const trimmed = text.trim()

  const rangeMatch = trimmed.match(RANGE_PATTERN)
  if (rangeMatch) {
    const min = toNumber(rangeMatch[1])
    const max = toNumber(rangeMatch[2])
    if (!isNaN(min) && !isNaN(max)) {
      const remainder = trimmed.slice(rangeMatch[0].length).trim()
      return { qty: (min + max) / 2, remainder }
    }
  }

  const qtyMatch = trimmed.match(QTY_PATTERN)
  if (qtyMatch) {
    const value = toNumber(qtyMatch[1])
    if (!isNaN(value)) {
      const remainder = trimmed.slice(qtyMatch[0].length).trim()
      return { qty: value, remainder }
    }
  }

  return { qty: null, remainder: trimmed }
}
