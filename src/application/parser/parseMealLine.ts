import { canonicalUnit } from '@domain/constants/units.ts'
import { NUMBER_SOURCE, normalizeUnicodeFractions, parseQuantity, toNumber } from './parseQuantity.ts'
import { parseUnit } from './parseUnit.ts'
import { parseParenthetical } from './parseParenthetical.ts'

export type MealLineResult =
  | { status: 'ok'; name: string; quantity: number; unit: string | null; notes: string | null }
  | { status: 'missing_quantity' }
  | { status: 'negative_quantity'; quantity: number }

export interface MealLineOptions {
  /** Accept a trailing quantity ("oats 25") only when a known unit follows it. */
  requireTrailingUnit?: boolean
}

const BULLET_PATTERN = /^(?:[-*•+]|\[[ xX]\])\s+/
const TRAILING_QTY_PATTERN = new RegExp(`^(.*?\\p{L}.*?)[\\s:=–-]+(${NUMBER_SOURCE})\\s*([\\p{L}]+\\.?)?$`, 'u')

/** Whether a line is a list item ("- ", "* ", "• ", "+ "). */
export function isBulletLine(line: string): boolean {
  return BULLET_PATTERN.test(line.trim())
}

/**
 * Normalize whitespace and unicode fractions in a raw meal line.
 */
function normalize(raw: string): string {
  let text = raw.trim()
  text = normalizeUnicodeFractions(text)
  text = text.replace(/\s+/g, ' ')
  return text
}

function cleanName(name: string): string {
  return name
    .replace(/^(?:of|von)\s+/i, '')
    .replace(/[\s:=,;–-]+$/, '')
    .trim()
}

/**
 * Parse one meal line into name, quantity and unit.
 *
 * Pipeline:
 * 1. Normalize whitespace + unicode fractions
 * 2. Strip list markers
 * 3. Extract parentheticals -> notes
 * 4. Leading form: quantity, then unit, then name ("25 g oats", "2x Eier")
 * 5. Trailing form: name, then quantity and unit ("Haferflocken: 50 g")
 */
export function parseMealLine(raw: string, options: MealLineOptions = {}): MealLineResult {
  const normalized = normalize(raw).replace(BULLET_PATTERN, '')
  const { text, notes: parenNotes } = parseParenthetical(normalized)
  const notes = parenNotes.length > 0 ? parenNotes.join('; ') : null

  const negative = text.match(/^[-−]\s*(\d+(?:[.,]\d+)?)/)
  if (negative) {
    return { status: 'negative_quantity', quantity: -toNumber(negative[1]) }
  }

  const { qty, remainder: afterQty } = parseQuantity(text)
  if (qty !== null) {
    const { unit, remainder: afterUnit } = parseUnit(afterQty)
    const name = cleanName(afterUnit)
    if (!name) return { status: 'missing_quantity' }
    return { status: 'ok', name, quantity: qty, unit, notes }
  }

  const trailing = text.match(TRAILING_QTY_PATTERN)
  if (trailing) {
    const quantity = toNumber(trailing[2])
    const unit = trailing[3] ? trailing[3].replace(/\.$/, '') : null
    const unitKnown = unit !== null && canonicalUnit(unit) !== null
    const name = cleanName(trailing[1])

    if (!isNaN(quantity) && name && (unitKnown || (unit === null && !options.requireTrailingUnit))) {
      return { status: 'ok', name, quantity, unit, notes }
    }
  }

  return { status: 'missing_quantity' }
}
