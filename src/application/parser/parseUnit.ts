import { UNIT_MAP } from '@domain/constants/units.ts'

export interface UnitResult {
  unit: string | null            // as written, original casing
  unitCanonical: string | null
  remainder: string
}

// Build sorted keys for matching (longest first to avoid partial matches)
const UNIT_KEYS = Object.keys(UNIT_MAP).sort((a, b) => b.length - a.length)

/**
 * Parse a unit from the front of a string.
 * Case-insensitive. Handles plural and German forms via UNIT_MAP.
 */
export function parseUnit(text: string): UnitResult {
  const trimmed = text.trim()
  const lower = trimmed.toLowerCase()

  for (const key of UNIT_KEYS) {
    if (!lower.startsWith(key)) continue

    // Ensure we're matching a whole word (not partial)
    const nextChar = lower[key.length]
    if (nextChar && /\p{L}/u.test(nextChar)) continue

    // Single-letter units ('g', 'l', 'x'): require space, period, or end after them
    if (key.length === 1) {
      if (nextChar && nextChar !== '.' && nextChar !== ' ') continue
    }

    const canonical = UNIT_MAP[key]
    const remainder = trimmed.slice(key.length).replace(/^\.?\s*/, '')
    return { unit: trimmed.slice(0, key.length), unitCanonical: canonical, remainder }
  }

  return { unit: null, unitCanonical: null, remainder: trimmed }
}
