import type { MetricField } from '@domain/models/DailyEntry.ts'
import { MEASUREMENT_UNITS, METRIC_KINDS } from '@domain/constants/measurements.ts'
import { ParseError } from '@domain/errors/ParseError.ts'
import { parseDuration } from './parseDuration.ts'

const MEASUREMENT_PATTERN = /^([+-]?\d+(?:[.,]\d+)?)\s*([\p{L}%]*)\.?$/u

// "10.000" / "10,000" / "10'000" written with thousands separators
const GROUPED_COUNT_PATTERN = /^(\d{1,3}(?:[.,']\d{3})+)(\s*[\p{L}]*)$/u

/**
 * Parse a header metric to its canonical unit (kg, kcal, g, %, cm, minutes, count).
 * Empty values count as absent; malformed values or units the field does not
 * accept throw a ParseError.
 */
export function parseMeasurement(field: MetricField, rawValue: string, source: string): number | null {
  const value = rawValue.trim()
  if (!value) return null

  const kind = METRIC_KINDS[field]

  if (kind === 'duration') {
    const minutes = parseDuration(value)
    if (minutes === null) {
      throw new ParseError(source, field, rawValue, `${field} is not a duration: "${rawValue}"`)
    }
    return minutes
  }

  let text = value
  if (kind === 'count') {
    const grouped = value.match(GROUPED_COUNT_PATTERN)
    if (grouped) text = grouped[1].replace(/[.,']/g, '') + grouped[2]
  }

  const match = text.match(MEASUREMENT_PATTERN)
  if (!match) {
    throw new ParseError(source, field, rawValue, `${field} is not a number: "${rawValue}"`)
  }

  const unit = match[2].toLowerCase()
  const units = MEASUREMENT_UNITS[kind]
  if (!Object.hasOwn(units, unit)) {
    throw new ParseError(source, field, rawValue, `${field} does not accept unit "${match[2]}"`)
  }

  const number = parseFloat(match[1].replace(',', '.'))
  return number * units[unit]
}
