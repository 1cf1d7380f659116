import { describe, it, expect } from 'vitest'
import { parseMeasurement } from '@application/parser/parseMeasurement.ts'
import { parseDuration } from '@application/parser/parseDuration.ts'
import { ParseError } from '@domain/errors/ParseError.ts'

describe('parseMeasurement', () => {
  it('accepts either decimal separator', () => {
    expect(parseMeasurement('weightKg', '80,4 kg', 'day.md')).toBeCloseTo(80.4, 5)
    expect(parseMeasurement('weightKg', '80.4', 'day.md')).toBeCloseTo(80.4, 5)
    expect(parseMeasurement('bodyfatPct', '18,5 %', 'day.md')).toBeCloseTo(18.5, 5)
  })

  it('converts to the canonical unit', () => {
    expect(parseMeasurement('weightKg', '176 lbs', 'day.md')).toBeCloseTo(79.832, 3)
    expect(parseMeasurement('abdGirthCm', '0.9 m', 'day.md')).toBeCloseTo(90, 5)
    expect(parseMeasurement('targetCalories', '2400 kcal', 'day.md')).toBe(2400)
    expect(parseMeasurement('targetProteinG', '160g', 'day.md')).toBe(160)
  })

  it('reads step counts with thousands separators', () => {
    expect(parseMeasurement('steps', '10.500', 'day.md')).toBe(10500)
    expect(parseMeasurement('steps', "12'000 steps", 'day.md')).toBe(12000)
    expect(parseMeasurement('steps', '9500', 'day.md')).toBe(9500)
  })

  it('reads sleep as a duration', () => {
    expect(parseMeasurement('sleepMinutes', '7:30', 'day.md')).toBe(450)
  })

  it('treats an empty value as absent', () => {
    expect(parseMeasurement('weightKg', '  ', 'day.md')).toBeNull()
  })

  it('throws ParseError for a malformed value', () => {
    expect(() => parseMeasurement('weightKg', 'heavy', 'day.md')).toThrow(ParseError)

    try {
      parseMeasurement('weightKg', 'heavy', 'day.md')
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError)
      if (!(err instanceof ParseError)) return
      expect(err.source).toBe('day.md')
      expect(err.field).toBe('weightKg')
      expect(err.rawValue).toBe('heavy')
      expect(err.message).toBe('day.md: weightKg is not a number: "heavy"')
    }
  })

  it('throws ParseError for a unit foreign to the field', () => {
    expect(() => parseMeasurement('weightKg', '80 cm', 'day.md')).toThrow('day.md: weightKg does not accept unit "cm"')
  })

  it('throws ParseError for an unreadable duration', () => {
    expect(() => parseMeasurement('sleepMinutes', 'a while', 'day.md')).toThrow(ParseError)
  })
})

describe('parseDuration', () => {
  it('parses clock notation', () => {
    expect(parseDuration('7:30')).toBe(450)
    expect(parseDuration('7h30')).toBe(450)
  })

  it('parses hour and minute components', () => {
    expect(parseDuration('7h 30min')).toBe(450)
    expect(parseDuration('7.5 h')).toBe(450)
    expect(parseDuration('7,5 Std')).toBe(450)
    expect(parseDuration('450 min')).toBe(450)
  })

  it('reads bare numbers as hours by default', () => {
    expect(parseDuration('8')).toBe(480)
    expect(parseDuration('90', 'minutes')).toBe(90)
  })

  it('returns null for anything else', () => {
    expect(parseDuration('lots')).toBeNull()
    expect(parseDuration('7:75')).toBeNull()
    expect(parseDuration('')).toBeNull()
  })
})
