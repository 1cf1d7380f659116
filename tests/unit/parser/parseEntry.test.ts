import { describe, it, expect } from 'vitest'
import { parseEntry } from '@application/parser/parseEntry.ts'
import { ParseError } from '@domain/errors/ParseError.ts'

const FULL_ENTRY = [
  '---',
  'date: 2025-01-06',
  'weight: 80,4 kg',
  'bodyfat: 18.5%',
  'calories: 2400',
  'sleep: 7:30',
  'steps: 10.500',
  'mood: good',
  '---',
  '## Frühstück',
  '- 50 g Haferflocken',
  '- 200 ml Milch',
  'Mittagessen',
  '- Reis 150 g',
  '- Kaffee',
  '',
  '## Status',
  'Deload week, knee feels better.',
].join('\n')

describe('parseEntry', () => {
  it('reads a delimited header and meal sections', () => {
    const { entry, warnings } = parseEntry({ source: 'diary/2025-01-06.md', text: FULL_ENTRY })

    expect(entry.date).toBe('2025-01-06')
    expect(entry.weightKg).toBeCloseTo(80.4, 5)
    expect(entry.bodyfatPct).toBe(18.5)
    expect(entry.targetCalories).toBe(2400)
    expect(entry.sleepMinutes).toBe(450)
    expect(entry.steps).toBe(10500)
    expect(entry.actualCalories).toBeNull()
    expect(entry.extensions).toEqual({ mood: 'good' })
    expect(entry.status).toBe('Deload week, knee feels better.')

    expect(entry.mealItems).toEqual([
      { raw: '- 50 g Haferflocken', line: 11, name: 'Haferflocken', quantity: 50, unit: 'g', meal: 'Frühstück', notes: null },
      { raw: '- 200 ml Milch', line: 12, name: 'Milch', quantity: 200, unit: 'ml', meal: 'Frühstück', notes: null },
      { raw: '- Reis 150 g', line: 14, name: 'Reis', quantity: 150, unit: 'g', meal: 'Mittagessen', notes: null },
    ])

    expect(warnings).toEqual([
      {
        source: 'diary/2025-01-06.md',
        line: 15,
        raw: '- Kaffee',
        reason: 'missing_quantity',
        message: 'No quantity found',
      },
    ])
  })

  it('reads leading key/value lines as the header', () => {
    const text = [
      'Date: 2025-01-08',
      'Weight: 79.9',
      'Actual-Protein: 150 g',
      'Comment: "Long day"',
      '',
      'Lunch',
      '- 150 g Reis',
    ].join('\n')

    const { entry } = parseEntry({ source: 'import', text })

    expect(entry.date).toBe('2025-01-08')
    expect(entry.weightKg).toBe(79.9)
    expect(entry.actualProteinG).toBe(150)
    expect(entry.comment).toBe('Long day')
    expect(entry.mealItems).toHaveLength(1)
    expect(entry.mealItems[0]).toMatchObject({ line: 7, name: 'Reis', meal: 'Lunch' })
  })

  it('takes the date from the source when the header has none', () => {
    const { entry } = parseEntry({ source: 'diary/2025-01-07.md', text: '- 2 Eier' })

    expect(entry.date).toBe('2025-01-07')
    expect(entry.mealItems).toEqual([
      { raw: '- 2 Eier', line: 1, name: 'Eier', quantity: 2, unit: null, meal: null, notes: null },
    ])
  })

  it('treats empty header values as absent and keeps unknown keys', () => {
    const text = ['---', 'date: 2025-01-06', 'weight:', 'note:', '---'].join('\n')
    const { entry } = parseEntry({ source: 'day', text })

    expect(entry.weightKg).toBeNull()
    expect(entry.extensions).toEqual({ note: '' })
  })

  it('throws ParseError when no date can be found', () => {
    expect(() => parseEntry({ source: 'notes.md', text: '- 2 Eier' })).toThrow(
      new ParseError('notes.md', 'date', null, 'no date in header or source'),
    )
  })

  it('throws ParseError for an impossible date', () => {
    const text = ['---', 'date: 2025-02-30', '---'].join('\n')
    expect(() => parseEntry({ source: 'day', text })).toThrow('day: date is not a valid ISO date: "2025-02-30"')
  })

  it('throws ParseError for a malformed metric', () => {
    const text = ['---', 'date: 2025-01-06', 'weight: heavy', '---'].join('\n')
    expect(() => parseEntry({ source: 'day', text })).toThrow('day: weightKg is not a number: "heavy"')
  })

  it('skips prose sections and plain sentences', () => {
    const text = [
      '---',
      'date: 2025-01-06',
      '---',
      'Heute war ein guter Tag',
      '## Training',
      '- 3x10 Kniebeugen',
      '## Shake',
      '- 1 scoop Whey',
    ].join('\n')

    const { entry, warnings } = parseEntry({ source: 'day', text })

    expect(entry.mealItems.map((m) => [m.name, m.meal])).toEqual([['Whey', 'Shake']])
    expect(warnings).toEqual([])
  })

  it('prefers a status from the header and truncates long status sections', () => {
    const withHeader = ['---', 'date: 2025-01-06', 'status: Cut week 2', '---', '## Status', 'ignored'].join('\n')
    expect(parseEntry({ source: 'day', text: withHeader }).entry.status).toBe('Cut week 2')

    const long = ['---', 'date: 2025-01-06', '---', '## Agenda', 'x'.repeat(130)].join('\n')
    expect(parseEntry({ source: 'day', text: long }).entry.status).toBe('x'.repeat(117) + '...')
  })
})
