import { describe, it, expect } from 'vitest'
import { addDays, daysBetween, findIsoDate, getWeekStart, parseIsoDate } from '@application/calendar/weekUtils.ts'

describe('parseIsoDate', () => {
  it('accepts calendar dates and drops a time part', () => {
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29')
    expect(parseIsoDate(' 2025-01-03T07:30 ')).toBe('2025-01-03')
  })

  it('rejects impossible or foreign formats', () => {
    expect(parseIsoDate('2025-02-29')).toBeNull()
    expect(parseIsoDate('2025-13-01')).toBeNull()
    expect(parseIsoDate('03.01.2025')).toBeNull()
  })
})

describe('findIsoDate', () => {
  it('finds the first valid date in a path', () => {
    expect(findIsoDate('diary/2025/2025-01-03.md')).toBe('2025-01-03')
    expect(findIsoDate('diary/2025-99-99_2025-01-04.md')).toBe('2025-01-04')
    expect(findIsoDate('notes.md')).toBeNull()
  })
})

describe('date arithmetic', () => {
  it('counts calendar days across month and year ends', () => {
    expect(daysBetween('2024-12-30', '2025-01-02')).toBe(3)
    expect(daysBetween('2025-01-02', '2024-12-30')).toBe(-3)
    expect(daysBetween('2025-03-29', '2025-03-31')).toBe(2)
  })

  it('offsets dates', () => {
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01')
    expect(addDays('2025-03-01', -1)).toBe('2025-02-28')
  })

  it('finds the Monday of a week', () => {
    expect(getWeekStart('2025-01-06')).toBe('2025-01-06')
    expect(getWeekStart('2025-01-08')).toBe('2025-01-06')
    expect(getWeekStart('2025-01-05')).toBe('2024-12-30')
  })
})
