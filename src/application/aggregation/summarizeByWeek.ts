import type { WeeklySummary } from '@domain/models/AggregateSummary.ts'
import type { ResolvedEntry } from '@domain/models/ResolvedEntry.ts'
import { addDays, getWeekStart } from '@application/calendar/weekUtils.ts'
import { aggregateEntries } from './aggregateEntries.ts'
import { sortByDate } from './selectEntries.ts'

/**
 * One summary per Monday-to-Sunday week that has entries, oldest first.
 */
export function summarizeByWeek(entries: readonly ResolvedEntry[]): WeeklySummary[] {
  const weeks = new Map<string, ResolvedEntry[]>()

  for (const entry of sortByDate(entries)) {
    const weekStart = getWeekStart(entry.date)
    const bucket = weeks.get(weekStart)
    if (bucket) bucket.push(entry)
    else weeks.set(weekStart, [entry])
  }

  return [...weeks].map(([weekStart, weekEntries]) => ({
    weekStart,
    summary: aggregateEntries(weekEntries, { from: weekStart, to: addDays(weekStart, 6) }),
  }))
}
