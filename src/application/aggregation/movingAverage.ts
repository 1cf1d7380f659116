import type { DailyEntry, MetricField } from '@domain/models/DailyEntry.ts'
import type { MovingAveragePoint } from '@domain/models/AggregateSummary.ts'
import { daysBetween } from '@application/calendar/weekUtils.ts'
import { selectEntries } from './selectEntries.ts'

/**
 * Trailing moving average of one metric.
 *
 * For every day carrying the metric, averages the values recorded in the
 * `days` calendar days ending on that day. Gaps shrink the window rather
 * than counting as zero.
 */
export function movingAverage(entries: readonly DailyEntry[], field: MetricField, days = 7): MovingAveragePoint[] {
  if (days < 1) throw new RangeError(`days must be at least 1, got ${days}`)

  const observations: Array<{ date: string; value: number }> = []
  for (const entry of selectEntries(entries).kept) {
    const value = entry[field]
    if (value !== null) observations.push({ date: entry.date, value })
  }

  return observations.map(({ date, value }) => {
    const inWindow = observations.filter((o) => {
      const age = daysBetween(o.date, date)
      return age >= 0 && age < days
    })
    const average = inWindow.reduce((sum, o) => sum + o.value, 0) / inWindow.length
    return { date, value, average }
  })
}
