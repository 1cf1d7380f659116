import { mapMetrics } from '@domain/models/DailyEntry.ts'
import type { DailyEntry, MetricField } from '@domain/models/DailyEntry.ts'
import type { AggregateSummary, DateWindow } from '@domain/models/AggregateSummary.ts'
import type { ResolvedEntry } from '@domain/models/ResolvedEntry.ts'
import { computeStats } from './computeStats.ts'
import { selectEntries } from './selectEntries.ts'

/** Non-null values of one metric, in entry order. */
export function metricValues(entries: readonly DailyEntry[], field: MetricField): number[] {
  const values: number[] = []
  for (const entry of entries) {
    const value = entry[field]
    if (value !== null) values.push(value)
  }
  return values
}

/**
 * Summarize resolved entries over an inclusive date window.
 *
 * Each metric is summarized over the entries that carry it; a metric no
 * entry carries is null rather than zero. Repeated dates count once.
 */
export function aggregateEntries(entries: readonly ResolvedEntry[], window: DateWindow = {}): AggregateSummary {
  const { kept, duplicates } = selectEntries(entries, window)

  const metrics = mapMetrics((field) => computeStats(metricValues(kept, field)))

  const lastEntry = kept.length > 0 ? kept[kept.length - 1] : null

  return {
    from: window.from ?? null,
    to: window.to ?? null,
    startDate: kept.length > 0 ? kept[0].date : null,
    endDate: lastEntry?.date ?? null,
    entryCount: kept.length,
    metrics,
    lastEntry,
    duplicates,
  }
}
