import type { DailyEntry } from '@domain/models/DailyEntry.ts'
import type { DateWindow, DuplicateDate } from '@domain/models/AggregateSummary.ts'

export interface EntrySelection<T extends DailyEntry> {
  kept: T[]
  duplicates: DuplicateDate[]
}

/** Stable sort by date; entries of the same date keep their input order. */
export function sortByDate<T extends DailyEntry>(entries: readonly T[]): T[] {
  return entries
    .map((entry, position) => ({ entry, position }))
    .sort((a, b) => (a.entry.date < b.entry.date ? -1 : a.entry.date > b.entry.date ? 1 : a.position - b.position))
    .map(({ entry }) => entry)
}

export function isWithinWindow(date: string, window: DateWindow = {}): boolean {
  if (window.from && date < window.from) return false
  if (window.to && date > window.to) return false
  return true
}

/**
 * Sort, filter to the window, and drop repeated dates.
 * The first entry seen for a date is kept; later ones are listed as duplicates.
 */
export function selectEntries<T extends DailyEntry>(entries: readonly T[], window: DateWindow = {}): EntrySelection<T> {
  const kept: T[] = []
  const duplicates: DuplicateDate[] = []
  const byDate = new Map<string, T>()

  for (const entry of sortByDate(entries)) {
    if (!isWithinWindow(entry.date, window)) continue

    const first = byDate.get(entry.date)
    if (first) {
      duplicates.push({ date: entry.date, keptSource: first.source, duplicateSource: entry.source })
      continue
    }
    byDate.set(entry.date, entry)
    kept.push(entry)
  }

  return { kept, duplicates }
}
