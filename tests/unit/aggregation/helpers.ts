import type { DailyEntry } from '@domain/models/DailyEntry.ts'
import type { ResolvedEntry } from '@domain/models/ResolvedEntry.ts'
import { emptyMetrics } from '@domain/models/DailyEntry.ts'

export function makeEntry(date: string, overrides: Partial<DailyEntry> = {}): ResolvedEntry {
  return {
    source: `diary/${date}.md`,
    date,
    ...emptyMetrics(),
    comment: null,
    status: null,
    extensions: {},
    mealItems: [],
    contributions: [],
    consumed: { calories: 0, proteinG: 0, fatG: 0, carbsG: 0 },
    ...overrides,
  }
}
