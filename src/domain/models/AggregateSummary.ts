import type { MetricField } from './DailyEntry.ts'
import type { ResolvedEntry } from './ResolvedEntry.ts'

export interface DateWindow {
  from?: string | null      // inclusive YYYY-MM-DD
  to?: string | null        // inclusive YYYY-MM-DD
}

export interface MetricStats {
  count: number
  mean: number
  median: number
  min: number
  max: number
  total: number
}

export interface DuplicateDate {
  date: string
  keptSource: string
  duplicateSource: string
}

export interface AggregateSummary {
  from: string | null
  to: string | null
  startDate: string | null
  endDate: string | null
  entryCount: number
  metrics: Record<MetricField, MetricStats | null>
  lastEntry: ResolvedEntry | null
  duplicates: DuplicateDate[]
}

export interface WeeklySummary {
  weekStart: string         // Monday, YYYY-MM-DD
  summary: AggregateSummary
}

export interface MovingAveragePoint {
  date: string
  value: number
  average: number           // mean over the trailing window ending on `date`
}
