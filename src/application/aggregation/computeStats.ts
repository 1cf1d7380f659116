import type { MetricStats } from '@domain/models/AggregateSummary.ts'

export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid]
}

export function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

/** count/mean/median/min/max/total, or null for an empty list. */
export function computeStats(values: readonly number[]): MetricStats | null {
  if (values.length === 0) return null

  const total = values.reduce((sum, v) => sum + v, 0)
  return {
    count: values.length,
    mean: total / values.length,
    median: median(values),
    min: Math.min(...values),
    max: Math.max(...values),
    total,
  }
}
