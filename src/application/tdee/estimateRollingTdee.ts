import type { DailyEntry } from '@domain/models/DailyEntry.ts'
import type { RollingTdeePoint, RollingTdeeResult, TdeeEstimate } from '@domain/models/TdeeEstimate.ts'
import { DEFAULT_POLICY } from '@domain/constants/policy.ts'
import type { EstimationPolicy } from '@domain/constants/policy.ts'
import { addDays, daysBetween } from '@application/calendar/weekUtils.ts'
import { mean, median } from '@application/aggregation/computeStats.ts'
import { selectEntries } from '@application/aggregation/selectEntries.ts'
import { round2 } from '@application/resolver/computeNutrition.ts'
import { estimateTdee, recommendFrom } from './estimateTdee.ts'
import type { TdeePolicy } from './estimateTdee.ts'

export type RollingTdeeOptions = Partial<TdeePolicy & Pick<EstimationPolicy, 'tdeeWindowDays' | 'smoothingDays'>>

/**
 * Estimate TDEE for every day over the trailing `tdeeWindowDays`, then smooth
 * the series with a centered `smoothingDays` average. The smoothing window is
 * measured in calendar days (±⌊smoothingDays / 2⌋ around each point), not in
 * estimate rows, so days without an estimate narrow it instead of pulling in
 * points from further away. Bulk and cut recommendations are taken around the
 * mean of the point estimates.
 */
export function estimateRollingTdee(entries: readonly DailyEntry[], options: RollingTdeeOptions = {}): RollingTdeeResult {
  const { tdeeWindowDays, smoothingDays, ...policy } = { ...DEFAULT_POLICY, ...options }
  if (tdeeWindowDays < 2) throw new RangeError(`tdeeWindowDays must be at least 2, got ${tdeeWindowDays}`)
  if (smoothingDays < 1) throw new RangeError(`smoothingDays must be at least 1, got ${smoothingDays}`)

  const { kept } = selectEntries(entries)
  if (kept.length === 0) return { status: 'insufficient_data', reason: 'no_estimates' }

  const firstDate = kept[0].date
  const lastDate = kept[kept.length - 1].date
  const estimates: Array<TdeeEstimate & { date: string }> = []

  for (let date = firstDate; date <= lastDate; date = addDays(date, 1)) {
    const result = estimateTdee(kept, { from: addDays(date, -(tdeeWindowDays - 1)), to: date }, policy)
    if (result.status === 'ok') estimates.push({ ...result.estimate, date })
  }

  if (estimates.length === 0) return { status: 'insufficient_data', reason: 'no_estimates' }

  const half = Math.floor(smoothingDays / 2)
  const points: RollingTdeePoint[] = estimates.map((estimate) => {
    const neighbours = estimates.filter((other) => Math.abs(daysBetween(estimate.date, other.date)) <= half)
    return { ...estimate, smoothed: round2(mean(neighbours.map((n) => n.tdee))) }
  })

  const values = points.map((p) => p.tdee)
  const meanTdee = mean(values)
  return {
    status: 'ok',
    points,
    mean: round2(meanTdee),
    median: round2(median(values)),
    recommendations: recommendFrom(meanTdee, policy.bulkOffsetKcal, policy.cutOffsetKcal),
  }
}
