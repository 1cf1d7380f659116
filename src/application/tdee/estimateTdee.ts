import type { DateWindow } from '@domain/models/AggregateSummary.ts'
import type { DailyEntry } from '@domain/models/DailyEntry.ts'
import type { TdeeRecommendations, TdeeResult } from '@domain/models/TdeeEstimate.ts'
import { DEFAULT_POLICY } from '@domain/constants/policy.ts'
import type { EstimationPolicy } from '@domain/constants/policy.ts'
import { daysBetween } from '@application/calendar/weekUtils.ts'
import { metricValues } from '@application/aggregation/aggregateEntries.ts'
import { mean } from '@application/aggregation/computeStats.ts'
import { selectEntries } from '@application/aggregation/selectEntries.ts'
import { round2 } from '@application/resolver/computeNutrition.ts'

/** Bulk and cut targets around a maintenance estimate, rounded to whole kcal. */
export function recommendFrom(tdee: number, bulkOffsetKcal: number, cutOffsetKcal: number): TdeeRecommendations {
  return {
    bulk: { offset: bulkOffsetKcal, calories: Math.round(tdee + bulkOffsetKcal) },
    cut: { offset: -cutOffsetKcal, calories: Math.round(tdee - cutOffsetKcal) },
  }
}

export type TdeePolicy = Pick<EstimationPolicy, 'kcalPerKg' | 'bulkOffsetKcal' | 'cutOffsetKcal'>

/**
 * Estimate maintenance calories from weight change against logged intake.
 *
 *   tdee = mean(actualCalories) - (lastWeight - firstWeight) * kcalPerKg / days
 *
 * `days` is the number of calendar days between the first and last weight
 * observation in the window. Only the reported fields are rounded, after the
 * estimate is computed. The energy-per-kg figure is a fixed
 * approximation; short windows are dominated by water and glycogen swings.
 */
export function estimateTdee(
  entries: readonly DailyEntry[],
  window: DateWindow = {},
  policy: Partial<TdeePolicy> = {},
): TdeeResult {
  const { kcalPerKg, bulkOffsetKcal, cutOffsetKcal } = { ...DEFAULT_POLICY, ...policy }
  const { kept } = selectEntries(entries, window)

  const weights = kept.flatMap((entry) => (entry.weightKg === null ? [] : [{ date: entry.date, kg: entry.weightKg }]))
  const calories = metricValues(kept, 'actualCalories')
  const counts = { weightCount: weights.length, calorieDays: calories.length }

  if (weights.length < 2) {
    return { status: 'insufficient_data', reason: 'fewer_than_two_weights', ...counts }
  }

  const first = weights[0]
  const last = weights[weights.length - 1]
  const days = daysBetween(first.date, last.date)
  // Unreachable after selectEntries drops repeated dates; kept so the
  // division below never sees zero.
  if (days <= 0) {
    return { status: 'insufficient_data', reason: 'no_elapsed_days', ...counts }
  }
  if (calories.length === 0) {
    return { status: 'insufficient_data', reason: 'no_calorie_data', ...counts }
  }

  const weightDeltaKg = last.kg - first.kg
  const energyDeltaKcal = weightDeltaKg * kcalPerKg
  const meanActualCalories = mean(calories)
  const tdee = meanActualCalories - energyDeltaKcal / days

  return {
    status: 'ok',
    estimate: {
      windowStart: first.date,
      windowEnd: last.date,
      days,
      firstWeightKg: first.kg,
      lastWeightKg: last.kg,
      weightDeltaKg: Math.round(weightDeltaKg * 1000) / 1000,
      energyDeltaKcal: round2(energyDeltaKcal),
      kcalPerKg,
      meanActualCalories: round2(meanActualCalories),
      calorieDays: calories.length,
      tdee: round2(tdee),
      recommendations: recommendFrom(tdee, bulkOffsetKcal, cutOffsetKcal),
    },
  }
}
