import type { MetricField } from '@domain/models/DailyEntry.ts'

export type MeasurementKind =
  | 'mass'
  | 'energy'
  | 'macro'
  | 'percent'
  | 'length'
  | 'count'
  | 'duration'

/**
 * Unit suffixes accepted per measurement kind, with the factor that converts
 * the written value to the canonical unit (kg, kcal, g, %, cm, count).
 * The empty suffix means the value was written without a unit.
 */
export const MEASUREMENT_UNITS: Record<Exclude<MeasurementKind, 'duration'>, Record<string, number>> = {
  mass: { '': 1, kg: 1, kgs: 1, kilo: 1, g: 0.001, lb: 0.45359237, lbs: 0.45359237 },
  energy: { '': 1, kcal: 1, cal: 1, kj: 1 / 4.184 },
  macro: { '': 1, g: 1, gr: 1, mg: 0.001 },
  percent: { '': 1, '%': 1, pct: 1 },
  length: { '': 1, cm: 1, mm: 0.1, m: 100, in: 2.54 },
  count: { '': 1, steps: 1, schritte: 1 },
}

export const METRIC_KINDS: Record<MetricField, MeasurementKind> = {
  weightKg: 'mass',
  bodyfatPct: 'percent',
  waterPct: 'percent',
  musclePct: 'percent',
  bonesPct: 'percent',
  abdGirthCm: 'length',
  targetCalories: 'energy',
  targetProteinG: 'macro',
  targetFatG: 'macro',
  targetCarbsG: 'macro',
  actualCalories: 'energy',
  actualProteinG: 'macro',
  actualFatG: 'macro',
  actualCarbsG: 'macro',
  sleepMinutes: 'duration',
  steps: 'count',
}
