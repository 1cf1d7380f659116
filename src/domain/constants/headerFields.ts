import type { MetricField } from '@domain/models/DailyEntry.ts'

export type HeaderField = MetricField | 'date' | 'comment' | 'status'

/** Maps normalized header keys (lower_snake_case) to typed entry fields. */
export const HEADER_FIELDS: Record<string, HeaderField> = {
  date: 'date',
  datum: 'date',

  weight: 'weightKg',
  weight_kg: 'weightKg',
  gewicht: 'weightKg',

  bodyfat: 'bodyfatPct',
  bodyfat_pct: 'bodyfatPct',
  bodyfat_percentage: 'bodyfatPct',
  body_fat: 'bodyfatPct',
  koerperfett: 'bodyfatPct',

  water: 'waterPct',
  water_pct: 'waterPct',
  water_percentage: 'waterPct',

  muscle: 'musclePct',
  muscle_pct: 'musclePct',
  muscle_percentage: 'musclePct',

  bones: 'bonesPct',
  bones_pct: 'bonesPct',
  bones_percentage: 'bonesPct',

  abdgirth: 'abdGirthCm',
  abdgirth_cm: 'abdGirthCm',
  waist: 'abdGirthCm',
  waist_cm: 'abdGirthCm',

  calories: 'targetCalories',
  target_calories: 'targetCalories',
  target_kcal: 'targetCalories',
  target_protein: 'targetProteinG',
  target_protein_g: 'targetProteinG',
  target_fat: 'targetFatG',
  target_fat_g: 'targetFatG',
  target_carbs: 'targetCarbsG',
  target_carbs_g: 'targetCarbsG',

  actual_calories: 'actualCalories',
  actual_kcal: 'actualCalories',
  actual_protein: 'actualProteinG',
  actual_protein_g: 'actualProteinG',
  actual_fat: 'actualFatG',
  actual_fat_g: 'actualFatG',
  actual_carbs: 'actualCarbsG',
  actual_carbs_g: 'actualCarbsG',

  sleep: 'sleepMinutes',
  schlaf: 'sleepMinutes',
  steps: 'steps',
  schritte: 'steps',

  comment: 'comment',
  kommentar: 'comment',
  status: 'status',
}

/** Normalize a header key: trim, lower-case, spaces and hyphens to underscores. */
export function normalizeHeaderKey(key: string): string {
  return key.trim().toLowerCase().replace(/[\s-]+/g, '_')
}
