/** Body, target, intake and lifestyle metrics recorded per day. */
export const METRIC_FIELDS = [
  'weightKg',
  'bodyfatPct',
  'waterPct',
  'musclePct',
  'bonesPct',
  'abdGirthCm',
  'targetCalories',
  'targetProteinG',
  'targetFatG',
  'targetCarbsG',
  'actualCalories',
  'actualProteinG',
  'actualFatG',
  'actualCarbsG',
  'sleepMinutes',
  'steps',
] as const

export type MetricField = (typeof METRIC_FIELDS)[number]

/** All metrics in canonical units: kg, %, cm, kcal, g, minutes, count. */
export type EntryMetrics = Record<MetricField, number | null>

export interface RawEntry {
  source: string             // path or other identifier; may carry a YYYY-MM-DD date hint
  text: string
}

export interface MealMention {
  raw: string                // line as written
  line: number               // 1-based line number within the entry text
  name: string
  quantity: number
  unit: string | null        // unit as written, e.g. "g", "Stk", "EL"
  meal: string | null        // heading of the meal section, e.g. "Frühstück"
  notes: string | null       // parenthetical remarks
}

export interface DailyEntry extends EntryMetrics {
  source: string
  date: string               // YYYY-MM-DD
  comment: string | null
  status: string | null
  extensions: Record<string, string>
  mealItems: MealMention[]
}

/** Build a record with one value per metric field. */
export function mapMetrics<T>(fn: (field: MetricField) => T): Record<MetricField, T> {
  return {
    weightKg: fn('weightKg'),
    bodyfatPct: fn('bodyfatPct'),
    waterPct: fn('waterPct'),
    musclePct: fn('musclePct'),
    bonesPct: fn('bonesPct'),
    abdGirthCm: fn('abdGirthCm'),
    targetCalories: fn('targetCalories'),
    targetProteinG: fn('targetProteinG'),
    targetFatG: fn('targetFatG'),
    targetCarbsG: fn('targetCarbsG'),
    actualCalories: fn('actualCalories'),
    actualProteinG: fn('actualProteinG'),
    actualFatG: fn('actualFatG'),
    actualCarbsG: fn('actualCarbsG'),
    sleepMinutes: fn('sleepMinutes'),
    steps: fn('steps'),
  }
}

export function emptyMetrics(): EntryMetrics {
  return mapMetrics(() => null)
}
