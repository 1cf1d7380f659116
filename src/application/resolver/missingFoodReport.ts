import type { MissingFoodItem, MissingFoodOccurrence, MissingFoodReport } from '@domain/models/MissingFoodReport.ts'

export function createMissingFoodReport(): MissingFoodReport {
  return { foods: {}, unsupportedUnits: {} }
}

function record(
  bucket: Record<string, MissingFoodItem>,
  key: string,
  name: string,
  occurrence: MissingFoodOccurrence,
): void {
  const existing = Object.hasOwn(bucket, key) ? bucket[key] : null
  if (existing) {
    existing.count++
    if (!existing.names.includes(name)) existing.names.push(name)
    existing.occurrences.push(occurrence)
    return
  }
  bucket[key] = { key, count: 1, names: [name], occurrences: [occurrence] }
}

/** Count a food name that matched nothing in the reference database. */
export function recordMissingFood(
  report: MissingFoodReport,
  normalizedName: string,
  writtenName: string,
  occurrence: MissingFoodOccurrence,
): void {
  record(report.foods, normalizedName, writtenName, occurrence)
}

/** Count a matched food whose written unit cannot be converted to its basis. */
export function recordUnsupportedUnit(
  report: MissingFoodReport,
  food: string,
  unit: string,
  occurrence: MissingFoodOccurrence,
): void {
  record(report.unsupportedUnits, `${food}|${unit.toLowerCase()}`, unit, occurrence)
}

/** Items sorted by count (descending), then key. */
export function listMissingFoods(bucket: Record<string, MissingFoodItem>): MissingFoodItem[] {
  return Object.values(bucket).sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
}

/** Normalized name → count, the shape a "foods to add" list is written from. */
export function missingFoodCounts(report: MissingFoodReport): Record<string, number> {
  const counts: Record<string, number> = {}
  for (const item of listMissingFoods(report.foods)) counts[item.key] = item.count
  return counts
}
