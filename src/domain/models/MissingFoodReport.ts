export interface MissingFoodOccurrence {
  source: string
  date: string
  line: string
}

export interface MissingFoodItem {
  key: string               // normalized name, or "food|unit" for unsupported units
  count: number
  names: string[]           // distinct spellings as written
  occurrences: MissingFoodOccurrence[]
}

/** Database gaps found during one run. Owned by the run that created it. */
export interface MissingFoodReport {
  foods: Record<string, MissingFoodItem>
  unsupportedUnits: Record<string, MissingFoodItem>
}
