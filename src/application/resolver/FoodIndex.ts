import type { FoodProfile, ReferenceDatabase } from '@domain/models/FoodReference.ts'
import { foldText, singularize } from './normalizeFoodName.ts'

export interface IndexedName {
  food: string              // canonical name
  text: string              // canonical name or alias as declared
  isAlias: boolean
}

/** Lookup tables built once per reference database. Read-only after construction. */
export interface FoodIndex {
  foods: Readonly<Record<string, FoodProfile>>
  exact: ReadonlyMap<string, IndexedName>
  alias: ReadonlyMap<string, IndexedName>
  normalizedExact: ReadonlyMap<string, IndexedName>
  normalizedAlias: ReadonlyMap<string, IndexedName>
  /** Folded names for similarity search, canonical names first, then aliases. */
  candidates: ReadonlyArray<IndexedName & { folded: string }>
}

function setFirst(map: Map<string, IndexedName>, key: string, value: IndexedName): void {
  if (key && !map.has(key)) map.set(key, value)
}

/**
 * Build the lookup index for a reference database.
 * When two names collide, the one declared first wins.
 */
export function buildFoodIndex(database: ReferenceDatabase): FoodIndex {
  const exact = new Map<string, IndexedName>()
  const alias = new Map<string, IndexedName>()
  const normalizedExact = new Map<string, IndexedName>()
  const normalizedAlias = new Map<string, IndexedName>()
  const canonicalCandidates: Array<IndexedName & { folded: string }> = []
  const aliasCandidates: Array<IndexedName & { folded: string }> = []

  for (const food of Object.keys(database.foods)) {
    const entry: IndexedName = { food, text: food, isAlias: false }
    const folded = foldText(food)
    setFirst(exact, food.trim().toLowerCase(), entry)
    setFirst(normalizedExact, folded, entry)
    setFirst(normalizedExact, singularize(folded), entry)
    if (folded) canonicalCandidates.push({ ...entry, folded })
  }

  for (const [food, names] of Object.entries(database.aliases)) {
    if (!Object.hasOwn(database.foods, food)) continue

    for (const name of names) {
      const entry: IndexedName = { food, text: name, isAlias: true }
      const folded = foldText(name)
      setFirst(alias, name.trim().toLowerCase(), entry)
      setFirst(normalizedAlias, folded, entry)
      setFirst(normalizedAlias, singularize(folded), entry)
      if (folded) aliasCandidates.push({ ...entry, folded })
    }
  }

  return {
    foods: database.foods,
    exact,
    alias,
    normalizedExact,
    normalizedAlias,
    candidates: [...canonicalCandidates, ...aliasCandidates],
  }
}
