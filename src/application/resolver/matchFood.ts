import { distance } from 'fastest-levenshtein'
import type { FoodMatch } from '@domain/models/Resolution.ts'
import { DEFAULT_POLICY, TOKEN_MATCH_CONFIDENCE } from '@domain/constants/policy.ts'
import type { FoodIndex, IndexedName } from './FoodIndex.ts'
import { foldText, singularize } from './normalizeFoodName.ts'

export interface MatchOptions {
  fuzzyThreshold?: number
}

type Matcher = (name: string, index: FoodIndex, options: Required<MatchOptions>) => FoodMatch | null

const MIN_TOKEN_LENGTH = 3

function hit(entry: IndexedName, kind: FoodMatch['kind'], strategy: FoodMatch['strategy'], confidence: number): FoodMatch {
  return { food: entry.food, kind, strategy, confidence, matchedText: entry.text }
}

function lookupNormalized(map: ReadonlyMap<string, IndexedName>, folded: string): IndexedName | undefined {
  return map.get(folded) ?? map.get(singularize(folded))
}

/** Similarity in 0..1 from edit distance, 1 meaning identical. */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length)
  if (longest === 0) return 1
  return 1 - distance(a, b) / longest
}

const matchExact: Matcher = (name, index) => {
  const entry = index.exact.get(name.trim().toLowerCase())
  return entry ? hit(entry, 'exact', 'exact', 1) : null
}

const matchAlias: Matcher = (name, index) => {
  const entry = index.alias.get(name.trim().toLowerCase())
  return entry ? hit(entry, 'alias', 'alias', 1) : null
}

const matchNormalizedExact: Matcher = (name, index) => {
  const entry = lookupNormalized(index.normalizedExact, foldText(name))
  return entry ? hit(entry, 'exact', 'normalized-exact', 1) : null
}

const matchNormalizedAlias: Matcher = (name, index) => {
  const entry = lookupNormalized(index.normalizedAlias, foldText(name))
  return entry ? hit(entry, 'alias', 'normalized-alias', 1) : null
}

// "rote Äpfel" → tries "apfel" before "rote"
const matchToken: Matcher = (name, index) => {
  const tokens = foldText(name).split(' ').filter((t) => t.length >= MIN_TOKEN_LENGTH)
  if (tokens.length < 2) return null

  for (const token of tokens.reverse()) {
    const entry = lookupNormalized(index.normalizedExact, token) ?? lookupNormalized(index.normalizedAlias, token)
    if (entry) return hit(entry, 'fuzzy', 'token', TOKEN_MATCH_CONFIDENCE)
  }
  return null
}

const matchFuzzy: Matcher = (name, index, options) => {
  const folded = foldText(name)
  if (!folded) return null

  let best: IndexedName | null = null
  let bestScore = 0
  for (const candidate of index.candidates) {
    const score = similarity(folded, candidate.folded)
    if (score > bestScore) {
      best = candidate
      bestScore = score
    }
  }

  if (!best || bestScore < options.fuzzyThreshold) return null
  return hit(best, 'fuzzy', 'fuzzy', Math.round(bestScore * 1000) / 1000)
}

/** Tried in order; the first hit wins. */
const MATCHERS: Matcher[] = [
  matchExact,
  matchAlias,
  matchNormalizedExact,
  matchNormalizedAlias,
  matchToken,
  matchFuzzy,
]

/**
 * Find the reference food for a name as written.
 * Returns null when no strategy accepts the name.
 */
export function matchFood(name: string, index: FoodIndex, options: MatchOptions = {}): FoodMatch | null {
  const resolved: Required<MatchOptions> = {
    fuzzyThreshold: options.fuzzyThreshold ?? DEFAULT_POLICY.fuzzyThreshold,
  }

  for (const matcher of MATCHERS) {
    const match = matcher(name, index, resolved)
    if (match) return match
  }
  return null
}
