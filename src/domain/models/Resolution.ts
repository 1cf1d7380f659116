import type { MealMention } from './DailyEntry.ts'
import type { Nutrition } from './Nutrition.ts'

export type MatchKind = 'exact' | 'alias' | 'fuzzy' | 'unmatched'

export type MatchStrategy =
  | 'exact'
  | 'alias'
  | 'normalized-exact'
  | 'normalized-alias'
  | 'token'
  | 'fuzzy'

export type UnmatchedReason = 'unmatched_name' | 'unsupported_unit'

export interface FoodMatch {
  food: string              // canonical name
  kind: Exclude<MatchKind, 'unmatched'>
  strategy: MatchStrategy
  confidence: number        // 0..1
  matchedText: string       // canonical name or alias that was hit
}

export interface ResolvedContribution extends Nutrition {
  mention: MealMention
  food: string | null
  kind: MatchKind
  strategy: MatchStrategy | null
  confidence: number
  reason: UnmatchedReason | null
  basisAmount: number | null   // grams, milliliters or pieces of the matched food
}
