import type { Nutrition } from './Nutrition.ts'

/**
 * What a food's nutrition values are stated per:
 * 100 g, 100 ml, or one piece.
 */
export type FoodBasis = 'g' | 'ml' | 'piece'

export interface FoodProfile extends Nutrition {
  basis: FoodBasis
  portions: Record<string, number>   // canonical unit → amount in basis units, e.g. { slice: 30 }
}

export interface ReferenceDatabase {
  foods: Record<string, FoodProfile>   // canonical name → profile
  aliases: Record<string, string[]>    // canonical name → alternate names
}
