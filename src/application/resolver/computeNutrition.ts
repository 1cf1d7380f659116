import type { FoodProfile } from '@domain/models/FoodReference.ts'
import type { Nutrition } from '@domain/models/Nutrition.ts'

/** Round to 2 decimal places. */
export function round2(value: number): number {
  return Math.round(value * 100) / 100
}

/**
 * Nutrition for an amount of food in its basis unit.
 * Gram and milliliter foods are stated per 100, piece foods per piece.
 */
export function computeNutrition(food: FoodProfile, basisAmount: number): Nutrition {
  const factor = food.basis === 'piece' ? basisAmount : basisAmount / 100
  return {
    calories: round2(food.calories * factor),
    proteinG: round2(food.proteinG * factor),
    fatG: round2(food.fatG * factor),
    carbsG: round2(food.carbsG * factor),
  }
}

/** Sum nutrition values, rounding the totals to 2 decimals. */
export function sumNutrition(items: Nutrition[]): Nutrition {
  const total = items.reduce(
    (acc, n) => ({
      calories: acc.calories + n.calories,
      proteinG: acc.proteinG + n.proteinG,
      fatG: acc.fatG + n.fatG,
      carbsG: acc.carbsG + n.carbsG,
    }),
    { calories: 0, proteinG: 0, fatG: 0, carbsG: 0 },
  )
  return {
    calories: round2(total.calories),
    proteinG: round2(total.proteinG),
    fatG: round2(total.fatG),
    carbsG: round2(total.carbsG),
  }
}
