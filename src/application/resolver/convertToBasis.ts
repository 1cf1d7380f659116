import type { FoodProfile } from '@domain/models/FoodReference.ts'
import { VOLUME_TO_ML, WEIGHT_TO_G, canonicalUnit, isVolumeUnit, isWeightUnit } from '@domain/constants/units.ts'

export type BasisConversion =
  | { status: 'ok'; amount: number; unit: string }
  | { status: 'unsupported_unit'; unit: string }

function portionOf(food: FoodProfile, unit: string): number | null {
  return Object.hasOwn(food.portions, unit) ? food.portions[unit] : null
}

/**
 * Convert a written quantity to the food's basis: grams, milliliters or pieces.
 *
 * Order:
 * 1. No unit: one piece per count when the food knows pieces, else the basis unit
 * 2. The food's own portion sizes (slice, cup, scoop, ...)
 * 3. Mass units for gram-based foods, volume units for milliliter-based foods
 * 4. "piece" for piece-based foods
 */
export function convertToBasis(quantity: number, unit: string | null, food: FoodProfile): BasisConversion {
  if (unit === null) {
    const piece = portionOf(food, 'piece')
    if (piece !== null) return { status: 'ok', amount: quantity * piece, unit: 'piece' }
    return { status: 'ok', amount: quantity, unit: food.basis }
  }

  const canonical = canonicalUnit(unit)
  if (canonical === null) return { status: 'unsupported_unit', unit }

  const portion = portionOf(food, canonical)
  if (portion !== null) return { status: 'ok', amount: quantity * portion, unit: canonical }

  if (food.basis === 'g' && isWeightUnit(canonical)) {
    return { status: 'ok', amount: quantity * WEIGHT_TO_G[canonical], unit: canonical }
  }
  if (food.basis === 'ml' && isVolumeUnit(canonical)) {
    return { status: 'ok', amount: quantity * VOLUME_TO_ML[canonical], unit: canonical }
  }
  if (food.basis === 'piece' && canonical === 'piece') {
    return { status: 'ok', amount: quantity, unit: canonical }
  }

  return { status: 'unsupported_unit', unit }
}
