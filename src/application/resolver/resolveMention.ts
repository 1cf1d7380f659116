import type { MealMention } from '@domain/models/DailyEntry.ts'
import type { MissingFoodReport } from '@domain/models/MissingFoodReport.ts'
import type { ResolvedContribution } from '@domain/models/Resolution.ts'
import { ZERO_NUTRITION } from '@domain/models/Nutrition.ts'
import type { FoodIndex } from './FoodIndex.ts'
import { matchFood } from './matchFood.ts'
import type { MatchOptions } from './matchFood.ts'
import { convertToBasis } from './convertToBasis.ts'
import { computeNutrition } from './computeNutrition.ts'
import { normalizeFoodName } from './normalizeFoodName.ts'
import { recordMissingFood, recordUnsupportedUnit } from './missingFoodReport.ts'

export interface MentionContext {
  source: string
  date: string
}

/**
 * Resolve one meal mention against the food index.
 *
 * Unmatched names and unconvertible units yield a zero contribution and are
 * recorded in the run's report.
 */
export function resolveMention(
  mention: MealMention,
  index: FoodIndex,
  report: MissingFoodReport,
  context: MentionContext,
  options: MatchOptions = {},
): ResolvedContribution {
  const occurrence = { source: context.source, date: context.date, line: mention.raw }
  const match = matchFood(mention.name, index, options)

  if (!match) {
    recordMissingFood(report, normalizeFoodName(mention.name), mention.name, occurrence)
    return {
      mention,
      food: null,
      kind: 'unmatched',
      strategy: null,
      confidence: 0,
      reason: 'unmatched_name',
      basisAmount: null,
      ...ZERO_NUTRITION,
    }
  }

  const food = index.foods[match.food]
  const conversion = convertToBasis(mention.quantity, mention.unit, food)

  if (conversion.status === 'unsupported_unit') {
    recordUnsupportedUnit(report, match.food, conversion.unit, occurrence)
    return {
      mention,
      food: match.food,
      kind: 'unmatched',
      strategy: match.strategy,
      confidence: match.confidence,
      reason: 'unsupported_unit',
      basisAmount: null,
      ...ZERO_NUTRITION,
    }
  }

  return {
    mention,
    food: match.food,
    kind: match.kind,
    strategy: match.strategy,
    confidence: match.confidence,
    reason: null,
    basisAmount: conversion.amount,
    ...computeNutrition(food, conversion.amount),
  }
}
