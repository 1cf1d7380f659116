import { describe, it, expect } from 'vitest'
import type { MealMention } from '@domain/models/DailyEntry.ts'
import { buildFoodIndex } from '@application/resolver/FoodIndex.ts'
import { resolveMention } from '@application/resolver/resolveMention.ts'
import {
  createMissingFoodReport,
  listMissingFoods,
  missingFoodCounts,
} from '@application/resolver/missingFoodReport.ts'
import { validateReferenceDatabase } from '@infrastructure/reference/validateReferenceDatabase.ts'
import foods from '../fixtures/foods.json'

const index = buildFoodIndex(validateReferenceDatabase(foods))
const context = { source: 'diary/2025-01-06.md', date: '2025-01-06' }

function makeMention(overrides: Partial<MealMention>): MealMention {
  return {
    raw: '- test',
    line: 1,
    name: 'test',
    quantity: 1,
    unit: null,
    meal: null,
    notes: null,
    ...overrides,
  }
}

describe('resolveMention', () => {
  it('computes nutrition for a matched food', () => {
    const report = createMissingFoodReport()
    const mention = makeMention({ raw: '- 200 ml milk', name: 'milk', quantity: 200, unit: 'ml' })

    const result = resolveMention(mention, index, report, context)

    expect(result).toEqual({
      mention,
      food: 'Milch',
      kind: 'alias',
      strategy: 'alias',
      confidence: 1,
      reason: null,
      basisAmount: 200,
      calories: 128,
      proteinG: 6.8,
      fatG: 7,
      carbsG: 9.6,
    })
    expect(report).toEqual({ foods: {}, unsupportedUnits: {} })
  })

  it('gives an alias the same contribution as the canonical name', () => {
    const report = createMissingFoodReport()
    const contribution = (name: string) => {
      const { food, basisAmount, calories, proteinG, fatG, carbsG } = resolveMention(
        makeMention({ raw: `- 50 g ${name}`, name, quantity: 50, unit: 'g' }),
        index,
        report,
        context,
      )
      return { food, basisAmount, calories, proteinG, fatG, carbsG }
    }

    expect(contribution('oats')).toEqual(contribution('Haferflocken'))
    expect(contribution('Haferflocken')).toEqual({
      food: 'Haferflocken',
      basisAmount: 50,
      calories: 185,
      proteinG: 6.75,
      fatG: 3.5,
      carbsG: 29.35,
    })
  })

  it('returns a zero contribution and records unmatched names', () => {
    const report = createMissingFoodReport()
    const mention = makeMention({ raw: '- 1 Schokoriegel', name: 'Schokoriegel' })

    const result = resolveMention(mention, index, report, context)

    expect(result).toMatchObject({
      food: null,
      kind: 'unmatched',
      strategy: null,
      confidence: 0,
      reason: 'unmatched_name',
      basisAmount: null,
      calories: 0,
      proteinG: 0,
      fatG: 0,
      carbsG: 0,
    })
    expect(report.foods).toEqual({
      schokoriegel: {
        key: 'schokoriegel',
        count: 1,
        names: ['Schokoriegel'],
        occurrences: [{ source: 'diary/2025-01-06.md', date: '2025-01-06', line: '- 1 Schokoriegel' }],
      },
    })
  })

  it('marks unconvertible units separately from unknown names', () => {
    const report = createMissingFoodReport()
    const mention = makeMention({ raw: '- 1 cup Reis', name: 'Reis', unit: 'cup' })

    const result = resolveMention(mention, index, report, context)

    expect(result).toMatchObject({ food: 'Reis', kind: 'unmatched', reason: 'unsupported_unit', calories: 0 })
    expect(report.foods).toEqual({})
    expect(report.unsupportedUnits['Reis|cup']).toMatchObject({ count: 1, names: ['cup'] })
  })
})

describe('missing food report', () => {
  it('counts repeated names under one normalized key', () => {
    const report = createMissingFoodReport()
    for (const name of ['Schokoriegel', 'schokoriegel', 'Müsliriegel', 'Schokoriegel']) {
      resolveMention(makeMention({ raw: `- 1 ${name}`, name }), index, report, context)
    }

    expect(listMissingFoods(report.foods).map((item) => [item.key, item.count, item.names])).toEqual([
      ['schokoriegel', 3, ['Schokoriegel', 'schokoriegel']],
      ['musliriegel', 1, ['Müsliriegel']],
    ])
    expect(missingFoodCounts(report)).toEqual({ schokoriegel: 3, musliriegel: 1 })
  })

  it('keeps separate reports for separate runs', () => {
    const first = createMissingFoodReport()
    const second = createMissingFoodReport()
    resolveMention(makeMention({ name: 'Schokoriegel' }), index, first, context)

    expect(Object.keys(first.foods)).toEqual(['schokoriegel'])
    expect(second.foods).toEqual({})
  })
})
