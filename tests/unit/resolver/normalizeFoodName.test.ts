import { describe, it, expect } from 'vitest'
import { foldText, normalizeFoodName, singularize } from '@application/resolver/normalizeFoodName.ts'

describe('foldText', () => {
  it('lowercases and trims', () => {
    expect(foldText('  Chicken Breast  ')).toBe('chicken breast')
  })

  it('strips diacritics and folds sharp s', () => {
    expect(foldText('Frühstück')).toBe('fruhstuck')
    expect(foldText('Crème fraîche')).toBe('creme fraiche')
    expect(foldText('Weißbrot')).toBe('weissbrot')
  })

  it('collapses punctuation to single spaces', () => {
    expect(foldText("Uncle Ben's  Reis")).toBe('uncle ben s reis')
    expect(foldText('Skyr (natur), 0,2%')).toBe('skyr natur 0 2')
  })
})

describe('normalizeFoodName', () => {
  it('keys spelling variants together', () => {
    expect(normalizeFoodName('Müsli')).toBe(normalizeFoodName('musli'))
  })
})

describe('singularize', () => {
  it('strips trailing s for basic plurals', () => {
    expect(singularize('onions')).toBe('onion')
    expect(singularize('rolled oats')).toBe('rolled oat')
  })

  it('handles -ies -> -y', () => {
    expect(singularize('berries')).toBe('berry')
    expect(singularize('strawberries')).toBe('strawberry')
  })

  it('handles -oes -> -o', () => {
    expect(singularize('tomatoes')).toBe('tomato')
  })

  it('handles -ves -> -f', () => {
    expect(singularize('halves')).toBe('half')
  })

  it('handles -ches/-shes -> strip es', () => {
    expect(singularize('peaches')).toBe('peach')
  })

  it('preserves words naturally ending in s', () => {
    expect(singularize('hummus')).toBe('hummus')
    expect(singularize('couscous')).toBe('couscous')
    expect(singularize('reis')).toBe('reis')
  })

  it('preserves short words', () => {
    expect(singularize('eis')).toBe('eis')
    expect(singularize('oil')).toBe('oil')
  })
})
