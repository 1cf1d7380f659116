import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'node:url'
import {
  loadReferenceDatabase,
  validateReferenceDatabase,
} from '@infrastructure/reference/validateReferenceDatabase.ts'
import { InvalidReferenceDatabaseError } from '@domain/errors/InvalidReferenceDatabaseError.ts'

function issuesOf(value: unknown): string[] {
  try {
    validateReferenceDatabase(value)
  } catch (err) {
    if (err instanceof InvalidReferenceDatabaseError) return err.issues
    throw err
  }
  return []
}

describe('validateReferenceDatabase', () => {
  it('fills in defaults', () => {
    const db = validateReferenceDatabase({ foods: { Reis: { calories: 350, proteinG: 7, fatG: 0.6, carbsG: 78 } } })

    expect(db).toEqual({
      foods: { Reis: { basis: 'g', calories: 350, proteinG: 7, fatG: 0.6, carbsG: 78, portions: {} } },
      aliases: {},
    })
  })

  it('rejects unknown portion units', () => {
    const issues = issuesOf({
      foods: { Reis: { calories: 350, proteinG: 7, fatG: 0.6, carbsG: 78, portions: { bucket: 500 } } },
    })

    expect(issues).toEqual(['foods.Reis.portions.bucket: "bucket" is not a known unit'])
  })

  it('rejects aliases of unknown foods', () => {
    const issues = issuesOf({
      foods: { Reis: { calories: 350, proteinG: 7, fatG: 0.6, carbsG: 78 } },
      aliases: { Nudeln: ['pasta'] },
    })

    expect(issues).toEqual(['aliases.Nudeln: alias target is not a known food'])
  })

  it('rejects negative or missing nutrition values', () => {
    const issues = issuesOf({ foods: { Reis: { calories: -1, proteinG: 7, fatG: 0.6 } } })

    expect(issues).toHaveLength(2)
    expect(issues[0].startsWith('foods.Reis.calories: ')).toBe(true)
    expect(issues[1].startsWith('foods.Reis.carbsG: ')).toBe(true)
  })

  it('rejects a value that is not an object', () => {
    expect(() => validateReferenceDatabase('foods')).toThrow(InvalidReferenceDatabaseError)
  })
})

describe('loadReferenceDatabase', () => {
  it('reads and validates a JSON file', async () => {
    const db = await loadReferenceDatabase(fileURLToPath(new URL('../fixtures/foods.json', import.meta.url)))

    expect(Object.keys(db.foods)).toHaveLength(8)
    expect(db.aliases.Milch).toEqual(['milk', 'Vollmilch'])
  })
})
