import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import type { ReferenceDatabase } from '@domain/models/FoodReference.ts'
import { CANONICAL_UNITS } from '@domain/constants/units.ts'
import { InvalidReferenceDatabaseError } from '@domain/errors/InvalidReferenceDatabaseError.ts'

const amount = z.number().finite().nonnegative()

const foodProfileSchema = z.object({
  basis: z.enum(['g', 'ml', 'piece']).default('g'),
  calories: amount,
  proteinG: amount,
  fatG: amount,
  carbsG: amount,
  portions: z
    .record(z.string(), z.number().finite().positive())
    .default({})
    .superRefine((portions, ctx) => {
      for (const unit of Object.keys(portions)) {
        if (!CANONICAL_UNITS.has(unit)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [unit], message: `"${unit}" is not a known unit` })
        }
      }
    }),
})

const referenceDatabaseSchema = z
  .object({
    foods: z.record(z.string().min(1), foodProfileSchema),
    aliases: z.record(z.string(), z.array(z.string().trim().min(1))).default({}),
  })
  .superRefine((db, ctx) => {
    for (const food of Object.keys(db.aliases)) {
      if (!Object.hasOwn(db.foods, food)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['aliases', food], message: 'alias target is not a known food' })
      }
    }
  })

/**
 * Validate an untrusted value as a reference database.
 * Throws InvalidReferenceDatabaseError listing every offending path.
 */
export function validateReferenceDatabase(value: unknown): ReferenceDatabase {
  const result = referenceDatabaseSchema.safeParse(value)
  if (!result.success) {
    throw new InvalidReferenceDatabaseError(
      result.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return result.data
}

/** Read a reference database from a JSON file and validate it. */
export async function loadReferenceDatabase(filePath: string): Promise<ReferenceDatabase> {
  const text = await readFile(filePath, 'utf8')
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new InvalidReferenceDatabaseError([`${filePath}: not valid JSON (${reason})`])
  }
  return validateReferenceDatabase(value)
}
