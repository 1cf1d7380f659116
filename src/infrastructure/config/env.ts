import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import type { EstimationPolicy } from '@domain/constants/policy.ts'
import { DEFAULT_POLICY } from '@domain/constants/policy.ts'
import type { LogLevel } from '@domain/models/Logger.ts'

const envSchema = z.object({
  DIARY_KCAL_PER_KG: z.coerce.number().positive().default(DEFAULT_POLICY.kcalPerKg),
  DIARY_FUZZY_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_POLICY.fuzzyThreshold),
  DIARY_BULK_OFFSET_KCAL: z.coerce.number().nonnegative().default(DEFAULT_POLICY.bulkOffsetKcal),
  DIARY_CUT_OFFSET_KCAL: z.coerce.number().nonnegative().default(DEFAULT_POLICY.cutOffsetKcal),
  DIARY_TDEE_WINDOW_DAYS: z.coerce.number().int().min(2).default(DEFAULT_POLICY.tdeeWindowDays),
  DIARY_TDEE_SMOOTHING_DAYS: z.coerce.number().int().min(1).default(DEFAULT_POLICY.smoothingDays),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

export interface DiaryConfig {
  policy: EstimationPolicy
  logLevel: LogLevel
}

/** process.env after merging a .env file from the working directory, if any. */
export function readProcessEnv(): NodeJS.ProcessEnv {
  loadDotenv()
  return process.env
}

/**
 * Read and validate configuration. Unset or empty variables take their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = readProcessEnv()): DiaryConfig {
  // Empty strings would coerce to 0
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''))
  const result = envSchema.safeParse(present)

  if (!result.success) {
    const details = result.error.errors.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid environment configuration:\n${details.join('\n')}`)
  }

  const parsed = result.data
  return {
    policy: {
      kcalPerKg: parsed.DIARY_KCAL_PER_KG,
      fuzzyThreshold: parsed.DIARY_FUZZY_THRESHOLD,
      bulkOffsetKcal: parsed.DIARY_BULK_OFFSET_KCAL,
      cutOffsetKcal: parsed.DIARY_CUT_OFFSET_KCAL,
      tdeeWindowDays: parsed.DIARY_TDEE_WINDOW_DAYS,
      smoothingDays: parsed.DIARY_TDEE_SMOOTHING_DAYS,
    },
    logLevel: parsed.LOG_LEVEL,
  }
}
