import { describe, it, expect } from 'vitest'
import { loadConfig } from '@infrastructure/config/env.ts'

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      policy: {
        kcalPerKg: 7700,
        fuzzyThreshold: 0.8,
        bulkOffsetKcal: 300,
        cutOffsetKcal: 500,
        tdeeWindowDays: 14,
        smoothingDays: 7,
      },
      logLevel: 'info',
    })
  })

  it('reads numeric overrides from strings', () => {
    const config = loadConfig({
      DIARY_KCAL_PER_KG: '7000',
      DIARY_FUZZY_THRESHOLD: '0.9',
      DIARY_TDEE_WINDOW_DAYS: '21',
      LOG_LEVEL: 'debug',
    })

    expect(config.policy.kcalPerKg).toBe(7000)
    expect(config.policy.fuzzyThreshold).toBe(0.9)
    expect(config.policy.tdeeWindowDays).toBe(21)
    expect(config.logLevel).toBe('debug')
  })

  it('treats empty variables as unset', () => {
    expect(loadConfig({ DIARY_CUT_OFFSET_KCAL: '' }).policy.cutOffsetKcal).toBe(500)
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({ DIARY_FUZZY_THRESHOLD: '1.5' })).toThrow(/DIARY_FUZZY_THRESHOLD/)
    expect(() => loadConfig({ DIARY_KCAL_PER_KG: 'lots' })).toThrow(/DIARY_KCAL_PER_KG/)
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/)
  })
})
