import type { DateWindow } from '@domain/models/AggregateSummary.ts'
import type { RawEntry } from '@domain/models/DailyEntry.ts'
import type { Logger } from '@domain/models/Logger.ts'
import type { DiaryAnalysis, PipelineResult } from '@domain/models/PipelineResult.ts'
import { buildFoodIndex } from '@application/resolver/FoodIndex.ts'
import type { FoodIndex } from '@application/resolver/FoodIndex.ts'
import { runPipeline } from '@application/pipeline/runPipeline.ts'
import { analyzeDiary } from '@application/pipeline/analyzeDiary.ts'
import { loadConfig } from './config/env.ts'
import type { DiaryConfig } from './config/env.ts'
import { createLogger } from './logging/createLogger.ts'
import { validateReferenceDatabase } from './reference/validateReferenceDatabase.ts'

export interface DiaryServiceOptions {
  config?: DiaryConfig
  logger?: Logger
}

export interface DiaryService {
  readonly config: DiaryConfig
  readonly index: FoodIndex
  run(rawEntries: readonly RawEntry[], signal?: AbortSignal): PipelineResult
  analyze(rawEntries: readonly RawEntry[], window?: DateWindow, signal?: AbortSignal): DiaryAnalysis
}

/**
 * Wire configuration, logging and a validated reference database into a
 * reusable service. The food index is built once and shared by every run.
 */
export function createDiaryService(database: unknown, options: DiaryServiceOptions = {}): DiaryService {
  const config = options.config ?? loadConfig()
  const logger = options.logger ?? createLogger('diary', config.logLevel)
  const index = buildFoodIndex(validateReferenceDatabase(database))

  logger.debug(`Reference index ready: ${Object.keys(index.foods).length} foods`)

  return {
    config,
    index,
    run: (rawEntries, signal) =>
      runPipeline(rawEntries, index, { fuzzyThreshold: config.policy.fuzzyThreshold, signal, logger }),
    analyze: (rawEntries, window = {}, signal) =>
      analyzeDiary(rawEntries, index, { window, policy: config.policy, signal, logger }),
  }
}
