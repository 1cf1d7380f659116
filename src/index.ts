export type { DailyEntry, EntryMetrics, MealMention, MetricField, RawEntry } from './domain/models/DailyEntry.ts'
export { METRIC_FIELDS } from './domain/models/DailyEntry.ts'
export type { FoodBasis, FoodProfile, ReferenceDatabase } from './domain/models/FoodReference.ts'
export type { Nutrition } from './domain/models/Nutrition.ts'
export type { FoodMatch, MatchKind, MatchStrategy, ResolvedContribution, UnmatchedReason } from './domain/models/Resolution.ts'
export type { MissingFoodItem, MissingFoodOccurrence, MissingFoodReport } from './domain/models/MissingFoodReport.ts'
export type { ResolvedEntry } from './domain/models/ResolvedEntry.ts'
export type {
  AggregateSummary,
  DateWindow,
  DuplicateDate,
  MetricStats,
  MovingAveragePoint,
  WeeklySummary,
} from './domain/models/AggregateSummary.ts'
export type {
  InsufficientDataReason,
  RollingTdeePoint,
  RollingTdeeResult,
  TdeeEstimate,
  TdeeRecommendation,
  TdeeRecommendations,
  TdeeResult,
} from './domain/models/TdeeEstimate.ts'
export type { EntryError, MentionWarning, MentionWarningReason } from './domain/models/PipelineIssue.ts'
export type { DiaryAnalysis, PipelineResult } from './domain/models/PipelineResult.ts'
export type { LogLevel, Logger } from './domain/models/Logger.ts'
export type { EstimationPolicy } from './domain/constants/policy.ts'
export { DEFAULT_POLICY } from './domain/constants/policy.ts'
export { ParseError } from './domain/errors/ParseError.ts'
export { InvalidReferenceDatabaseError } from './domain/errors/InvalidReferenceDatabaseError.ts'

export { parseEntry } from './application/parser/parseEntry.ts'
export type { ParsedEntry } from './application/parser/parseEntry.ts'
export { buildFoodIndex } from './application/resolver/FoodIndex.ts'
export type { FoodIndex } from './application/resolver/FoodIndex.ts'
export { matchFood } from './application/resolver/matchFood.ts'
export { resolveMention } from './application/resolver/resolveMention.ts'
export {
  createMissingFoodReport,
  listMissingFoods,
  missingFoodCounts,
} from './application/resolver/missingFoodReport.ts'
export { aggregateEntries } from './application/aggregation/aggregateEntries.ts'
export { summarizeByWeek } from './application/aggregation/summarizeByWeek.ts'
export { movingAverage } from './application/aggregation/movingAverage.ts'
export { estimateTdee, recommendFrom } from './application/tdee/estimateTdee.ts'
export { estimateRollingTdee } from './application/tdee/estimateRollingTdee.ts'
export { runPipeline } from './application/pipeline/runPipeline.ts'
export type { PipelineOptions } from './application/pipeline/runPipeline.ts'
export { analyzeDiary } from './application/pipeline/analyzeDiary.ts'
export type { AnalyzeOptions } from './application/pipeline/analyzeDiary.ts'

export { loadConfig } from './infrastructure/config/env.ts'
export type { DiaryConfig } from './infrastructure/config/env.ts'
export { createLogger } from './infrastructure/logging/createLogger.ts'
export {
  loadReferenceDatabase,
  validateReferenceDatabase,
} from './infrastructure/reference/validateReferenceDatabase.ts'
export { createDiaryService } from './infrastructure/diaryService.ts'
export type { DiaryService, DiaryServiceOptions } from './infrastructure/diaryService.ts'
