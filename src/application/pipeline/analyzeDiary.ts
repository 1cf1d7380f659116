import type { DateWindow } from '@domain/models/AggregateSummary.ts'
import type { RawEntry } from '@domain/models/DailyEntry.ts'
import type { ReferenceDatabase } from '@domain/models/FoodReference.ts'
import type { DiaryAnalysis } from '@domain/models/PipelineResult.ts'
import type { EstimationPolicy } from '@domain/constants/policy.ts'
import { aggregateEntries } from '@application/aggregation/aggregateEntries.ts'
import { isWithinWindow } from '@application/aggregation/selectEntries.ts'
import type { FoodIndex } from '@application/resolver/FoodIndex.ts'
import { estimateRollingTdee } from '@application/tdee/estimateRollingTdee.ts'
import { estimateTdee } from '@application/tdee/estimateTdee.ts'
import { runPipeline } from './runPipeline.ts'
import type { PipelineOptions } from './runPipeline.ts'

export interface AnalyzeOptions extends Omit<PipelineOptions, 'fuzzyThreshold'> {
  window?: DateWindow
  policy?: Partial<EstimationPolicy>
}

/** Run the pipeline, then summarize and estimate TDEE over the window. */
export function analyzeDiary(
  rawEntries: readonly RawEntry[],
  database: ReferenceDatabase | FoodIndex,
  options: AnalyzeOptions = {},
): DiaryAnalysis {
  const { window = {}, policy = {}, ...pipelineOptions } = options
  const result = runPipeline(rawEntries, database, { ...pipelineOptions, fuzzyThreshold: policy.fuzzyThreshold })

  const summary = aggregateEntries(result.entries, window)
  const inWindow = result.entries.filter((entry) => isWithinWindow(entry.date, window))

  return {
    ...result,
    summary,
    tdee: estimateTdee(result.entries, window, policy),
    rollingTdee: estimateRollingTdee(inWindow, policy),
    duplicates: summary.duplicates,
  }
}
