import type { AggregateSummary, DuplicateDate } from './AggregateSummary.ts'
import type { MissingFoodReport } from './MissingFoodReport.ts'
import type { EntryError, MentionWarning } from './PipelineIssue.ts'
import type { ResolvedEntry } from './ResolvedEntry.ts'
import type { RollingTdeeResult, TdeeResult } from './TdeeEstimate.ts'

export interface PipelineResult {
  entries: ResolvedEntry[]  // sorted by (date, source)
  errors: EntryError[]
  warnings: MentionWarning[]
  missingFoods: MissingFoodReport
}

export interface DiaryAnalysis extends PipelineResult {
  summary: AggregateSummary
  tdee: TdeeResult
  rollingTdee: RollingTdeeResult
  duplicates: DuplicateDate[]
}
