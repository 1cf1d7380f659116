import type { DailyEntry, RawEntry } from '@domain/models/DailyEntry.ts'
import type { ReferenceDatabase } from '@domain/models/FoodReference.ts'
import type { Logger } from '@domain/models/Logger.ts'
import type { MissingFoodReport } from '@domain/models/MissingFoodReport.ts'
import type { Nutrition } from '@domain/models/Nutrition.ts'
import type { EntryError, MentionWarning } from '@domain/models/PipelineIssue.ts'
import type { PipelineResult } from '@domain/models/PipelineResult.ts'
import type { ResolvedContribution } from '@domain/models/Resolution.ts'
import type { ResolvedEntry } from '@domain/models/ResolvedEntry.ts'
import { SILENT_LOGGER } from '@domain/models/Logger.ts'
import { ParseError } from '@domain/errors/ParseError.ts'
import { sortByDate } from '@application/aggregation/selectEntries.ts'
import { parseEntry } from '@application/parser/parseEntry.ts'
import type { ParsedEntry } from '@application/parser/parseEntry.ts'
import { buildFoodIndex } from '@application/resolver/FoodIndex.ts'
import type { FoodIndex } from '@application/resolver/FoodIndex.ts'
import { sumNutrition } from '@application/resolver/computeNutrition.ts'
import { createMissingFoodReport } from '@application/resolver/missingFoodReport.ts'
import { resolveMention } from '@application/resolver/resolveMention.ts'

export interface PipelineOptions {
  fuzzyThreshold?: number
  signal?: AbortSignal
  logger?: Logger
}

function toEntryError(error: ParseError): EntryError {
  return { source: error.source, field: error.field, rawValue: error.rawValue, message: error.message }
}

function unsupportedUnitWarning(source: string, contribution: ResolvedContribution): MentionWarning {
  const { mention } = contribution
  return {
    source,
    line: mention.line,
    raw: mention.raw,
    reason: 'unsupported_unit',
    message: `Unit "${mention.unit ?? ''}" cannot be converted for ${contribution.food ?? mention.name}`,
  }
}

/**
 * Actual intake: the header value when written, otherwise what the meal
 * lines add up to, provided at least one of them resolved.
 */
function fillActuals(entry: DailyEntry, consumed: Nutrition, anyResolved: boolean): DailyEntry {
  const fallback = (value: number): number | null => (anyResolved ? value : null)
  return {
    ...entry,
    actualCalories: entry.actualCalories ?? fallback(consumed.calories),
    actualProteinG: entry.actualProteinG ?? fallback(consumed.proteinG),
    actualFatG: entry.actualFatG ?? fallback(consumed.fatG),
    actualCarbsG: entry.actualCarbsG ?? fallback(consumed.carbsG),
  }
}

function resolveEntry(
  entry: DailyEntry,
  index: FoodIndex,
  report: MissingFoodReport,
  warnings: MentionWarning[],
  fuzzyThreshold: number | undefined,
): ResolvedEntry {
  const context = { source: entry.source, date: entry.date }
  const contributions = entry.mealItems.map((mention) =>
    resolveMention(mention, index, report, context, { fuzzyThreshold }),
  )

  for (const contribution of contributions) {
    if (contribution.reason === 'unsupported_unit') warnings.push(unsupportedUnitWarning(entry.source, contribution))
  }

  const matched = contributions.filter((c) => c.reason === null)
  const consumed = sumNutrition(matched)

  return { ...fillActuals(entry, consumed, matched.length > 0), contributions, consumed }
}

/**
 * Parse and resolve a batch of raw diary entries.
 *
 * An entry that fails to parse is dropped and reported in `errors`; meal
 * lines that cannot be used are reported in `warnings`. Any other error
 * propagates. Entries come back sorted by date; entries sharing a date keep
 * their input order.
 */
export function runPipeline(
  rawEntries: readonly RawEntry[],
  database: ReferenceDatabase | FoodIndex,
  options: PipelineOptions = {},
): PipelineResult {
  const logger = options.logger ?? SILENT_LOGGER
  const index = 'exact' in database ? database : buildFoodIndex(database)
  const missingFoods = createMissingFoodReport()
  const entries: ResolvedEntry[] = []
  const errors: EntryError[] = []
  const warnings: MentionWarning[] = []

  for (const raw of rawEntries) {
    options.signal?.throwIfAborted()

    let parsed: ParsedEntry
    try {
      parsed = parseEntry(raw)
    } catch (err) {
      if (!(err instanceof ParseError)) throw err
      logger.warn(`Dropping entry: ${err.message}`)
      errors.push(toEntryError(err))
      continue
    }

    warnings.push(...parsed.warnings)
    entries.push(resolveEntry(parsed.entry, index, missingFoods, warnings, options.fuzzyThreshold))
  }

  const sorted = sortByDate(entries)

  const mentionCount = sorted.reduce((sum, e) => sum + e.contributions.length, 0)
  logger.info(
    `Processed ${rawEntries.length} entries: ${sorted.length} parsed, ${errors.length} dropped, ` +
      `${mentionCount} meal items, ${Object.keys(missingFoods.foods).length} missing foods`,
  )

  return { entries: sorted, errors, warnings, missingFoods }
}
