import type { DailyEntry, RawEntry } from '@domain/models/DailyEntry.ts'
import type { MentionWarning } from '@domain/models/PipelineIssue.ts'
import { emptyMetrics } from '@domain/models/DailyEntry.ts'
import { HEADER_FIELDS, normalizeHeaderKey } from '@domain/constants/headerFields.ts'
import type { HeaderField } from '@domain/constants/headerFields.ts'
import { ParseError } from '@domain/errors/ParseError.ts'
import { findIsoDate, parseIsoDate } from '@application/calendar/weekUtils.ts'
import { splitHeader } from './parseHeader.ts'
import { parseMeasurement } from './parseMeasurement.ts'
import { parseMealSection } from './parseMealSection.ts'

export interface ParsedEntry {
  entry: DailyEntry
  warnings: MentionWarning[]
}

function lookupField(key: string): HeaderField | null {
  return Object.hasOwn(HEADER_FIELDS, key) ? HEADER_FIELDS[key] : null
}

function resolveDate(headerDate: string | null, source: string): string {
  if (headerDate !== null) {
    const date = parseIsoDate(headerDate)
    if (!date) {
      throw new ParseError(source, 'date', headerDate, `date is not a valid ISO date: "${headerDate}"`)
    }
    return date
  }

  const hinted = findIsoDate(source)
  if (!hinted) {
    throw new ParseError(source, 'date', null, 'no date in header or source')
  }
  return hinted
}

/**
 * Parse one raw diary day into a DailyEntry.
 *
 * Throws ParseError when the date is missing or invalid, or when a known
 * numeric header field cannot be read. Meal lines that cannot be read are
 * returned as warnings.
 */
export function parseEntry(raw: RawEntry): ParsedEntry {
  const { source } = raw
  const { fields, bodyLines, bodyStartLine } = splitHeader(raw.text)

  const metrics = emptyMetrics()
  const extensions: Record<string, string> = {}
  let headerDate: string | null = null
  let comment: string | null = null
  let headerStatus: string | null = null

  for (const { key, value } of fields) {
    const normalizedKey = normalizeHeaderKey(key)
    const field = lookupField(normalizedKey)

    if (field === null) {
      extensions[normalizedKey] = value
      continue
    }
    if (!value) continue

    switch (field) {
      case 'date':
        headerDate = value
        break
      case 'comment':
        comment = value
        break
      case 'status':
        headerStatus = value
        break
      default:
        metrics[field] = parseMeasurement(field, value, source)
    }
  }

  const date = resolveDate(headerDate, source)
  const section = parseMealSection(bodyLines, bodyStartLine, source)

  return {
    entry: {
      source,
      date,
      ...metrics,
      comment,
      status: headerStatus ?? section.status,
      extensions,
      mealItems: section.mentions,
    },
    warnings: section.warnings,
  }
}
