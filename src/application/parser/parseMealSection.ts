import type { MealMention } from '@domain/models/DailyEntry.ts'
import type { MentionWarning } from '@domain/models/PipelineIssue.ts'
import {
  MEAL_SECTION_WORDS,
  PROSE_SECTION_WORDS,
  STATUS_MAX_LENGTH,
  STATUS_SECTION_WORDS,
} from '@domain/constants/sections.ts'
import { foldText } from '@application/resolver/normalizeFoodName.ts'
import { isBulletLine, parseMealLine } from './parseMealLine.ts'

export interface MealSectionResult {
  mentions: MealMention[]
  warnings: MentionWarning[]
  status: string | null
}

type Section =
  | { kind: 'meal'; label: string | null }
  | { kind: 'status' }
  | { kind: 'prose' }

const KNOWN_WORDS = new Set([...MEAL_SECTION_WORDS, ...STATUS_SECTION_WORDS, ...PROSE_SECTION_WORDS])

/** Heading text of a line, or null when the line is not a heading. */
function readHeading(line: string): string | null {
  const trimmed = line.trim()

  const atx = trimmed.match(/^#{1,6}\s+(.+?)\s*#*$/)
  if (atx) return atx[1]

  const bold = trimmed.match(/^\*\*(.+?)\*\*:?$/)
  if (bold) return bold[1]

  // A plain line holding only a section word, e.g. "Frühstück" or "Status:"
  const folded = foldText(trimmed)
  if (folded && !folded.includes(' ') && KNOWN_WORDS.has(folded)) return trimmed

  return null
}

function classifyHeading(heading: string): Section {
  const words = foldText(heading).split(' ')
  if (words.some((w) => STATUS_SECTION_WORDS.includes(w))) return { kind: 'status' }
  if (words.some((w) => PROSE_SECTION_WORDS.includes(w))) return { kind: 'prose' }

  const label = heading.replace(/^[^\p{L}\p{N}]+/u, '').replace(/:$/, '').trim()
  return { kind: 'meal', label: label || null }
}

function truncateStatus(parts: string[]): string | null {
  const text = parts.join(' ').trim()
  if (!text) return null
  if (text.length <= STATUS_MAX_LENGTH) return text
  return text.slice(0, STATUS_MAX_LENGTH - 3) + '...'
}

/**
 * Walk the body of an entry and collect meal mentions.
 *
 * Lines before any heading belong to an unlabelled meal section. In meal
 * sections every list item or line starting with a number is a mention;
 * other lines count only when they end in a quantity with a known unit.
 * Lines under a Status/Agenda heading, up to the next blank line, become the
 * entry status.
 */
export function parseMealSection(lines: string[], firstLine: number, source: string): MealSectionResult {
  const mentions: MealMention[] = []
  const warnings: MentionWarning[] = []
  const statusParts: string[] = []

  let section: Section = { kind: 'meal', label: null }
  let statusOpen = false

  for (let offset = 0; offset < lines.length; offset++) {
    const lineNumber = firstLine + offset
    const trimmed = lines[offset].trim()

    if (!trimmed) {
      statusOpen = false
      continue
    }

    const heading = readHeading(trimmed)
    if (heading !== null) {
      section = classifyHeading(heading)
      statusOpen = section.kind === 'status' && statusParts.length === 0
      continue
    }

    if (section.kind === 'status') {
      if (statusOpen) statusParts.push(trimmed.replace(/^[-*•+]\s+/, ''))
      continue
    }
    if (section.kind === 'prose') continue

    const bullet = isBulletLine(trimmed)
    const leadingNumber = /^[-−]?[\d¼½¾⅓⅔⅛]/.test(trimmed)
    const result = parseMealLine(trimmed, { requireTrailingUnit: !bullet && !leadingNumber })

    if (result.status === 'ok') {
      mentions.push({
        raw: trimmed,
        line: lineNumber,
        name: result.name,
        quantity: result.quantity,
        unit: result.unit,
        meal: section.label,
        notes: result.notes,
      })
      continue
    }

    if (!bullet && !leadingNumber) continue

    if (result.status === 'negative_quantity') {
      warnings.push({
        source,
        line: lineNumber,
        raw: trimmed,
        reason: 'negative_quantity',
        message: `Quantity ${result.quantity} is negative`,
      })
    } else {
      warnings.push({
        source,
        line: lineNumber,
        raw: trimmed,
        reason: 'missing_quantity',
        message: 'No quantity found',
      })
    }
  }

  return { mentions, warnings, status: truncateStatus(statusParts) }
}
