const DAY_MS = 24 * 60 * 60 * 1000

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/

/**
 * Validate an ISO calendar date and return it as YYYY-MM-DD.
 * A trailing time part ("2025-01-03T07:30") is dropped.
 * Returns null for anything else, including impossible dates like 2025-02-30.
 */
export function parseIsoDate(text: string): string | null {
  const match = text.trim().match(ISO_DATE_PATTERN)
  if (!match) return null

  const [year, month, day] = [match[1], match[2], match[3]].map(Number)
  const d = new Date(Date.UTC(year, month - 1, day))
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null
  }
  return formatDate(d)
}

/** First YYYY-MM-DD found anywhere in a string (file names, paths). */
export function findIsoDate(text: string): string | null {
  for (const match of text.matchAll(/\d{4}-\d{2}-\d{2}/g)) {
    const date = parseIsoDate(match[0])
    if (date) return date
  }
  return null
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseDate(to).getTime() - parseDate(from).getTime()) / DAY_MS)
}

/**
 * Offset a date string by N days (+/-).
 */
export function addDays(date: string, days: number): string {
  const d = parseDate(date)
  d.setUTCDate(d.getUTCDate() + days)
  return formatDate(d)
}

/**
 * Get the Monday (start of week) for a given date.
 * Returns YYYY-MM-DD string.
 */
export function getWeekStart(date: string): string {
  const d = parseDate(date)
  const day = d.getUTCDay() // 0=Sun, 1=Mon, ...
  const diff = day === 0 ? -6 : 1 - day
  d.setUTCDate(d.getUTCDate() + diff)
  return formatDate(d)
}

function formatDate(d: Date): string {
  const year = d.getUTCFullYear()
  const month = String(d.getUTCMonth() + 1).padStart(2, '0')
  const day = String(d.getUTCDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

function parseDate(dateStr: string): Date {
  const [year, month, day] = dateStr.split('-').map(Number)
  return new Date(Date.UTC(year, month - 1, day))
}
