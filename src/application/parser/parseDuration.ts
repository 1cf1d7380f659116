/**
 * Parse a duration such as a night's sleep to minutes.
 *
 * Handles formats like:
 * - "7:30" (H:MM)
 * - "7h 30min", "7 h 30", "7h30"
 * - "7.5 h", "7,5 Std", "450 min"
 * - "7.5" (bare numbers use `bareUnit`, hours by default)
 *
 * Returns null if parsing fails.
 */
export function parseDuration(text: string, bareUnit: 'hours' | 'minutes' = 'hours'): number | null {
  if (!text || !text.trim()) return null

  const input = text.trim().toLowerCase().replace(/(\d),(\d)/g, '$1.$2')

  const clock = input.match(/^(\d{1,2}):(\d{2})$/)
  if (clock) {
    const minutes = parseInt(clock[2], 10)
    if (minutes >= 60) return null
    return parseInt(clock[1], 10) * 60 + minutes
  }

  const compact = input.match(/^(\d+)\s*h\s*(\d{1,2})$/)
  if (compact) {
    const minutes = parseInt(compact[2], 10)
    if (minutes >= 60) return null
    return parseInt(compact[1], 10) * 60 + minutes
  }

  const bare = input.match(/^\d+(?:\.\d+)?$/)
  if (bare) {
    const value = parseFloat(input)
    return Math.round(bareUnit === 'hours' ? value * 60 : value)
  }

  let totalMinutes = 0
  let consumed = input

  // Hours component: "7 hours", "7h", "7.5 std"
  const hoursMatch = consumed.match(/(\d+(?:\.\d+)?)\s*(?:hours?|hrs?|h|std\.?|stunden?)(?![a-z])/)
  if (hoursMatch) {
    totalMinutes += parseFloat(hoursMatch[1]) * 60
    consumed = consumed.replace(hoursMatch[0], ' ')
  }

  // Minutes component: "30 minutes", "30 min", "30m"
  const minsMatch = consumed.match(/(\d+(?:\.\d+)?)\s*(?:minutes?|mins?|minuten|m)(?![a-z])/)
  if (minsMatch) {
    totalMinutes += parseFloat(minsMatch[1])
    consumed = consumed.replace(minsMatch[0], ' ')
  }

  // Anything left besides separators means the text was not a duration
  if (!hoursMatch && !minsMatch) return null
  if (consumed.replace(/[\s,]|and|und/g, '') !== '') return null

  return Math.round(totalMinutes)
}
