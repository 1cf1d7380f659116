export interface ParentheticalResult {
  text: string
  notes: string[]
}

/**
 * Extract parenthetical and bracketed remarks from a meal line,
 * e.g. "2 Eier (gekocht)" → text "2 Eier", notes ["gekocht"].
 */
export function parseParenthetical(text: string): ParentheticalResult {
  const notes: string[] = []
  let cleaned = text

  for (const match of text.matchAll(/\(([^)]*)\)|\[([^\]]*)\]/g)) {
    const content = (match[1] ?? match[2] ?? '').trim()
    if (content) notes.push(content)
    cleaned = cleaned.replace(match[0], ' ')
  }

  cleaned = cleaned.replace(/\s{2,}/g, ' ').trim()

  return { text: cleaned, notes }
}
