export interface HeaderLine {
  key: string
  value: string
  line: number               // 1-based
}

export interface HeaderSplit {
  fields: HeaderLine[]
  bodyLines: string[]
  bodyStartLine: number      // 1-based line number of bodyLines[0]
}

const DELIMITER_PATTERN = /^[^\p{L}\p{N}\s]+$/u
const KEY_VALUE_PATTERN = /^([\p{L}][\p{L}\p{N} _-]*?)\s*:\s*(.*)$/u

function parseKeyValue(line: string, lineNumber: number): HeaderLine | null {
  const match = line.trim().match(KEY_VALUE_PATTERN)
  if (!match) return null
  const value = match[2].trim().replace(/^(["'])(.*)\1$/, '$2').trim()
  return { key: match[1].trim(), value, line: lineNumber }
}

/**
 * Split an entry into its header fields and the remaining body.
 *
 * Two header styles are accepted:
 * 1. A delimited block: the first non-blank line consists only of
 *    punctuation ("---", "⸻"), closed by the next such line.
 * 2. Leading "key: value" lines, ending at the first blank line or
 *    the first line that is not "key: value".
 */
export function splitHeader(text: string): HeaderSplit {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/)

  let start = 0
  while (start < lines.length && !lines[start].trim()) start++

  if (start < lines.length && DELIMITER_PATTERN.test(lines[start].trim())) {
    for (let end = start + 1; end < lines.length; end++) {
      const trimmed = lines[end].trim()
      if (!trimmed || !DELIMITER_PATTERN.test(trimmed)) continue

      const fields: HeaderLine[] = []
      for (let i = start + 1; i < end; i++) {
        const field = parseKeyValue(lines[i], i + 1)
        if (field) fields.push(field)
      }
      return { fields, bodyLines: lines.slice(end + 1), bodyStartLine: end + 2 }
    }
    // Unclosed delimiter: fall through and read key/value lines after it
    start++
  }

  const fields: HeaderLine[] = []
  let i = start
  for (; i < lines.length; i++) {
    if (!lines[i].trim()) break

    const field = parseKeyValue(lines[i], i + 1)
    // "Breakfast:" with nothing after it opens the body
    if (!field || !field.value) break
    fields.push(field)
  }

  return { fields, bodyLines: lines.slice(i), bodyStartLine: i + 1 }
}
