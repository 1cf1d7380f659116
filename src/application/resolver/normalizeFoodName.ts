/**
 * Fold text for comparison: strip diacritics, lower-case, collapse
 * punctuation and whitespace to single spaces.
 * "Frühstück" → "fruhstuck", "Uncle Ben's  Reis" → "uncle ben s reis".
 */
export function foldText(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/ß/g, 'ss')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
}

/** Normalized form of a food name, used as the missing-food key. */
export function normalizeFoodName(name: string): string {
  return foldText(name)
}

/**
 * Strip a basic English plural from the last word of a folded name.
 * Words that naturally end in 's' (e.g., "hummus", "asparagus", "couscous") are kept.
 */
export function singularize(folded: string): string {
  const words = folded.split(' ')
  let last = words[words.length - 1]

  const noStripSuffixes = ['ss', 'us', 'is']
  if (
    last.length > 3 &&
    last.endsWith('s') &&
    !noStripSuffixes.some((s) => last.endsWith(s))
  ) {
    // Handle "ies" -> "y" (e.g., "berries" -> "berry")
    if (last.endsWith('ies')) {
      last = last.slice(0, -3) + 'y'
    }
    // Handle "ves" -> "f" (e.g., "halves" -> "half")
    else if (last.endsWith('ves')) {
      last = last.slice(0, -3) + 'f'
    }
    // Handle "oes" -> "o" (e.g., "tomatoes" -> "tomato")
    else if (last.endsWith('oes')) {
      last = last.slice(0, -2)
    }
    // Handle "es" after ch, sh, x, z (e.g., "peaches" -> "peach")
    else if (
      last.endsWith('ches') || last.endsWith('shes') ||
      last.endsWith('xes') || last.endsWith('zes')
    ) {
      last = last.slice(0, -2)
    }
    // Default: strip trailing 's'
    else {
      last = last.slice(0, -1)
    }
  }

  words[words.length - 1] = last
  return words.join(' ')
}
