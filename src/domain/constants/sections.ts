/** Heading words that open a meal section (matched after normalization). */
export const MEAL_SECTION_WORDS = [
  'breakfast',
  'lunch',
  'dinner',
  'supper',
  'snack',
  'snacks',
  'meals',
  'food',
  'fruhstuck',
  'mittagessen',
  'abendessen',
  'zwischenmahlzeit',
  'mahlzeiten',
  'essen',
]

/** Heading words whose lines are collected into the entry status. */
export const STATUS_SECTION_WORDS = ['status', 'agenda']

/** Heading words for prose sections that never contain meal lines. */
export const PROSE_SECTION_WORDS = [
  'notes',
  'notizen',
  'comment',
  'comments',
  'kommentar',
  'training',
  'workout',
  'sport',
]

export const STATUS_MAX_LENGTH = 120
