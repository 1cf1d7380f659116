/** Maps unit spellings found in diaries (English and German) to a canonical form. */
export const UNIT_MAP: Record<string, string> = {
  // Gram
  gram: 'gram',
  grams: 'gram',
  gramm: 'gram',
  gr: 'gram',
  g: 'gram',
  gm: 'gram',

  // Kilogram
  kilogram: 'kilogram',
  kilograms: 'kilogram',
  kilogramm: 'kilogram',
  kg: 'kilogram',
  kgs: 'kilogram',

  // Milligram
  milligram: 'milligram',
  milligrams: 'milligram',
  milligramm: 'milligram',
  mg: 'milligram',

  // Ounce (weight)
  ounce: 'ounce',
  ounces: 'ounce',
  oz: 'ounce',

  // Pound
  pound: 'pound',
  pounds: 'pound',
  lb: 'pound',
  lbs: 'pound',

  // Milliliter
  milliliter: 'milliliter',
  milliliters: 'milliliter',
  millilitre: 'milliliter',
  millilitres: 'milliliter',
  ml: 'milliliter',
  mls: 'milliliter',

  // Centiliter / deciliter
  cl: 'centiliter',
  centiliter: 'centiliter',
  dl: 'deciliter',
  deciliter: 'deciliter',

  // Liter
  liter: 'liter',
  liters: 'liter',
  litre: 'liter',
  litres: 'liter',
  l: 'liter',

  // Teaspoon
  teaspoon: 'teaspoon',
  teaspoons: 'teaspoon',
  tsp: 'teaspoon',
  tl: 'teaspoon',
  teelöffel: 'teaspoon',

  // Tablespoon
  tablespoon: 'tablespoon',
  tablespoons: 'tablespoon',
  tbsp: 'tablespoon',
  tbs: 'tablespoon',
  el: 'tablespoon',
  esslöffel: 'tablespoon',

  // Cup
  cup: 'cup',
  cups: 'cup',
  tasse: 'cup',
  tassen: 'cup',

  // Fluid ounce
  'fluid ounce': 'fluid ounce',
  'fluid ounces': 'fluid ounce',
  'fl oz': 'fluid ounce',
  floz: 'fluid ounce',

  // Piece/count
  piece: 'piece',
  pieces: 'piece',
  pc: 'piece',
  pcs: 'piece',
  stk: 'piece',
  stück: 'piece',
  stueck: 'piece',
  x: 'piece',

  // Household portions
  slice: 'slice',
  slices: 'slice',
  scheibe: 'slice',
  scheiben: 'slice',
  scoop: 'scoop',
  scoops: 'scoop',
  messlöffel: 'scoop',
  serving: 'serving',
  servings: 'serving',
  portion: 'serving',
  portionen: 'serving',
  handful: 'handful',
  handfuls: 'handful',
  handvoll: 'handful',
  pinch: 'pinch',
  prise: 'pinch',
  can: 'can',
  cans: 'can',
  dose: 'can',
  bottle: 'bottle',
  bottles: 'bottle',
  flasche: 'bottle',
  glass: 'glass',
  glasses: 'glass',
  glas: 'glass',
  becher: 'tub',
  tub: 'tub',
  tubs: 'tub',
  bar: 'bar',
  bars: 'bar',
  riegel: 'bar',
}

/** Set of all canonical unit names for quick lookup. */
export const CANONICAL_UNITS = new Set(Object.values(UNIT_MAP))

/** Volume conversions to milliliters (base unit). */
export const VOLUME_TO_ML: Record<string, number> = {
  milliliter: 1,
  centiliter: 10,
  deciliter: 100,
  liter: 1000,
  teaspoon: 5,
  tablespoon: 15,
  cup: 240,
  'fluid ounce': 29.5735,
}

/** Weight conversions to grams (base unit). */
export const WEIGHT_TO_G: Record<string, number> = {
  milligram: 0.001,
  gram: 1,
  kilogram: 1000,
  ounce: 28.3495,
  pound: 453.592,
}

/** Check if a canonical unit is a volume unit. */
export function isVolumeUnit(unit: string): boolean {
  return Object.hasOwn(VOLUME_TO_ML, unit)
}

/** Check if a canonical unit is a weight unit. */
export function isWeightUnit(unit: string): boolean {
  return Object.hasOwn(WEIGHT_TO_G, unit)
}

/** Canonicalize a unit as written, or null when the spelling is unknown. */
export function canonicalUnit(written: string): string | null {
  const key = written.trim().toLowerCase().replace(/\.$/, '')
  return Object.hasOwn(UNIT_MAP, key) ? UNIT_MAP[key] : null
}
