/** Energy and macronutrients; grams for macros, kcal for energy. */
export interface Nutrition {
  calories: number
  proteinG: number
  fatG: number
  carbsG: number
}

export const ZERO_NUTRITION: Readonly<Nutrition> = Object.freeze({
  calories: 0,
  proteinG: 0,
  fatG: 0,
  carbsG: 0,
})
