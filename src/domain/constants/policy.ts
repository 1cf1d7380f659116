/** Tunable numbers used by resolution and estimation. */
export interface EstimationPolicy {
  kcalPerKg: number          // energy stored in one kg of body mass
  fuzzyThreshold: number     // minimum name similarity for a fuzzy match, 0..1
  bulkOffsetKcal: number
  cutOffsetKcal: number
  tdeeWindowDays: number     // trailing window of the rolling estimate
  smoothingDays: number      // centered smoothing of the rolling estimate
}

export const DEFAULT_POLICY: Readonly<EstimationPolicy> = Object.freeze({
  kcalPerKg: 7700,
  fuzzyThreshold: 0.8,
  bulkOffsetKcal: 300,
  cutOffsetKcal: 500,
  tdeeWindowDays: 14,
  smoothingDays: 7,
})

/** Similarity assigned to a single-token match. */
export const TOKEN_MATCH_CONFIDENCE = 0.9
