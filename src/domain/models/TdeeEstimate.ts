export interface TdeeRecommendation {
  offset: number            // kcal/day relative to the estimate
  calories: number          // rounded kcal/day
}

export interface TdeeRecommendations {
  bulk: TdeeRecommendation
  cut: TdeeRecommendation
}

export interface TdeeEstimate {
  windowStart: string       // date of the first weight observation
  windowEnd: string         // date of the last weight observation
  days: number
  firstWeightKg: number
  lastWeightKg: number
  weightDeltaKg: number
  energyDeltaKcal: number
  kcalPerKg: number
  meanActualCalories: number
  calorieDays: number
  tdee: number
  recommendations: TdeeRecommendations
}

export type InsufficientDataReason =
  | 'fewer_than_two_weights'
  | 'no_elapsed_days'
  | 'no_calorie_data'

export type TdeeResult =
  | { status: 'ok'; estimate: TdeeEstimate }
  | { status: 'insufficient_data'; reason: InsufficientDataReason; weightCount: number; calorieDays: number }

export interface RollingTdeePoint extends TdeeEstimate {
  date: string              // last day of the trailing window
  smoothed: number
}

export type RollingTdeeResult =
  | {
      status: 'ok'
      points: RollingTdeePoint[]
      mean: number
      median: number
      recommendations: TdeeRecommendations   // around the mean of the point estimates
    }
  | { status: 'insufficient_data'; reason: 'no_estimates' }
