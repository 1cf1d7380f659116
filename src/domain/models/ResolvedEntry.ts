import type { DailyEntry } from './DailyEntry.ts'
import type { Nutrition } from './Nutrition.ts'
import type { ResolvedContribution } from './Resolution.ts'

export interface ResolvedEntry extends DailyEntry {
  contributions: ResolvedContribution[]
  consumed: Nutrition       // summed over matched contributions
}
