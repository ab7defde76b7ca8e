export type ZoneKind = 'pace' | 'heartRate'

/**
 * Pace values are seconds per km, heart-rate values are bpm.
 */
export type ZoneDefinition =
  | { type: 'fixed'; value: number }
  | { type: 'range'; low: number; high: number }
  | { type: 'percentage'; lowPct: number; highPct: number; base: string }
  | { type: 'distanceTime'; meters: number; seconds: number }

export type ZoneTable = Record<string, ZoneDefinition>

export type ZoneTables = {
  paces: ZoneTable
  heartRates: ZoneTable
}

export type Margins = {
  fasterSec: number // pace
  slowerSec: number // pace
  hrUpPct: number
  hrDownPct: number
}

export const NO_MARGINS: Margins = { fasterSec: 0, slowerSec: 0, hrUpPct: 0, hrDownPct: 0 }

export type ConcreteRange = {
  low: number
  high: number
}

export type ResolvedTarget = ConcreteRange & { kind: ZoneKind }
