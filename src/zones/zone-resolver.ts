import { MalformedZoneExpressionError, UnresolvedZoneError } from '../common/planner-errors'
import type { ConcreteRange, Margins, ZoneDefinition, ZoneKind, ZoneTable, ZoneTables } from './zone.types'
import { NO_MARGINS } from './zone.types'

type CoreRange = ConcreteRange & {
  // single value (fixed, distance/time, or a single percentage of a point); margins apply
  point: boolean
}

/**
 * Resolves symbolic zones into concrete ranges for one plan.
 *
 * One instance serves one compile pass: results are memoised per (kind, zone id)
 * against the tables it was built with.
 */
export class ZoneResolver {
  private readonly cores = new Map<string, CoreRange>()
  private readonly resolved = new Map<string, ConcreteRange>()

  constructor(
    private readonly tables: ZoneTables,
    private readonly margins: Margins = NO_MARGINS,
  ) {}

  has(zone: string, kind: ZoneKind): boolean {
    return Object.prototype.hasOwnProperty.call(this.table(kind), zone)
  }

  resolve(zone: string, kind: ZoneKind): ConcreteRange {
    const key = `${kind}:${zone}`
    const cached = this.resolved.get(key)
    if (cached) return cached

    const range = this.finish(this.lookup(zone, kind, []), kind)
    this.resolved.set(key, range)
    return range
  }

  /** Resolve a literal written directly on a step (`@ 5:00`, `@hr 140-150`). */
  resolveDefinition(definition: ZoneDefinition, kind: ZoneKind): ConcreteRange {
    return this.finish(this.core(definition, kind, []), kind)
  }

  private table(kind: ZoneKind): ZoneTable {
    return kind === 'pace' ? this.tables.paces : this.tables.heartRates
  }

  private lookup(zone: string, kind: ZoneKind, chain: string[]): CoreRange {
    if (chain.includes(zone)) {
      const cycle = [...chain, zone]
      throw new UnresolvedZoneError(`Zone reference cycle: ${cycle.join(' -> ')}`, { zone, chain: cycle })
    }

    const key = `${kind}:${zone}`
    const cached = this.cores.get(key)
    if (cached) return cached

    const definition = this.has(zone, kind) ? this.table(kind)[zone] : undefined
    if (!definition) {
      throw new UnresolvedZoneError(
        `${kind === 'pace' ? 'Pace' : 'Heart rate'} zone '${zone}' is not defined`,
        chain.length > 0 ? { zone, chain: [...chain, zone] } : { zone },
      )
    }

    const core = this.core(definition, kind, [...chain, zone])
    this.cores.set(key, core)
    return core
  }

  private core(definition: ZoneDefinition, kind: ZoneKind, chain: string[]): CoreRange {
    switch (definition.type) {
      case 'fixed':
        return { low: definition.value, high: definition.value, point: true }
      case 'range':
        return { low: definition.low, high: definition.high, point: false }
      case 'distanceTime': {
        if (kind !== 'pace') {
          throw new MalformedZoneExpressionError('Distance/time zones only apply to paces', {
            zone: chain[chain.length - 1],
          })
        }
        const pace = definition.seconds / (definition.meters / 1000)
        return { low: pace, high: pace, point: true }
      }
      case 'percentage': {
        const base = this.lookup(definition.base, kind, chain)
        return {
          low: (base.low * definition.lowPct) / 100,
          high: (base.high * definition.highPct) / 100,
          point: base.point && definition.lowPct === definition.highPct,
        }
      }
    }
  }

  private finish(core: CoreRange, kind: ZoneKind): ConcreteRange {
    const low = Math.round(core.low)
    const high = Math.round(core.high)
    if (!core.point) return { low, high }

    if (kind === 'pace') {
      return {
        low: Math.max(1, low - this.margins.fasterSec),
        high: high + this.margins.slowerSec,
      }
    }

    return {
      low: Math.round(low * (1 - this.margins.hrDownPct / 100)),
      high: Math.round(high * (1 + this.margins.hrUpPct / 100)),
    }
  }
}
