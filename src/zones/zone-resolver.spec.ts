import { MalformedZoneExpressionError, UnresolvedZoneError } from '../common/planner-errors'
import { formatPace } from '../utils/units'
import { isZoneLiteral, parseZoneExpression } from './zone-expression'
import { ZoneResolver } from './zone-resolver'
import type { ZoneTables } from './zone.types'

const tables = (paces: Record<string, string>, heartRates: Record<string, string | number> = {}): ZoneTables => ({
  paces: Object.fromEntries(Object.entries(paces).map(([k, v]) => [k, parseZoneExpression(v, 'pace')])),
  heartRates: Object.fromEntries(Object.entries(heartRates).map(([k, v]) => [k, parseZoneExpression(v, 'heartRate')])),
})

describe('parseZoneExpression', () => {
  it('parses pace forms', () => {
    expect(parseZoneExpression('5:30', 'pace')).toEqual({ type: 'fixed', value: 330 })
    expect(parseZoneExpression('5:10-4:50', 'pace')).toEqual({ type: 'range', low: 290, high: 310 })
    expect(parseZoneExpression('95-85% marathon', 'pace')).toEqual({
      type: 'percentage',
      lowPct: 85,
      highPct: 95,
      base: 'marathon',
    })
    expect(parseZoneExpression('10km in 40:00', 'pace')).toEqual({ type: 'distanceTime', meters: 10000, seconds: 2400 })
  })

  it('parses heart rate forms', () => {
    expect(parseZoneExpression(150, 'heartRate')).toEqual({ type: 'fixed', value: 150 })
    expect(parseZoneExpression('140-150', 'heartRate')).toEqual({ type: 'range', low: 140, high: 150 })
  })

  it('rejects malformed values', () => {
    expect(() => parseZoneExpression('5:75', 'pace')).toThrow(MalformedZoneExpressionError)
    expect(() => parseZoneExpression('fast', 'pace')).toThrow(MalformedZoneExpressionError)
    expect(() => parseZoneExpression(330, 'pace')).toThrow(MalformedZoneExpressionError)
    expect(() => parseZoneExpression('10km in soon', 'pace')).toThrow(MalformedZoneExpressionError)
    expect(() => parseZoneExpression('5:00', 'heartRate')).toThrow(MalformedZoneExpressionError)
  })

  it('tells literals from identifiers', () => {
    expect(isZoneLiteral('5:00')).toBe(true)
    expect(isZoneLiteral('marathon')).toBe(false)
  })
})

describe('ZoneResolver', () => {
  it('resolves a percentage of a fixed base', () => {
    const resolver = new ZoneResolver(tables({ marathon: '5:30', tempo: '90% marathon' }))

    const tempo = resolver.resolve('tempo', 'pace')

    expect(tempo).toEqual({ low: 297, high: 297 })
    expect(formatPace(tempo.low)).toBe('4:57')
  })

  it('resolves distance-in-time paces to whole seconds', () => {
    const resolver = new ZoneResolver(tables({ marathon: '42.2km in 3:00:00' }))

    expect(resolver.resolve('marathon', 'pace')).toEqual({ low: 256, high: 256 })
  })

  it('resolves heart rate percentages against max', () => {
    const resolver = new ZoneResolver(tables({}, { max_hr: 198, z2: '62-76% max_hr' }))

    expect(resolver.resolve('z2', 'heartRate')).toEqual({ low: 123, high: 150 })
  })

  it('widens point values by the margins and leaves ranges alone', () => {
    const resolver = new ZoneResolver(
      tables({ marathon: '5:30', tempo: '90% marathon', steady: '4:50-5:10' }, { threshold: 160 }),
      { fasterSec: 3, slowerSec: 3, hrUpPct: 5, hrDownPct: 5 },
    )

    expect(resolver.resolve('tempo', 'pace')).toEqual({ low: 294, high: 300 })
    expect(resolver.resolve('steady', 'pace')).toEqual({ low: 290, high: 310 })
    expect(resolver.resolve('threshold', 'heartRate')).toEqual({ low: 152, high: 168 })
  })

  it('resolves chained percentages', () => {
    const resolver = new ZoneResolver(tables({ marathon: '5:00', half: '96% marathon', ten: '95% half' }))

    expect(resolver.resolve('ten', 'pace')).toEqual({ low: 274, high: 274 })
  })

  it('reports a missing base zone', () => {
    const resolver = new ZoneResolver(tables({ easy: '110% marathon' }))

    expect(() => resolver.resolve('easy', 'pace')).toThrow("Pace zone 'marathon' is not defined")
    expect(() => resolver.resolve('easy', 'pace')).toThrow(UnresolvedZoneError)
  })

  it('reports reference cycles with the chain', () => {
    const resolver = new ZoneResolver(tables({ a: '90% b', b: '110% a' }))

    expect(() => resolver.resolve('a', 'pace')).toThrow('Zone reference cycle: a -> b -> a')
  })

  it('resolves inline literals', () => {
    const resolver = new ZoneResolver(tables({}), { fasterSec: 5, slowerSec: 5, hrUpPct: 0, hrDownPct: 0 })

    expect(resolver.resolveDefinition(parseZoneExpression('5:00', 'pace'), 'pace')).toEqual({ low: 295, high: 305 })
  })
})
