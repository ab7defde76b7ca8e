import { MalformedZoneExpressionError } from '../common/planner-errors'
import { parseDistance, parseDuration } from '../utils/units'
import type { ZoneDefinition, ZoneKind } from './zone.types'

const PACE_RE = /^\d{1,2}:\d{2}$/
const PACE_RANGE_RE = /^(\d{1,2}:\d{2})\s*-\s*(\d{1,2}:\d{2})$/
const HR_RE = /^\d{2,3}$/
const HR_RANGE_RE = /^(\d{2,3})\s*-\s*(\d{2,3})$/
const PERCENTAGE_RE = /^(\d+(?:\.\d+)?)(?:\s*-\s*(\d+(?:\.\d+)?))?\s*%\s*(\S+)$/
const DISTANCE_TIME_RE = /^(\S+)\s+in\s+(\S+)$/

const malformed = (raw: string | number, kind: ZoneKind, reason: string) =>
  new MalformedZoneExpressionError(`Invalid ${kind === 'pace' ? 'pace' : 'heart rate'} zone '${raw}': ${reason}`, {
    zone: String(raw),
  })

/**
 * Parse a zone value as written in a plan (`5:30`, `4:50-5:10`, `85-90% marathon`,
 * `10km in 40:00`, `150`, `140-150`, `62-76% max_hr`).
 */
export function parseZoneExpression(raw: string | number, kind: ZoneKind): ZoneDefinition {
  if (typeof raw === 'number') {
    if (kind === 'heartRate' && Number.isFinite(raw) && raw > 0) {
      return { type: 'fixed', value: Math.round(raw) }
    }
    throw malformed(raw, kind, 'bare numbers are only valid for heart rates')
  }

  const text = raw.trim()
  if (!text) throw malformed(raw, kind, 'empty value')

  const pct = PERCENTAGE_RE.exec(text)
  if (pct) {
    const first = Number(pct[1])
    const second = pct[2] !== undefined ? Number(pct[2]) : first
    const base = pct[3] ?? ''
    if (first <= 0 || second <= 0) throw malformed(raw, kind, 'percentages must be positive')
    return {
      type: 'percentage',
      lowPct: Math.min(first, second),
      highPct: Math.max(first, second),
      base,
    }
  }

  if (kind === 'pace') {
    if (PACE_RE.test(text)) {
      const value = parseDuration(text)
      if (value === null || value <= 0) throw malformed(raw, kind, 'expected m:ss')
      return { type: 'fixed', value }
    }

    const range = PACE_RANGE_RE.exec(text)
    if (range) {
      const a = parseDuration(range[1] ?? '')
      const b = parseDuration(range[2] ?? '')
      if (a === null || b === null || a <= 0 || b <= 0) throw malformed(raw, kind, 'expected m:ss-m:ss')
      return { type: 'range', low: Math.min(a, b), high: Math.max(a, b) }
    }

    const dt = DISTANCE_TIME_RE.exec(text)
    if (dt) {
      const meters = parseDistance(dt[1] ?? '')
      const seconds = parseDuration(dt[2] ?? '')
      if (meters === null || meters <= 0) throw malformed(raw, kind, `invalid distance '${dt[1]}'`)
      if (seconds === null || seconds <= 0) throw malformed(raw, kind, `invalid time '${dt[2]}'`)
      return { type: 'distanceTime', meters, seconds }
    }

    throw malformed(raw, kind, 'unrecognised pace expression')
  }

  if (HR_RE.test(text)) {
    return { type: 'fixed', value: Number(text) }
  }

  const hrRange = HR_RANGE_RE.exec(text)
  if (hrRange) {
    const a = Number(hrRange[1])
    const b = Number(hrRange[2])
    return { type: 'range', low: Math.min(a, b), high: Math.max(a, b) }
  }

  throw malformed(raw, kind, 'unrecognised heart rate expression')
}

/** Literal zone values start with a digit; identifiers never do. */
export const isZoneLiteral = (text: string): boolean => /^\d/.test(text.trim())
