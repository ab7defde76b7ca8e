const DURATION_UNIT_RE = /^(\d+(?:\.\d+)?)\s*(h|min|m|s)$/
const CLOCK_RE = /^(\d+):(\d{1,2})(?::(\d{1,2}))?$/
const DISTANCE_RE = /^(\d+(?:\.\d+)?)\s*(km|m)$/

/**
 * Parse a duration into seconds.
 *
 * Accepts `30s`, `10min`, `2m` (minutes), `1h`, `mm:ss` and `h:mm:ss`.
 * Returns null when the text is not a duration.
 */
export const parseDuration = (text: string): number | null => {
  const value = text.trim()

  const unit = DURATION_UNIT_RE.exec(value)
  if (unit) {
    const amount = Number(unit[1])
    switch (unit[2]) {
      case 'h':
        return Math.round(amount * 3600)
      case 'min':
      case 'm':
        return Math.round(amount * 60)
      default:
        return Math.round(amount)
    }
  }

  const clock = CLOCK_RE.exec(value)
  if (clock) {
    const first = Number(clock[1])
    const second = Number(clock[2])
    if (clock[3] === undefined) {
      if (second >= 60) return null
      return first * 60 + second
    }
    const third = Number(clock[3])
    if (second >= 60 || third >= 60) return null
    return first * 3600 + second * 60 + third
  }

  return null
}

/**
 * Parse `10km`, `2.5km` or `400m` into meters.
 */
export const parseDistance = (text: string): number | null => {
  const m = DISTANCE_RE.exec(text.trim())
  if (!m) return null
  const amount = Number(m[1])
  return m[2] === 'km' ? Math.round(amount * 1000) : Math.round(amount)
}

/** Seconds per km → `m:ss` */
export const formatPace = (secondsPerKm: number): string => {
  const total = Math.round(secondsPerKm)
  const mins = Math.floor(total / 60)
  const secs = total - mins * 60
  return `${mins}:${String(secs).padStart(2, '0')}`
}

export const formatDuration = (seconds: number): string => {
  if (seconds > 0 && seconds % 3600 === 0) return `${seconds / 3600}h`
  if (seconds > 0 && seconds % 60 === 0) return `${seconds / 60}min`
  return `${seconds}s`
}

export const formatDistance = (meters: number): string => {
  if (meters > 0 && meters % 1000 === 0) return `${meters / 1000}km`
  return `${meters}m`
}

export const paceToKmph = (secondsPerKm: number): number => 3600 / secondsPerKm

export const paceToMetersPerSecond = (secondsPerKm: number): number => 1000 / secondsPerKm

export const metersPerSecondToPace = (metersPerSecond: number): number => 1000 / metersPerSecond

/** Seconds → `m:ss`, or `h:mm:ss` from one hour up */
export const formatClock = (seconds: number): string => {
  const total = Math.round(seconds)
  const hours = Math.floor(total / 3600)
  if (hours === 0) return formatPace(total)
  const rest = total - hours * 3600
  const mins = Math.floor(rest / 60)
  const secs = rest - mins * 60
  return `${hours}:${String(mins).padStart(2, '0')}:${String(secs).padStart(2, '0')}`
}
