export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// index = ordinal used throughout the planner (0 = Monday)
export const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday']

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/
const DAY_MS = 24 * 60 * 60 * 1000

/** `YYYY-MM-DD` → UTC midnight, or null when the text is not a real calendar day. */
export const parseIsoDate = (text: string): Date | null => {
  const m = ISO_DATE_RE.exec(text.trim())
  if (!m) return null
  const date = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])))
  return toIsoDate(date) === text.trim() ? date : null
}

export const isIsoDate = (text: string): boolean => parseIsoDate(text) !== null

export const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10)

const requireDate = (iso: string): Date => {
  const date = parseIsoDate(iso)
  if (!date) throw new RangeError(`Invalid date '${iso}', expected YYYY-MM-DD`)
  return date
}

export const addDays = (iso: string, days: number): string =>
  toIsoDate(new Date(requireDate(iso).getTime() + days * DAY_MS))

/** 0 = Monday … 6 = Sunday */
export const weekdayOf = (iso: string): number => (requireDate(iso).getUTCDay() + 6) % 7

export const weekdayName = (ordinal: number): Weekday => WEEKDAYS[((ordinal % 7) + 7) % 7] ?? 'mon'

/** Accepts `mon`…`sun` (any case, or spelled out) or an ordinal 0…6 with 0 = Monday. */
export const parseWeekday = (value: string | number): number | null => {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 && value <= 6 ? value : null
  }
  const text = value.trim().toLowerCase()
  if (/^[0-6]$/.test(text)) return Number(text)
  const index = WEEKDAYS.findIndex((day, i) => day === text || WEEKDAY_NAMES[i] === text)
  return index >= 0 ? index : null
}

/** Calendar date of `now` in UTC. */
export const todayOf = (now: Date): string => toIsoDate(now)
