import { addDays, parseIsoDate, toIsoDate, weekdayOf } from '../utils/dates'

export const SCHEDULE_RANGES = ['TODAY', 'TOMORROW', 'CURRENT-WEEK', 'NEXT-WEEK', 'CURRENT-MONTH'] as const
export type ScheduleRange = (typeof SCHEDULE_RANGES)[number]

export type DateWindow = {
  from: string
  to: string
}

/** Inclusive window for a named range; weeks run Monday to Sunday. */
export function resolveScheduleRange(range: ScheduleRange, today: string): DateWindow {
  switch (range) {
    case 'TODAY':
      return { from: today, to: today }
    case 'TOMORROW': {
      const tomorrow = addDays(today, 1)
      return { from: tomorrow, to: tomorrow }
    }
    case 'CURRENT-WEEK':
    case 'NEXT-WEEK': {
      const monday = addDays(today, -weekdayOf(today) + (range === 'NEXT-WEEK' ? 7 : 0))
      return { from: monday, to: addDays(monday, 6) }
    }
    case 'CURRENT-MONTH': {
      const date = parseIsoDate(today)
      if (!date) throw new RangeError(`Invalid date '${today}', expected YYYY-MM-DD`)
      const last = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0))
      return { from: `${today.slice(0, 7)}-01`, to: toIsoDate(last) }
    }
  }
}
