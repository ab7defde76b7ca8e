import { todayOf } from '../utils/dates'

export interface Clock {
  now(): Date
}

export const CLOCK = Symbol('CLOCK')

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }
}

/** A clock that stays where it is put; used by tests and dry runs. */
export class FixedClock implements Clock {
  constructor(private readonly current: Date) {}

  now(): Date {
    return new Date(this.current.getTime())
  }
}

/** Today's calendar date (UTC) as YYYY-MM-DD. */
export const todayOn = (clock: Clock): string => todayOf(clock.now())
