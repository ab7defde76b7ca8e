import { InsufficientScheduleWindowError, InvalidScheduleDateError } from '../common/planner-errors'
import { addDays, isIsoDate, weekdayName, weekdayOf } from '../utils/dates'

export type ScheduleDirection = 'forward' | 'backward'

export type SchedulableWorkout = {
  name: string
  // explicit date from the plan's `date:` pseudo-step
  pinnedDate?: string
}

export type ScheduleOptions = {
  raceDay: string
  today: string
  // 0 = Monday
  preferredWeekdays: number[]
  direction?: ScheduleDirection
}

export type ScheduleAssignment<T> = {
  workout: T
  date: string
  pinned: boolean
}

const invalidPinned = (workout: SchedulableWorkout, date: string, reason: string) =>
  new InvalidScheduleDateError(`${workout.name}: pinned date ${date} ${reason}`, {
    workoutName: workout.name,
    date,
  })

const checkPinned = (workout: SchedulableWorkout, date: string, weekdays: Set<number>, options: ScheduleOptions) => {
  if (!isIsoDate(date)) throw invalidPinned(workout, date, 'is not a YYYY-MM-DD date')
  if (!weekdays.has(weekdayOf(date))) {
    throw invalidPinned(workout, date, `falls on ${weekdayName(weekdayOf(date))}, not a preferred weekday`)
  }
  if (date <= options.today) throw invalidPinned(workout, date, `is not after today (${options.today})`)
  if (date >= options.raceDay) throw invalidPinned(workout, date, `is not before race day (${options.raceDay})`)
}

const windowError = (remaining: number, total: number, options: ScheduleOptions) =>
  new InsufficientScheduleWindowError(
    `${remaining} of ${total} workouts do not fit between ${options.today} and ${options.raceDay} on the preferred weekdays`,
    { remaining, total, today: options.today, raceDay: options.raceDay },
  )

const walkForward = <T extends SchedulableWorkout>(
  workouts: T[],
  weekdays: Set<number>,
  options: ScheduleOptions,
): ScheduleAssignment<T>[] => {
  const assignments: ScheduleAssignment<T>[] = []
  let last = options.today

  workouts.forEach((workout, index) => {
    if (workout.pinnedDate !== undefined) {
      const date = workout.pinnedDate
      checkPinned(workout, date, weekdays, options)
      if (date <= last) {
        throw invalidPinned(workout, date, `is not after the previous workout (${last})`)
      }
      assignments.push({ workout, date, pinned: true })
      last = date
      return
    }

    let candidate = addDays(last, 1)
    while (candidate < options.raceDay && !weekdays.has(weekdayOf(candidate))) {
      candidate = addDays(candidate, 1)
    }
    if (candidate >= options.raceDay) throw windowError(workouts.length - index, workouts.length, options)

    assignments.push({ workout, date: candidate, pinned: false })
    last = candidate
  })

  return assignments
}

const walkBackward = <T extends SchedulableWorkout>(
  workouts: T[],
  weekdays: Set<number>,
  options: ScheduleOptions,
): ScheduleAssignment<T>[] => {
  const assignments: ScheduleAssignment<T>[] = []
  let next = options.raceDay

  for (let index = workouts.length - 1; index >= 0; index--) {
    const workout = workouts[index]
    if (!workout) continue

    if (workout.pinnedDate !== undefined) {
      const date = workout.pinnedDate
      checkPinned(workout, date, weekdays, options)
      if (date >= next) {
        throw invalidPinned(workout, date, `is not before the next workout (${next})`)
      }
      assignments.push({ workout, date, pinned: true })
      next = date
      continue
    }

    let candidate = addDays(next, -1)
    while (candidate > options.today && !weekdays.has(weekdayOf(candidate))) {
      candidate = addDays(candidate, -1)
    }
    if (candidate <= options.today) throw windowError(index + 1, workouts.length, options)

    assignments.push({ workout, date: candidate, pinned: false })
    next = candidate
  }

  return assignments.reverse()
}

/**
 * Give each workout (already in plan order) one calendar date.
 *
 * Dates fall on a preferred weekday, strictly after `today` and strictly before
 * `raceDay`, and increase with plan order. `forward` packs the plan from
 * tomorrow; `backward` packs it against race day. Pinned dates are used as
 * given once validated, and the walk continues from them.
 */
export function computeSchedule<T extends SchedulableWorkout>(
  workouts: T[],
  options: ScheduleOptions,
): ScheduleAssignment<T>[] {
  if (!isIsoDate(options.today)) {
    throw new InvalidScheduleDateError(`Invalid today '${options.today}', expected YYYY-MM-DD`)
  }
  if (!isIsoDate(options.raceDay)) {
    throw new InvalidScheduleDateError(`Invalid race day '${options.raceDay}', expected YYYY-MM-DD`)
  }
  if (workouts.length === 0) return []

  const weekdays = new Set(options.preferredWeekdays.filter((d) => Number.isInteger(d) && d >= 0 && d <= 6))
  if (weekdays.size === 0) throw windowError(workouts.length, workouts.length, options)

  return options.direction === 'backward'
    ? walkBackward(workouts, weekdays, options)
    : walkForward(workouts, weekdays, options)
}
