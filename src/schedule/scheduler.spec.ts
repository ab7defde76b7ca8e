import { InsufficientScheduleWindowError, InvalidScheduleDateError } from '../common/planner-errors'
import { weekdayOf } from '../utils/dates'
import { computeSchedule } from './scheduler'
import type { SchedulableWorkout, ScheduleOptions } from './scheduler'

const MON = 0
const WED = 2
const FRI = 4

const plan = (count: number): SchedulableWorkout[] =>
  Array.from({ length: count }, (_, i) => ({ name: `W${String(Math.floor(i / 3) + 1).padStart(2, '0')}S0${(i % 3) + 1}` }))

const options: ScheduleOptions = {
  today: '2025-02-01',
  raceDay: '2025-04-21',
  preferredWeekdays: [MON, WED, FRI],
}

describe('computeSchedule', () => {
  it('packs the plan on preferred weekdays from tomorrow', () => {
    const result = computeSchedule(plan(3), options)

    expect(result.map((a) => [a.workout.name, a.date])).toEqual([
      ['W01S01', '2025-02-03'],
      ['W01S02', '2025-02-05'],
      ['W01S03', '2025-02-07'],
    ])
  })

  it('packs the plan against race day when walking backward', () => {
    const result = computeSchedule(plan(3), { ...options, direction: 'backward' })

    expect(result.map((a) => a.date)).toEqual(['2025-04-14', '2025-04-16', '2025-04-18'])
  })

  it('keeps every date on a preferred weekday, inside the window and increasing', () => {
    for (const direction of ['forward', 'backward'] as const) {
      const result = computeSchedule(plan(30), { ...options, direction })
      const dates = result.map((a) => a.date)

      expect(dates).toHaveLength(30)
      dates.forEach((date, i) => {
        expect([MON, WED, FRI]).toContain(weekdayOf(date))
        expect(date > options.today).toBe(true)
        expect(date < options.raceDay).toBe(true)
        if (i > 0) expect(date > (dates[i - 1] ?? '')).toBe(true)
      })
    }
  })

  it('fails when the window is too short', () => {
    const short = { today: '2025-02-01', raceDay: '2025-02-15', preferredWeekdays: [MON] }

    expect(() => computeSchedule(plan(50), short)).toThrow(InsufficientScheduleWindowError)
    expect(() => computeSchedule(plan(50), short)).toThrow(
      '48 of 50 workouts do not fit between 2025-02-01 and 2025-02-15 on the preferred weekdays',
    )
    expect(() => computeSchedule(plan(50), { ...short, direction: 'backward' })).toThrow(InsufficientScheduleWindowError)
  })

  it('never uses race day itself', () => {
    const window = { today: '2025-04-17', raceDay: '2025-04-21', preferredWeekdays: [FRI, MON] }

    expect(computeSchedule(plan(1), window).map((a) => a.date)).toEqual(['2025-04-18'])
    expect(() => computeSchedule(plan(2), window)).toThrow(InsufficientScheduleWindowError)
  })

  it('uses a pinned date and resumes after it', () => {
    const workouts: SchedulableWorkout[] = [{ name: 'A' }, { name: 'B', pinnedDate: '2025-02-12' }, { name: 'C' }]

    const result = computeSchedule(workouts, options)

    expect(result).toEqual([
      { workout: { name: 'A' }, date: '2025-02-03', pinned: false },
      { workout: { name: 'B', pinnedDate: '2025-02-12' }, date: '2025-02-12', pinned: true },
      { workout: { name: 'C' }, date: '2025-02-14', pinned: false },
    ])
  })

  it('rejects pinned dates that break a constraint', () => {
    const pinned = (pinnedDate: string) => [{ name: 'A', pinnedDate }]

    expect(() => computeSchedule(pinned('2025-02-04'), options)).toThrow(
      'A: pinned date 2025-02-04 falls on tue, not a preferred weekday',
    )
    expect(() => computeSchedule(pinned('2025-01-31'), options)).toThrow(InvalidScheduleDateError)
    expect(() => computeSchedule(pinned('2025-04-21'), options)).toThrow(InvalidScheduleDateError)
    expect(() => computeSchedule(pinned('2025-04-23'), options)).toThrow(InvalidScheduleDateError)
  })

  it('rejects a pinned date before an earlier workout', () => {
    const workouts = [{ name: 'A', pinnedDate: '2025-02-07' }, { name: 'B', pinnedDate: '2025-02-05' }]

    expect(() => computeSchedule(workouts, options)).toThrow(
      'B: pinned date 2025-02-05 is not after the previous workout (2025-02-07)',
    )
  })
})
