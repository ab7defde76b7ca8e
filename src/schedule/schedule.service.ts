import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, todayOn } from '../clock/clock'
import type { Clock } from '../clock/clock'
import { runBatch } from '../common/batch-summary'
import type { BatchSummary } from '../common/batch-summary'
import { compileNameFilter } from '../common/name-filter'
import { InvalidScheduleDateError, PlanDocumentError } from '../common/planner-errors'
import { PLANNER_CONFIG } from '../config/planner-config'
import type { PlannerConfig } from '../config/planner-config'
import { readPinnedDate } from '../connect/connect-payload'
import { WORKOUT_CONNECT } from '../connect/connect.types'
import type { ScheduledWorkout, WorkoutConnect } from '../connect/connect.types'
import { partitionPlan } from '../plan-index/plan-index'
import { addDays, parseWeekday } from '../utils/dates'
import { resolveScheduleRange } from './schedule-range'
import type { ScheduleRange } from './schedule-range'
import { computeSchedule } from './scheduler'
import type { ScheduleDirection } from './scheduler'

export type SchedulePlanRequest = {
  // workout name prefix of the plan, e.g. "HM25"
  planPrefix: string
  raceDay: string
  workoutDays?: (string | number)[]
  direction?: ScheduleDirection
  // defaults to the clock's date
  today?: string
}

export type UnschedulePlanRequest = {
  planPrefix: string
  from?: string
}

export type ListScheduledRequest = {
  from?: string
  to?: string
  range?: ScheduleRange
  nameFilter?: string
}

export type ScheduleEntry = {
  workoutId: string
  name: string
  date: string
  pinned: boolean
}

export type SchedulePlan = {
  entries: ScheduleEntry[]
  // plan workouts whose names carry no week/session key
  excluded: string[]
  warnings: string[]
}

export type ScheduleResult = {
  plan: SchedulePlan
  summary: BatchSummary
}

// listing without a range looks this far ahead
const DEFAULT_LIST_DAYS = 30

@Injectable()
export class ScheduleService {
  private readonly logger = new Logger(ScheduleService.name)

  constructor(
    @Inject(WORKOUT_CONNECT) private readonly connect: WorkoutConnect,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(PLANNER_CONFIG) private readonly config: PlannerConfig,
  ) {}

  /** Dates the plan would get; nothing is written. */
  async simulate(request: SchedulePlanRequest): Promise<SchedulePlan> {
    const prefix = request.planPrefix.trim()
    if (!prefix) throw new PlanDocumentError('Plan prefix must not be empty')

    const today = request.today ?? todayOn(this.clock)
    const preferredWeekdays = this.resolveWeekdays(request.workoutDays)

    const remote = (await this.connect.listWorkouts())
      .filter((w) => w.workoutName.startsWith(prefix))
      .map((w) => {
        const { date } = readPinnedDate(w.description)
        return { name: w.workoutName, workoutId: w.workoutId, ...(date ? { pinnedDate: date } : {}) }
      })
    if (remote.length === 0) {
      this.logger.warn(`no workouts found for plan ${prefix}`)
      return { entries: [], excluded: [], warnings: [`No workouts found for plan ${prefix}`] }
    }

    const { entries, excluded } = partitionPlan(remote, prefix)
    const warnings = excluded.map((name) => `${name}: no W<ww>S<ss> session key, left out of the schedule`)
    warnings.forEach((w) => this.logger.warn(w))

    const assignments = computeSchedule(
      entries.map((e) => e.workout),
      { today, raceDay: request.raceDay, preferredWeekdays, direction: request.direction ?? 'forward' },
    )

    return {
      entries: assignments.map((a) => ({
        workoutId: a.workout.workoutId,
        name: a.workout.name,
        date: a.date,
        pinned: a.pinned,
      })),
      excluded,
      warnings,
    }
  }

  /**
   * Put the plan on the calendar, one workout at a time. A workout already on
   * its date is skipped; one on another date is moved.
   */
  async schedule(request: SchedulePlanRequest): Promise<ScheduleResult> {
    const plan = await this.simulate(request)
    if (plan.entries.length === 0) return { plan, summary: { succeeded: [], skipped: [], failed: [] } }

    const today = request.today ?? todayOn(this.clock)
    const existing = this.groupByWorkout(await this.connect.listScheduled(today, request.raceDay))

    const summary = await runBatch(
      plan.entries,
      (entry) => `${entry.name} (${entry.date})`,
      async (entry) => {
        const current = existing.get(entry.workoutId) ?? []
        const onDate = current.some((s) => s.date === entry.date)
        const elsewhere = current.filter((s) => s.date !== entry.date)

        for (const s of elsewhere) await this.connect.unscheduleWorkout(s.scheduleId)
        if (onDate) return elsewhere.length > 0 ? 'done' : 'skipped'

        await this.connect.scheduleWorkout(entry.workoutId, entry.date)
        return 'done'
      },
      this.logger,
    )

    this.logger.log(
      `scheduled ${summary.succeeded.length}, unchanged ${summary.skipped.length}, failed ${summary.failed.length}`,
    )
    return { plan, summary }
  }

  /** Take the plan's workouts off the calendar from `from` (default today) on. */
  async unschedule(request: UnschedulePlanRequest): Promise<BatchSummary> {
    const prefix = request.planPrefix.trim()
    if (!prefix) throw new PlanDocumentError('Plan prefix must not be empty')

    const from = request.from ?? todayOn(this.clock)
    const to = this.addDaysChecked(from, this.config.scheduleLookaheadDays)
    const scheduled = (await this.connect.listScheduled(from, to)).filter((s) => s.title.startsWith(prefix))

    return runBatch(
      scheduled,
      (s) => `${s.title} (${s.date})`,
      async (s) => {
        await this.connect.unscheduleWorkout(s.scheduleId)
        return 'done'
      },
      this.logger,
    )
  }

  async listScheduled(request: ListScheduledRequest = {}): Promise<ScheduledWorkout[]> {
    const today = todayOn(this.clock)
    const window = request.range
      ? resolveScheduleRange(request.range, today)
      : {
          from: request.from ?? today,
          to: request.to ?? this.addDaysChecked(request.from ?? today, DEFAULT_LIST_DAYS),
        }

    const filter = compileNameFilter(request.nameFilter)

    const scheduled = await this.connect.listScheduled(window.from, window.to)
    return filter ? scheduled.filter((s) => filter.test(s.title)) : scheduled
  }

  private resolveWeekdays(days?: (string | number)[]): number[] {
    if (!days || days.length === 0) return this.config.defaultWorkoutDays
    return days.map((day) => {
      const ordinal = parseWeekday(day)
      if (ordinal === null) {
        throw new InvalidScheduleDateError(`Unknown weekday '${day}', expected mon..sun or 0..6`, { weekday: String(day) })
      }
      return ordinal
    })
  }

  private addDaysChecked(date: string, days: number): string {
    try {
      return addDays(date, days)
    } catch {
      throw new InvalidScheduleDateError(`Invalid date '${date}', expected YYYY-MM-DD`, { date })
    }
  }

  private groupByWorkout(scheduled: ScheduledWorkout[]): Map<string, ScheduledWorkout[]> {
    const byWorkout = new Map<string, ScheduledWorkout[]>()
    for (const s of scheduled) byWorkout.set(s.workoutId, [...(byWorkout.get(s.workoutId) ?? []), s])
    return byWorkout
  }
}
