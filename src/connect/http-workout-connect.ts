import { Logger } from '@nestjs/common'
import axios from 'axios'
import type { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios'
import { z } from 'zod'
import type { WorkoutServiceConfig } from '../config/planner-config'
import { parseIsoDate } from '../utils/dates'
import {
  calendarMonthSchema,
  connectRecordSchema,
  connectWorkoutListSchema,
  connectWorkoutSchema,
  connectWorkoutSummarySchema,
  formatResponseIssues,
  scheduleResponseSchema,
} from './connect.schema'
import type { ConnectWorkout, ConnectWorkoutSummary, ScheduledWorkout, WorkoutConnect } from './connect.types'
import { WorkoutConnectError } from './workout-connect.error'

export type HttpWorkoutConnectOptions = {
  // replaces the network transport; tests answer requests in process
  adapter?: AxiosAdapter
  retryDelayMs?: number
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

const noContent = z.unknown()

/** `[year, month]` (month 1-12) for every month touched by the range. */
export const monthsInRange = (from: string, to: string): [number, number][] => {
  const start = parseIsoDate(from)
  const end = parseIsoDate(to)
  if (!start || !end || start > end) return []

  const months: [number, number][] = []
  let year = start.getUTCFullYear()
  let month = start.getUTCMonth() + 1
  const lastYear = end.getUTCFullYear()
  const lastMonth = end.getUTCMonth() + 1
  while (year < lastYear || (year === lastYear && month <= lastMonth)) {
    months.push([year, month])
    month += 1
    if (month > 12) {
      month = 1
      year += 1
    }
  }
  return months
}

/**
 * Workout service over HTTP. Network errors, 5xx and 429 answers are retried
 * with exponential back-off; anything else fails at once.
 */
export class HttpWorkoutConnect implements WorkoutConnect {
  private readonly logger = new Logger(HttpWorkoutConnect.name)
  private readonly http: AxiosInstance
  private readonly maxRetries: number
  private readonly retryDelayMs: number

  constructor(config: WorkoutServiceConfig, options: HttpWorkoutConnectOptions = {}) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    })
    this.maxRetries = config.maxRetries
    this.retryDelayMs = options.retryDelayMs ?? 500

    const token = config.token
    this.http.interceptors.request.use((req) => {
      if (token) req.headers.set('Authorization', `Bearer ${token}`)
      return req
    })
  }

  async listWorkouts(): Promise<ConnectWorkoutSummary[]> {
    return this.send(
      { method: 'GET', url: '/workout-service/workouts', params: { start: 1, limit: 999, myWorkoutsOnly: true } },
      connectWorkoutListSchema,
      'list workouts',
    )
  }

  async getWorkout(id: string): Promise<ConnectWorkout> {
    return this.send({ method: 'GET', url: `/workout-service/workout/${id}` }, connectWorkoutSchema, `get workout ${id}`)
  }

  async getWorkoutRecord(id: string): Promise<Record<string, unknown>> {
    return this.send({ method: 'GET', url: `/workout-service/workout/${id}` }, connectRecordSchema, `get workout ${id}`)
  }

  async createWorkout(payload: ConnectWorkout): Promise<ConnectWorkoutSummary> {
    return this.send(
      { method: 'POST', url: '/workout-service/workout', data: payload },
      connectWorkoutSummarySchema,
      `create workout ${payload.workoutName}`,
    )
  }

  async updateWorkout(id: string, payload: ConnectWorkout): Promise<void> {
    await this.send(
      { method: 'PUT', url: `/workout-service/workout/${id}`, data: { ...payload, workoutId: id } },
      noContent,
      `update workout ${id}`,
    )
  }

  async deleteWorkout(id: string): Promise<void> {
    await this.send({ method: 'DELETE', url: `/workout-service/workout/${id}` }, noContent, `delete workout ${id}`)
  }

  async scheduleWorkout(id: string, date: string): Promise<ScheduledWorkout> {
    return this.send(
      { method: 'POST', url: `/workout-service/schedule/${id}`, data: { date } },
      scheduleResponseSchema,
      `schedule workout ${id} on ${date}`,
    )
  }

  async unscheduleWorkout(scheduleId: string): Promise<void> {
    await this.send(
      { method: 'DELETE', url: `/workout-service/schedule/${scheduleId}` },
      noContent,
      `unschedule ${scheduleId}`,
    )
  }

  async listScheduled(from: string, to: string): Promise<ScheduledWorkout[]> {
    const scheduled: ScheduledWorkout[] = []
    // the calendar is served per month, with 0-based months
    for (const [year, month] of monthsInRange(from, to)) {
      const calendar = await this.send(
        { method: 'GET', url: `/calendar-service/year/${year}/month/${month - 1}` },
        calendarMonthSchema,
        `calendar ${year}-${String(month).padStart(2, '0')}`,
      )
      for (const item of calendar.calendarItems) {
        if (item.itemType !== 'workout' || !item.id || !item.workoutId) continue
        if (item.date < from || item.date > to) continue
        scheduled.push({ scheduleId: item.id, workoutId: item.workoutId, title: item.title ?? '', date: item.date })
      }
    }
    return scheduled.sort((a, b) => a.date.localeCompare(b.date))
  }

  private async send<T>(request: AxiosRequestConfig, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
    const data = await this.withRetries(request, what)
    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      throw new WorkoutConnectError(`${what}: unexpected response (${formatResponseIssues(parsed.error)})`)
    }
    return parsed.data
  }

  private async withRetries(request: AxiosRequestConfig, what: string): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        const res = await this.http.request<unknown>(request)
        return res.data
      } catch (err) {
        if (!axios.isAxiosError(err)) {
          throw new WorkoutConnectError(`${what} failed: ${err instanceof Error ? err.message : String(err)}`)
        }

        const status = err.response?.status
        const retryable = status === undefined || status >= 500 || status === 429
        if (!retryable || attempt >= this.maxRetries) {
          throw new WorkoutConnectError(`${what} failed: ${status !== undefined ? `HTTP ${status}` : err.message}`, status)
        }

        const delay = this.retryDelayMs * 2 ** attempt
        this.logger.warn(`${what}: ${status ?? err.code ?? 'network error'}, retry ${attempt + 1}/${this.maxRetries} in ${delay}ms`)
        await sleep(delay)
      }
    }
  }
}
