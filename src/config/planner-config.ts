import type { LogLevel } from '@nestjs/common'
import { z } from 'zod'
import { parseWeekday } from '../utils/dates'

export const PLANNER_CONFIG = Symbol('PLANNER_CONFIG')

export type WorkoutServiceConfig = {
  baseUrl: string
  token?: string
  timeoutMs: number
  maxRetries: number
}

export type PlannerConfig = {
  port: number
  workoutService: WorkoutServiceConfig
  // 0 = Monday
  defaultWorkoutDays: number[]
  scheduleLookaheadDays: number
  logLevel: LogLevel
}

const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const

const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback)

const weekdaysSchema = z
  .string()
  .default('tue,thu,sat')
  .transform((value, ctx) => {
    const days = value
      .split(',')
      .map((d) => d.trim())
      .filter(Boolean)
      .map((d) => parseWeekday(d))
    if (days.length === 0 || days.some((d) => d === null)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected weekdays like 'tue,thu,sat' or '1,3,5', got '${value}'` })
      return z.NEVER
    }
    return [...new Set(days.filter((d): d is number => d !== null))].sort((a, b) => a - b)
  })

const envSchema = z.object({
  PORT: positiveInt(3000),
  WORKOUT_SERVICE_URL: z.string().url().default('https://connect.garmin.com'),
  WORKOUT_SERVICE_TOKEN: z.string().min(1).optional(),
  WORKOUT_SERVICE_TIMEOUT_MS: positiveInt(30_000),
  WORKOUT_SERVICE_MAX_RETRIES: z.coerce.number().int().min(0).catch(3),
  DEFAULT_WORKOUT_DAYS: weekdaysSchema,
  SCHEDULE_LOOKAHEAD_DAYS: positiveInt(365),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch('log'),
})

/** Read and validate the environment once at startup. */
export function loadPlannerConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }

  const e = parsed.data
  return {
    port: e.PORT,
    workoutService: {
      baseUrl: e.WORKOUT_SERVICE_URL.replace(/\/+$/, ''),
      ...(e.WORKOUT_SERVICE_TOKEN ? { token: e.WORKOUT_SERVICE_TOKEN } : {}),
      timeoutMs: e.WORKOUT_SERVICE_TIMEOUT_MS,
      maxRetries: e.WORKOUT_SERVICE_MAX_RETRIES,
    },
    defaultWorkoutDays: e.DEFAULT_WORKOUT_DAYS,
    scheduleLookaheadDays: e.SCHEDULE_LOOKAHEAD_DAYS,
    logLevel: e.LOG_LEVEL,
  }
}

/** Nest log levels from the most severe down to `level`. */
export const logLevelsUpTo = (level: LogLevel): LogLevel[] => {
  const index = LOG_LEVELS.findIndex((l) => l === level)
  return LOG_LEVELS.slice(0, index >= 0 ? index + 1 : LOG_LEVELS.indexOf('log') + 1)
}
