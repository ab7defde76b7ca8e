import { z } from 'zod'
import type { ConnectStep, ConnectWorkout, ConnectWorkoutSummary, ScheduledWorkout } from './connect.types'

// the service answers with numeric ids; the planner keeps them as strings
const idSchema = z.union([z.number(), z.string().min(1)]).transform(String)

const connectStepSchema: z.ZodType<ConnectStep, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      type: z.string(),
      stepId: z.number().nullish(),
      stepOrder: z.number().optional(),
      childStepId: z.number().nullish(),
      stepType: z.object({ stepTypeId: z.number().optional(), stepTypeKey: z.string() }),
      endCondition: z.object({ conditionTypeId: z.number().optional(), conditionTypeKey: z.string() }).nullish(),
      endConditionValue: z.number().nullish(),
      preferredEndConditionUnit: z.object({ unitKey: z.string() }).nullish(),
      targetType: z
        .object({ workoutTargetTypeId: z.number().optional(), workoutTargetTypeKey: z.string() })
        .nullish(),
      targetValueOne: z.number().nullish(),
      targetValueTwo: z.number().nullish(),
      zoneNumber: z.number().nullish(),
      description: z.string().nullish(),
      numberOfIterations: z.number().nullish(),
      smartRepeat: z.boolean().optional(),
      workoutSteps: z.array(connectStepSchema).optional(),
    })
    .passthrough(),
)

const sportTypeSchema = z.object({ sportTypeId: z.number().optional(), sportTypeKey: z.string() })

export const connectWorkoutSchema = z
  .object({
    workoutId: idSchema.optional(),
    workoutName: z.string(),
    description: z.string().nullish(),
    sportType: sportTypeSchema.optional(),
    workoutSegments: z
      .array(
        z.object({
          segmentOrder: z.number(),
          sportType: sportTypeSchema.optional(),
          workoutSteps: z.array(connectStepSchema),
        }),
      )
      .optional(),
  })
  .passthrough() satisfies z.ZodType<ConnectWorkout, z.ZodTypeDef, unknown>

export const connectWorkoutSummarySchema = z
  .object({
    workoutId: idSchema,
    workoutName: z.string(),
    description: z.string().nullish(),
  })
  .passthrough() satisfies z.ZodType<ConnectWorkoutSummary, z.ZodTypeDef, unknown>

export const connectWorkoutListSchema = z.array(connectWorkoutSummarySchema)

export const connectRecordSchema = z.record(z.unknown())

export const scheduleResponseSchema = z
  .object({
    workoutScheduleId: idSchema,
    workout: z.object({ workoutId: idSchema, workoutName: z.string() }).passthrough(),
    calendarDate: z.string(),
  })
  .passthrough()
  .transform(
    (s): ScheduledWorkout => ({
      scheduleId: s.workoutScheduleId,
      workoutId: s.workout.workoutId,
      title: s.workout.workoutName,
      date: s.calendarDate,
    }),
  )

// calendar items of other kinds (activities, notes) are dropped by the caller
export const calendarMonthSchema = z
  .object({
    calendarItems: z
      .array(
        z
          .object({
            itemType: z.string(),
            id: idSchema.optional(),
            workoutId: idSchema.nullish(),
            title: z.string().nullish(),
            date: z.string(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough()

export const formatResponseIssues = (error: z.ZodError): string =>
  error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
