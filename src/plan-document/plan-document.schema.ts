import { z } from 'zod'
import type { RawPlanConfig, StepEntry, StepEntryValue } from './plan-document.types'

const stepEntryValueSchema: z.ZodType<StepEntryValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.null(),
    z.array(stepEntrySchema),
    z.object({ steps: z.array(stepEntrySchema) }),
  ]),
)

export const stepEntrySchema: z.ZodType<StepEntry> = z.lazy(() => z.record(stepEntryValueSchema))

export const workoutStepsSchema = z.array(stepEntrySchema)

const zoneValueSchema = z.union([z.string(), z.number()])

export const rawPlanConfigSchema = z.object({
  name_prefix: z.string().optional(),
  paces: z.record(zoneValueSchema).optional(),
  heart_rates: z.record(zoneValueSchema).optional(),
  margins: z
    .object({
      faster: zoneValueSchema.optional(),
      slower: zoneValueSchema.optional(),
      hr_up: zoneValueSchema.optional(),
      hr_down: zoneValueSchema.optional(),
    })
    .optional(),
}) satisfies z.ZodType<RawPlanConfig>

/** Top level: `config` plus one key per workout. Workout values are checked one by one. */
export const planDocumentSchema = z.record(z.unknown())

export const formatZodIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.length ? `${issue.path.join('.')}: ` : ''}${issue.message}`).join('; ')
