import { parse, stringify } from 'yaml'
import { MalformedZoneExpressionError, PlanDocumentError, StepSyntaxError } from '../common/planner-errors'
import { parseStep } from '../steps/step-parser'
import type { ParsedStep, StepParseContext } from '../steps/step.types'
import { isIsoDate } from '../utils/dates'
import { parseDuration } from '../utils/units'
import type { PlanConfig } from '../workout-compiler/workout.types'
import { parseZoneExpression } from '../zones/zone-expression'
import type { Margins, ZoneKind, ZoneTable } from '../zones/zone.types'
import { NO_MARGINS } from '../zones/zone.types'
import { formatZodIssues, planDocumentSchema, rawPlanConfigSchema, workoutStepsSchema } from './plan-document.schema'
import type { PlanDocument, PlanDocumentWorkout, RawMargins, RawPlanConfig, StepEntry, StepEntryValue } from './plan-document.types'

const CONFIG_KEY = 'config'
const REPEAT_KEY_RE = /^repeat\s+(\d+)$/i
const DATE_SUFFIX_RE = /\s+\((?:Date|Data):.*\)\s*$/
const KEY_COMMENT_RE = /^(?:"((?:[^"\\]|\\.)*)"|'((?:[^']|'')*)'|([^\s#'"][^#]*?))\s*:\s+#\s?(.*?)\s*$/

/** Comments written after a top-level key (`W01S01 Easy: # description`). */
const readKeyComments = (text: string): Map<string, string> => {
  const comments = new Map<string, string>()
  for (const line of text.split(/\r?\n/)) {
    const m = KEY_COMMENT_RE.exec(line)
    if (!m) continue
    const key = m[1]?.replace(/\\(.)/g, '$1') ?? m[2]?.replace(/''/g, "'") ?? m[3]
    const comment = m[4]
    if (key && comment) comments.set(key, comment)
  }
  return comments
}

export function parsePlanDocument(text: string): PlanDocument {
  let raw: unknown
  try {
    raw = parse(text)
  } catch (err) {
    throw new PlanDocumentError(`Plan document is not valid YAML: ${err instanceof Error ? err.message : String(err)}`)
  }
  return toPlanDocument(raw ?? {}, readKeyComments(text))
}

/** Validate an already-decoded document (YAML or JSON body). */
export function toPlanDocument(raw: unknown, descriptions: Map<string, string> = new Map()): PlanDocument {
  const top = planDocumentSchema.safeParse(raw)
  if (!top.success) throw new PlanDocumentError(`Plan document must be a mapping of workout names to steps`)

  const config = rawPlanConfigSchema.safeParse(top.data[CONFIG_KEY] ?? {})
  if (!config.success) {
    throw new PlanDocumentError(`Invalid config: ${formatZodIssues(config.error)}`, { section: CONFIG_KEY })
  }

  const workouts: PlanDocumentWorkout[] = []
  for (const [name, value] of Object.entries(top.data)) {
    if (name === CONFIG_KEY) continue
    const steps = workoutStepsSchema.safeParse(value ?? [])
    if (!steps.success) {
      throw new PlanDocumentError(`Invalid steps for '${name}': ${formatZodIssues(steps.error)}`, { workoutName: name })
    }
    const description = descriptions.get(name)
    workouts.push({ name, ...(description ? { description } : {}), steps: steps.data })
  }

  return { config: config.data, workouts }
}

export function stringifyPlanDocument(document: PlanDocument): string {
  const parts: string[] = []
  if (Object.keys(document.config).length > 0) parts.push(stringify({ [CONFIG_KEY]: document.config }))

  for (const workout of document.workouts) {
    const text = stringify({ [workout.name]: workout.steps })
    if (!workout.description) {
      parts.push(text)
      continue
    }
    const [first = '', ...rest] = text.split('\n')
    parts.push([`${first} # ${workout.description.replace(/\s+/g, ' ').trim()}`, ...rest].join('\n'))
  }

  return parts.join('\n')
}

const buildZoneTable = (values: Record<string, string | number>, kind: ZoneKind): ZoneTable => {
  const table: ZoneTable = {}
  for (const [name, value] of Object.entries(values)) {
    try {
      table[name] = parseZoneExpression(value, kind)
    } catch (err) {
      if (err instanceof MalformedZoneExpressionError) {
        throw new MalformedZoneExpressionError(`Zone '${name}': ${err.message}`, { ...err.context, zone: name })
      }
      throw err
    }
  }
  return table
}

const marginValue = (value: string | number | undefined, field: keyof RawMargins): number => {
  if (value === undefined) return 0
  const isPace = field === 'faster' || field === 'slower'
  const parsed =
    typeof value === 'number' ? value : isPace ? parseDuration(value) : Number(value.trim().replace(/%$/, ''))
  if (parsed === null || !Number.isFinite(parsed) || parsed < 0) {
    throw new PlanDocumentError(`Invalid margin ${field} '${value}'`, { section: 'margins' })
  }
  return parsed
}

const buildMargins = (raw: RawMargins | undefined): Margins =>
  raw
    ? {
        fasterSec: marginValue(raw.faster, 'faster'),
        slowerSec: marginValue(raw.slower, 'slower'),
        hrUpPct: marginValue(raw.hr_up, 'hr_up'),
        hrDownPct: marginValue(raw.hr_down, 'hr_down'),
      }
    : NO_MARGINS

export function buildPlanConfig(raw: RawPlanConfig): PlanConfig {
  return {
    namePrefix: raw.name_prefix ?? '',
    zones: {
      paces: buildZoneTable(raw.paces ?? {}, 'pace'),
      heartRates: buildZoneTable(raw.heart_rates ?? {}, 'heartRate'),
    },
    margins: buildMargins(raw.margins),
  }
}

export const stripDateSuffix = (name: string): string => name.replace(DATE_SUFFIX_RE, '')

const isStepsObject = (value: StepEntryValue): value is { steps: StepEntry[] } =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const repeatNode = (count: number, children: StepEntry[], ctx: StepParseContext): ParsedStep => {
  const header = parseStep(`repeat ${count}:`, 0, ctx)
  if (header.type !== 'repeat') throw new StepSyntaxError(`Invalid repeat count '${count}'`)
  if (children.length === 0) throw new StepSyntaxError(`Repeat block 'repeat ${count}' has no steps`)
  return { ...header, steps: entriesToSteps(children, ctx) }
}

const entryToStep = (entry: StepEntry, ctx: StepParseContext): ParsedStep => {
  const { repeat, steps } = entry
  if (repeat !== undefined && steps !== undefined) {
    const count = typeof repeat === 'number' ? repeat : Number(repeat)
    if (!Number.isInteger(count) || !Array.isArray(steps)) {
      throw new StepSyntaxError(`Invalid repeat entry '${JSON.stringify(entry)}'`)
    }
    return repeatNode(count, steps, ctx)
  }

  const entries = Object.entries(entry)
  const [first] = entries
  if (!first || entries.length !== 1) {
    throw new StepSyntaxError(`A step must have exactly one key, got '${JSON.stringify(entry)}'`)
  }
  const [key, value] = first

  const repeatKey = REPEAT_KEY_RE.exec(key.trim())
  if (repeatKey) {
    const children = Array.isArray(value) ? value : isStepsObject(value) ? value.steps : null
    if (!children) throw new StepSyntaxError(`'${key}' must hold a list of steps`, { step: key })
    return repeatNode(Number(repeatKey[1]), children, ctx)
  }

  if (key === 'date') throw new StepSyntaxError(`'date' is only allowed as the first step`, { step: key })
  if (Array.isArray(value) || isStepsObject(value)) {
    throw new StepSyntaxError(`'${key}' must hold a step expression`, { step: key })
  }

  const expression = value === null ? '' : String(value).trim()
  return parseStep(expression ? `${key}: ${expression}` : key, 0, ctx)
}

export const entriesToSteps = (entries: StepEntry[], ctx: StepParseContext = {}): ParsedStep[] =>
  entries.map((entry) => entryToStep(entry, ctx))

/**
 * Split off the optional leading `{ date: YYYY-MM-DD }` pseudo-step and parse the rest.
 */
export function documentWorkoutSteps(
  workout: PlanDocumentWorkout,
  ctx: StepParseContext = {},
): { steps: ParsedStep[]; scheduledDate?: string } {
  const [first, ...rest] = workout.steps
  const pinned = first && Object.keys(first).length === 1 ? first.date : undefined
  if (pinned === undefined) return { steps: entriesToSteps(workout.steps, ctx) }

  const scheduledDate = String(pinned).trim()
  if (!isIsoDate(scheduledDate)) {
    throw new PlanDocumentError(`Invalid date '${scheduledDate}', expected YYYY-MM-DD`, { step: 'date' })
  }
  return { steps: entriesToSteps(rest, ctx), scheduledDate }
}
