import type { StepEntry } from '../plan-document/plan-document.types'
import { stepsToEntries } from '../plan-document/plan-serializer'
import { isStepKind } from '../steps/step-parser'
import type { CompiledStep, LeafStep, Quantity, StepKind } from '../steps/step.types'
import { metersPerSecondToPace, paceToMetersPerSecond } from '../utils/units'
import type { Workout } from '../workout-compiler/workout.types'
import type { ResolvedTarget } from '../zones/zone.types'
import type {
  ConnectEndCondition,
  ConnectSportType,
  ConnectStep,
  ConnectTargetType,
  ConnectWorkout,
} from './connect.types'
import { WorkoutConnectError } from './workout-connect.error'

const RUNNING: ConnectSportType = { sportTypeId: 1, sportTypeKey: 'running' }

const STEP_TYPE_IDS: Record<StepKind | 'repeat', number> = {
  warmup: 1,
  cooldown: 2,
  interval: 3,
  recovery: 4,
  rest: 5,
  repeat: 6,
  other: 7,
}

const END_CONDITIONS = {
  lap: { conditionTypeId: 1, conditionTypeKey: 'lap.button' },
  time: { conditionTypeId: 2, conditionTypeKey: 'time' },
  distance: { conditionTypeId: 3, conditionTypeKey: 'distance' },
  iterations: { conditionTypeId: 7, conditionTypeKey: 'iterations' },
} satisfies Record<string, ConnectEndCondition>

const TARGET_TYPES = {
  none: { workoutTargetTypeId: 1, workoutTargetTypeKey: 'no.target' },
  heartRate: { workoutTargetTypeId: 4, workoutTargetTypeKey: 'heart.rate.zone' },
  pace: { workoutTargetTypeId: 6, workoutTargetTypeKey: 'pace.zone' },
} satisfies Record<string, ConnectTargetType>

// written into the remote description: "Date: 2025-03-01" or "Easy (Date: 2025-03-01)"
const PINNED_DATE_RE = /(?:^|\s+\()Date:\s*(\d{4}-\d{2}-\d{2})\)?\s*$/

/** Description as stored remotely, carrying the pinned date when there is one. */
export const connectDescription = (description?: string, scheduledDate?: string): string | null => {
  if (!scheduledDate) return description || null
  return description ? `${description} (Date: ${scheduledDate})` : `Date: ${scheduledDate}`
}

/** Split a remote description into its text and the pinned date it carries. */
export const readPinnedDate = (description?: string | null): { description?: string; date?: string } => {
  const text = description?.trim() ?? ''
  const m = PINNED_DATE_RE.exec(text)
  if (!m) return text ? { description: text } : {}
  const rest = text.slice(0, m.index).trim()
  return { ...(rest ? { description: rest } : {}), date: m[1] }
}

type StepCounter = { order: number; child: number }

const endConditionOf = (quantity: Quantity) => {
  switch (quantity.type) {
    case 'time':
      return { endCondition: END_CONDITIONS.time, endConditionValue: quantity.seconds, preferredEndConditionUnit: null }
    case 'distance':
      return {
        endCondition: END_CONDITIONS.distance,
        endConditionValue: quantity.meters,
        preferredEndConditionUnit: { unitKey: quantity.meters % 1000 === 0 ? 'kilometer' : 'meter' },
      }
    case 'lap':
      return { endCondition: END_CONDITIONS.lap, endConditionValue: null, preferredEndConditionUnit: null }
  }
}

const targetOf = (target?: ResolvedTarget) => {
  if (!target) return { targetType: TARGET_TYPES.none, targetValueOne: null, targetValueTwo: null }
  if (target.kind === 'heartRate') {
    return { targetType: TARGET_TYPES.heartRate, targetValueOne: target.low, targetValueTwo: target.high }
  }
  // slower pace first, as speeds
  return {
    targetType: TARGET_TYPES.pace,
    targetValueOne: paceToMetersPerSecond(target.high),
    targetValueTwo: paceToMetersPerSecond(target.low),
  }
}

const toConnectSteps = (steps: CompiledStep[], counter: StepCounter, childStepId: number | null): ConnectStep[] =>
  steps.map((step): ConnectStep => {
    counter.order += 1
    if (step.type === 'repeat') {
      counter.child += 1
      const child = counter.child
      return {
        type: 'RepeatGroupDTO',
        stepId: null,
        stepOrder: counter.order,
        childStepId: child,
        stepType: { stepTypeId: STEP_TYPE_IDS.repeat, stepTypeKey: 'repeat' },
        endCondition: END_CONDITIONS.iterations,
        endConditionValue: step.count,
        numberOfIterations: step.count,
        smartRepeat: false,
        workoutSteps: toConnectSteps(step.steps, counter, child),
      }
    }
    return {
      type: 'ExecutableStepDTO',
      stepId: null,
      stepOrder: counter.order,
      childStepId,
      stepType: { stepTypeId: STEP_TYPE_IDS[step.kind], stepTypeKey: step.kind },
      ...endConditionOf(step.quantity),
      ...targetOf(step.target),
      zoneNumber: null,
      description: step.description ?? null,
    }
  })

/** The JSON the workout service expects for a compiled workout. */
export function toConnectPayload(workout: Workout): ConnectWorkout {
  return {
    sportType: RUNNING,
    workoutName: workout.name,
    description: connectDescription(workout.description, workout.scheduledDate),
    workoutSegments: [
      {
        segmentOrder: 1,
        sportType: RUNNING,
        workoutSteps: toConnectSteps(workout.steps, { order: 0, child: 0 }, null),
      },
    ],
  }
}

const quantityOf = (step: ConnectStep, where: string): Quantity => {
  const key = step.endCondition?.conditionTypeKey
  if (key === 'time' || key === 'distance') {
    const value = step.endConditionValue
    if (value === null || value === undefined || value <= 0) {
      throw new WorkoutConnectError(`${where}: ${key} step without an end condition value`)
    }
    return key === 'time' ? { type: 'time', seconds: Math.round(value) } : { type: 'distance', meters: Math.round(value) }
  }
  return { type: 'lap' }
}

const resolvedTargetOf = (step: ConnectStep): ResolvedTarget | undefined => {
  const key = step.targetType?.workoutTargetTypeKey
  const one = step.targetValueOne
  const two = step.targetValueTwo
  if (!one || !two || one <= 0 || two <= 0) return undefined

  if (key === TARGET_TYPES.pace.workoutTargetTypeKey) {
    return {
      kind: 'pace',
      low: Math.round(metersPerSecondToPace(Math.max(one, two))),
      high: Math.round(metersPerSecondToPace(Math.min(one, two))),
    }
  }
  if (key === TARGET_TYPES.heartRate.workoutTargetTypeKey) {
    return { kind: 'heartRate', low: Math.round(Math.min(one, two)), high: Math.round(Math.max(one, two)) }
  }
  return undefined
}

const fromConnectSteps = (steps: ConnectStep[], workoutName: string): CompiledStep[] =>
  [...steps]
    .sort((a, b) => (a.stepOrder ?? 0) - (b.stepOrder ?? 0))
    .map((step, index): CompiledStep => {
      const where = `${workoutName} step ${step.stepOrder ?? index + 1}`
      if (step.type === 'RepeatGroupDTO' || step.stepType.stepTypeKey === 'repeat') {
        const count = step.numberOfIterations ?? step.endConditionValue ?? 1
        return { type: 'repeat', count: Math.max(1, Math.round(count)), steps: fromConnectSteps(step.workoutSteps ?? [], workoutName) }
      }

      const key = step.stepType.stepTypeKey
      const target = resolvedTargetOf(step)
      const leaf: LeafStep<ResolvedTarget> = {
        type: 'step',
        kind: isStepKind(key) ? key : 'other',
        quantity: quantityOf(step, where),
        ...(target ? { target } : {}),
        ...(step.description ? { description: step.description } : {}),
      }
      return leaf
    })

/** A remote workout read back into the planner's compiled form. */
export function connectToWorkout(remote: ConnectWorkout): Workout {
  const { description, date } = readPinnedDate(remote.description)
  const steps = (remote.workoutSegments ?? [])
    .slice()
    .sort((a, b) => a.segmentOrder - b.segmentOrder)
    .flatMap((segment) => fromConnectSteps(segment.workoutSteps, remote.workoutName))

  return {
    name: remote.workoutName,
    ...(description ? { description } : {}),
    ...(date ? { scheduledDate: date } : {}),
    steps,
  }
}

/** Document step entries for a remote workout; targets come back as ranges. */
export const connectPayloadToSteps = (remote: ConnectWorkout): StepEntry[] => stepsToEntries(connectToWorkout(remote).steps)

const CLEAN_KEYS = new Set(['author', 'createdDate', 'ownerId', 'shared', 'updatedDate'])

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isEmptyContainer = (value: unknown): boolean =>
  (Array.isArray(value) && value.length === 0) || (isRecord(value) && Object.keys(value).length === 0)

/**
 * Copy of a remote record without bookkeeping fields, nulls and containers
 * left empty. Array items are cleaned but kept.
 */
export function cleanWorkoutData(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((item) => cleanWorkoutData(item))
  if (!isRecord(value)) return value

  const cleaned: Record<string, unknown> = {}
  for (const [key, v] of Object.entries(value)) {
    if (CLEAN_KEYS.has(key) || v === null || v === undefined || v === 'null') continue
    const next = cleanWorkoutData(v)
    if (isEmptyContainer(next)) continue
    cleaned[key] = next
  }
  return cleaned
}
