import type { CompiledStep, LeafStep, Quantity } from '../steps/step.types'
import { formatClock, formatDistance, formatDuration, formatPace } from '../utils/units'
import type { Workout } from '../workout-compiler/workout.types'
import type { Margins, ResolvedTarget, ZoneDefinition, ZoneKind, ZoneTable } from '../zones/zone.types'
import type { CompiledPlan, PlanDocument, RawMargins, RawPlanConfig, StepEntry } from './plan-document.types'

export const formatZoneDefinition = (definition: ZoneDefinition, kind: ZoneKind): string | number => {
  const value = (v: number) => (kind === 'pace' ? formatPace(v) : String(v))
  switch (definition.type) {
    case 'fixed':
      return kind === 'pace' ? formatPace(definition.value) : definition.value
    case 'range':
      return `${value(definition.low)}-${value(definition.high)}`
    case 'percentage':
      return definition.lowPct === definition.highPct
        ? `${definition.lowPct}% ${definition.base}`
        : `${definition.lowPct}-${definition.highPct}% ${definition.base}`
    case 'distanceTime':
      return `${formatDistance(definition.meters)} in ${formatClock(definition.seconds)}`
  }
}

const formatQuantity = (quantity: Quantity): string => {
  switch (quantity.type) {
    case 'time':
      return formatDuration(quantity.seconds)
    case 'distance':
      return formatDistance(quantity.meters)
    case 'lap':
      return 'lap'
  }
}

// always written as a range so recompiling never widens it again
const formatTarget = (target: ResolvedTarget): string =>
  target.kind === 'pace'
    ? `@ ${formatPace(target.low)}-${formatPace(target.high)}`
    : `@hr ${target.low}-${target.high}`

export const formatStepExpression = (step: LeafStep<ResolvedTarget>): string =>
  [formatQuantity(step.quantity), step.target ? formatTarget(step.target) : '', step.description ? `-- ${step.description}` : '']
    .filter(Boolean)
    .join(' ')

export const stepsToEntries = (steps: CompiledStep[]): StepEntry[] =>
  steps.map((step): StepEntry =>
    step.type === 'repeat'
      ? { [`repeat ${step.count}`]: stepsToEntries(step.steps) }
      : { [step.kind]: formatStepExpression(step) },
  )

const zoneTableToRaw = (table: ZoneTable, kind: ZoneKind): Record<string, string | number> =>
  Object.fromEntries(Object.entries(table).map(([name, definition]) => [name, formatZoneDefinition(definition, kind)]))

const marginsToRaw = (margins: Margins): RawMargins => ({
  faster: formatPace(margins.fasterSec),
  slower: formatPace(margins.slowerSec),
  hr_up: margins.hrUpPct,
  hr_down: margins.hrDownPct,
})

const stripPrefix = (name: string, prefix: string): string =>
  prefix && name.startsWith(prefix) ? name.slice(prefix.length) : name

export const workoutToDocumentEntry = (workout: Workout, prefix = '') => ({
  name: stripPrefix(workout.name, prefix),
  ...(workout.description ? { description: workout.description } : {}),
  steps: [...(workout.scheduledDate ? [{ date: workout.scheduledDate }] : []), ...stepsToEntries(workout.steps)],
})

/**
 * Write a compiled plan back in document shape. Targets are emitted as the
 * resolved ranges, so compiling the result gives the same workouts again.
 */
export function serializePlan(plan: CompiledPlan): PlanDocument {
  const { config } = plan
  const raw: RawPlanConfig = {
    ...(config.namePrefix ? { name_prefix: config.namePrefix } : {}),
    paces: zoneTableToRaw(config.zones.paces, 'pace'),
    heart_rates: zoneTableToRaw(config.zones.heartRates, 'heartRate'),
    margins: marginsToRaw(config.margins),
  }
  return {
    config: raw,
    workouts: plan.workouts.map((workout) => workoutToDocumentEntry(workout, config.namePrefix)),
  }
}
