import { PlannerError, UnknownZoneReferenceError } from '../common/planner-errors'
import type { CompiledStep, ParsedStep, TargetRef } from '../steps/step.types'
import { paceToKmph } from '../utils/units'
import { ZoneResolver } from '../zones/zone-resolver'
import type { ResolvedTarget } from '../zones/zone.types'
import type { CompileOptions, PlanConfig, Workout } from './workout.types'

const TREADMILL_SUFFIX = '(T)'

export const isTreadmillName = (name: string): boolean => name.trimEnd().endsWith(TREADMILL_SUFFIX)

const resolveTarget = (target: TargetRef, resolver: ZoneResolver): ResolvedTarget => {
  if (target.source === 'literal') {
    return { kind: target.kind, ...resolver.resolveDefinition(target.definition, target.kind) }
  }
  if (!resolver.has(target.zone, target.kind)) {
    throw new UnknownZoneReferenceError(
      `Unknown ${target.kind === 'pace' ? 'pace' : 'heart rate'} zone '${target.zone}'`,
      { zone: target.zone, kind: target.kind },
    )
  }
  return { kind: target.kind, ...resolver.resolve(target.zone, target.kind) }
}

const resolveSteps = (steps: ParsedStep[], resolver: ZoneResolver): CompiledStep[] =>
  steps.map((step): CompiledStep => {
    if (step.type === 'repeat') {
      return { type: 'repeat', count: step.count, steps: resolveSteps(step.steps, resolver) }
    }
    const { target, ...rest } = step
    return target ? { ...rest, target: resolveTarget(target, resolver) } : rest
  })

/**
 * Distance steps with a pace target become time steps, using the middle of the
 * pace range rounded to 10 s, and gain the matching speed in their description.
 */
export const toTreadmill = (steps: CompiledStep[]): CompiledStep[] =>
  steps.map((step): CompiledStep => {
    if (step.type === 'repeat') return { ...step, steps: toTreadmill(step.steps) }
    if (step.quantity.type !== 'distance' || step.target?.kind !== 'pace') return step

    const pace = (step.target.low + step.target.high) / 2
    const seconds = Math.round(((step.quantity.meters / 1000) * pace) / 10) * 10
    const speed = `${paceToKmph(pace).toFixed(1)} kmph`
    return {
      ...step,
      quantity: { type: 'time', seconds },
      description: step.description ? `${step.description}, ${speed}` : speed,
    }
  })

/**
 * Build a workout from parsed steps: prefix the name, resolve every target and
 * apply the treadmill conversion when asked (or when the name ends in `(T)`).
 *
 * Pass a shared `resolver` to reuse zone resolutions across a plan.
 */
export function compileWorkout(
  name: string,
  steps: ParsedStep[],
  config: PlanConfig,
  options: CompileOptions = {},
  resolver: ZoneResolver = new ZoneResolver(config.zones, config.margins),
): Workout {
  const fullName = `${config.namePrefix}${name}`
  try {
    const resolved = resolveSteps(steps, resolver)
    const treadmill = options.treadmill === true || isTreadmillName(fullName)
    return {
      name: fullName,
      ...(options.description ? { description: options.description } : {}),
      ...(options.scheduledDate ? { scheduledDate: options.scheduledDate } : {}),
      steps: treadmill ? toTreadmill(resolved) : resolved,
    }
  } catch (err) {
    if (err instanceof PlannerError) throw err.withWorkout(fullName)
    throw err
  }
}
