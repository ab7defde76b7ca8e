import { compileNameFilter } from '../common/name-filter'
import { PlannerError } from '../common/planner-errors'
import { compileWorkout } from '../workout-compiler/workout-compiler'
import type { Workout } from '../workout-compiler/workout.types'
import { ZoneResolver } from '../zones/zone-resolver'
import { buildPlanConfig, documentWorkoutSteps, stripDateSuffix } from './plan-document'
import type { CompiledPlan, CompilePlanOptions, PlanDocument } from './plan-document.types'

/**
 * Compile every workout of a plan document. The first failing workout aborts the
 * whole plan; its error carries the workout name.
 */
export function compilePlan(document: PlanDocument, options: CompilePlanOptions = {}): CompiledPlan {
  const config = buildPlanConfig(document.config)
  const resolver = new ZoneResolver(config.zones, config.margins)
  const filter = compileNameFilter(options.nameFilter)
  const warnings: string[] = []

  const workouts = document.workouts
    .filter((workout) => !filter || filter.test(workout.name))
    .map((workout): Workout => {
      const name = stripDateSuffix(workout.name)
      const stepWarnings: string[] = []
      let parsed: ReturnType<typeof documentWorkoutSteps>
      try {
        parsed = documentWorkoutSteps(workout, { zones: resolver, warnings: stepWarnings })
      } catch (err) {
        if (err instanceof PlannerError) throw err.withWorkout(`${config.namePrefix}${name}`)
        throw err
      }

      const compiled = compileWorkout(
        name,
        parsed.steps,
        config,
        {
          treadmill: options.treadmill,
          description: workout.description,
          scheduledDate: parsed.scheduledDate,
        },
        resolver,
      )
      warnings.push(...stepWarnings.map((message) => `${compiled.name}: ${message}`))
      return compiled
    })

  return { config, workouts, warnings }
}
