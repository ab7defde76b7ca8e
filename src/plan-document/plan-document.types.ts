import type { PlanConfig, Workout } from '../workout-compiler/workout.types'

export type StepEntryValue = string | number | null | StepEntry[] | { steps: StepEntry[] }

/**
 * One item of a workout's step list: `{ interval: '1km @ tempo' }`,
 * `{ 'repeat 4': [...] }`, `{ repeat: 4, steps: [...] }` or `{ date: '2025-03-01' }`.
 */
export type StepEntry = { [key: string]: StepEntryValue }

export type RawMargins = {
  faster?: string | number
  slower?: string | number
  hr_up?: string | number
  hr_down?: string | number
}

export type RawPlanConfig = {
  name_prefix?: string
  paces?: Record<string, string | number>
  heart_rates?: Record<string, string | number>
  margins?: RawMargins
}

export type PlanDocumentWorkout = {
  name: string
  description?: string
  steps: StepEntry[]
}

export type PlanDocument = {
  config: RawPlanConfig
  workouts: PlanDocumentWorkout[]
}

export type CompilePlanOptions = {
  // regex matched against the workout key as written in the document
  nameFilter?: string
  treadmill?: boolean
}

export type CompiledPlan = {
  config: PlanConfig
  workouts: Workout[]
  warnings: string[]
}
