import type { CompiledStep } from '../steps/step.types'
import type { Margins, ZoneTables } from '../zones/zone.types'

/** Plan-wide settings, shared by every workout compiled from one document. */
export type PlanConfig = Readonly<{
  namePrefix: string
  zones: ZoneTables
  margins: Margins
}>

export type Workout = {
  name: string
  description?: string
  // pinned by a leading `date:` pseudo-step, YYYY-MM-DD
  scheduledDate?: string
  steps: CompiledStep[]
}

export type CompileOptions = {
  treadmill?: boolean
  description?: string
  scheduledDate?: string
}
