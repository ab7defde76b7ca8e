import { XMLBuilder } from 'fast-xml-parser'
import type { CompiledStep, LeafStep, Quantity } from '../steps/step.types'
import type { Workout } from '../workout-compiler/workout.types'
import type { ResolvedTarget } from '../zones/zone.types'
import { paceToMetersPerSecond } from './units'

type XmlNode = { [key: string]: string | number | XmlNode | XmlNode[] }

const TCX_NS = 'http://www.garmin.com/xmlschemas/TrainingCenterDatabase/v2'
const XSI_NS = 'http://www.w3.org/2001/XMLSchema-instance'

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
})

const typed = (type: string, body: XmlNode = {}): XmlNode => ({ '@_xsi:type': type, ...body })

const round2 = (n: number) => Math.round(n * 100) / 100

const capitalize = (text: string) => text.charAt(0).toUpperCase() + text.slice(1)

const durationOf = (quantity: Quantity): XmlNode => {
  switch (quantity.type) {
    case 'time':
      return typed('Time_t', { Seconds: quantity.seconds })
    case 'distance':
      return typed('Distance_t', { Meters: quantity.meters })
    case 'lap':
      return typed('UserInitiated_t')
  }
}

const targetOf = (target?: ResolvedTarget): XmlNode => {
  if (!target) return typed('None_t')
  if (target.kind === 'heartRate') {
    return typed('HeartRate_t', {
      HeartRateZone: typed('CustomHeartRateZone_t', {
        Low: typed('HeartRateInBeatsPerMinute_t', { Value: target.low }),
        High: typed('HeartRateInBeatsPerMinute_t', { Value: target.high }),
      }),
    })
  }
  return typed('Speed_t', {
    SpeedZone: typed('CustomSpeedZone_t', {
      LowInMetersPerSecond: round2(paceToMetersPerSecond(target.high)),
      HighInMetersPerSecond: round2(paceToMetersPerSecond(target.low)),
    }),
  })
}

const leafNode = (step: LeafStep<ResolvedTarget>, stepId: number): XmlNode => ({
  StepId: stepId,
  Name: capitalize(step.kind),
  Duration: durationOf(step.quantity),
  Intensity: step.kind === 'rest' || step.kind === 'recovery' ? 'Resting' : 'Active',
  Target: targetOf(step.target),
})

const stepNodes = (steps: CompiledStep[], counter: { id: number }): XmlNode[] =>
  steps.map((step) => {
    counter.id += 1
    const stepId = counter.id
    if (step.type === 'repeat') {
      return typed('Repeat_t', {
        StepId: stepId,
        Repetitions: step.count,
        Child: stepNodes(step.steps, counter),
      })
    }
    return typed('Step_t', leafNode(step, stepId))
  })

/** One workout as a TCX document with a single `Workout`. */
export function exportWorkoutTcx(workout: Workout): string {
  const body: XmlNode = {
    '@_Sport': 'Running',
    Name: workout.name,
    Step: stepNodes(workout.steps, { id: 0 }),
  }
  if (workout.description) body.Notes = workout.description

  const doc: XmlNode = {
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    TrainingCenterDatabase: {
      '@_xmlns': TCX_NS,
      '@_xmlns:xsi': XSI_NS,
      Workouts: { Workout: body },
    },
  }
  return builder.build(doc)
}

/** File name for a workout's TCX export. */
export const tcxFileName = (workout: Workout): string =>
  `${workout.name.replace(/[^\w.-]+/g, '_').replace(/^_+|_+$/g, '') || 'workout'}.tcx`
