import { XMLParser } from 'fast-xml-parser'
import type { Workout } from '../workout-compiler/workout.types'
import { exportWorkoutTcx, tcxFileName } from './tcxExporter'

const workout: Workout = {
  name: 'HM25 W01S01 Easy',
  description: 'Easy & steady',
  steps: [
    { type: 'step', kind: 'warmup', quantity: { type: 'time', seconds: 600 } },
    {
      type: 'repeat',
      count: 2,
      steps: [
        {
          type: 'step',
          kind: 'interval',
          quantity: { type: 'distance', meters: 1000 },
          target: { kind: 'pace', low: 240, high: 250 },
        },
        {
          type: 'step',
          kind: 'recovery',
          quantity: { type: 'time', seconds: 90 },
          target: { kind: 'heartRate', low: 120, high: 140 },
        },
      ],
    },
    { type: 'step', kind: 'cooldown', quantity: { type: 'lap' } },
  ],
}

const parser = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: '@_', parseTagValue: true })

describe('exportWorkoutTcx', () => {
  const xml = exportWorkoutTcx(workout)
  const doc = parser.parse(xml)
  const tcx = doc.TrainingCenterDatabase
  const body = tcx.Workouts.Workout

  it('writes one running workout with notes', () => {
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true)
    expect(tcx['@_xmlns']).toBe('http://www.garmin.com/xmlschemas/TrainingCenterDatabase/v2')
    expect(body['@_Sport']).toBe('Running')
    expect(body.Name).toBe('HM25 W01S01 Easy')
    expect(body.Notes).toBe('Easy & steady')
    expect(body.Step).toHaveLength(3)
  })

  it('writes leaf steps with duration, intensity and target', () => {
    const [warmup, , cooldown] = body.Step

    expect(warmup['@_xsi:type']).toBe('Step_t')
    expect(warmup.StepId).toBe(1)
    expect(warmup.Name).toBe('Warmup')
    expect(warmup.Duration).toEqual({ '@_xsi:type': 'Time_t', Seconds: 600 })
    expect(warmup.Intensity).toBe('Active')
    expect(warmup.Target['@_xsi:type']).toBe('None_t')

    expect(cooldown.StepId).toBe(5)
    expect(cooldown.Duration['@_xsi:type']).toBe('UserInitiated_t')
  })

  it('nests repeat children with speed and heart-rate zones', () => {
    const repeat = body.Step[1]
    const [interval, recovery] = repeat.Child

    expect(repeat['@_xsi:type']).toBe('Repeat_t')
    expect(repeat.StepId).toBe(2)
    expect(repeat.Repetitions).toBe(2)

    expect(interval.StepId).toBe(3)
    expect(interval.Duration).toEqual({ '@_xsi:type': 'Distance_t', Meters: 1000 })
    expect(interval.Target.SpeedZone).toEqual({
      '@_xsi:type': 'CustomSpeedZone_t',
      LowInMetersPerSecond: 4,
      HighInMetersPerSecond: 4.17,
    })

    expect(recovery.StepId).toBe(4)
    expect(recovery.Intensity).toBe('Resting')
    expect(recovery.Target.HeartRateZone.Low.Value).toBe(120)
    expect(recovery.Target.HeartRateZone.High.Value).toBe(140)
  })
})

describe('tcxFileName', () => {
  it('keeps file-safe characters only', () => {
    expect(tcxFileName(workout)).toBe('HM25_W01S01_Easy.tcx')
    expect(tcxFileName({ ...workout, name: 'HM25 W01S01 (T)' })).toBe('HM25_W01S01_T.tcx')
  })
})
