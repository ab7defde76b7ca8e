import type { Workout } from '../workout-compiler/workout.types'
import {
  cleanWorkoutData,
  connectPayloadToSteps,
  connectToWorkout,
  readPinnedDate,
  toConnectPayload,
} from './connect-payload'
import type { ConnectWorkout } from './connect.types'
import { WorkoutConnectError } from './workout-connect.error'

const workout: Workout = {
  name: 'HM25 W01S01 Easy',
  description: 'Easy',
  scheduledDate: '2025-03-04',
  steps: [
    { type: 'step', kind: 'warmup', quantity: { type: 'time', seconds: 600 } },
    {
      type: 'repeat',
      count: 3,
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
          quantity: { type: 'lap' },
          target: { kind: 'heartRate', low: 120, high: 140 },
          description: 'jog',
        },
      ],
    },
    { type: 'step', kind: 'cooldown', quantity: { type: 'distance', meters: 1500 } },
  ],
}

describe('toConnectPayload', () => {
  const payload = toConnectPayload(workout)
  const steps = payload.workoutSegments?.[0]?.workoutSteps ?? []

  it('writes a running workout with the pinned date in the description', () => {
    expect(payload.workoutName).toBe('HM25 W01S01 Easy')
    expect(payload.description).toBe('Easy (Date: 2025-03-04)')
    expect(payload.sportType).toEqual({ sportTypeId: 1, sportTypeKey: 'running' })
    expect(steps).toHaveLength(3)
  })

  it('numbers steps in order and links repeat children', () => {
    const repeat = steps[1]
    const children = repeat?.workoutSteps ?? []

    expect(steps.map((s) => s.stepOrder)).toEqual([1, 2, 5])
    expect(repeat).toMatchObject({
      type: 'RepeatGroupDTO',
      childStepId: 1,
      stepType: { stepTypeId: 6, stepTypeKey: 'repeat' },
      endCondition: { conditionTypeId: 7, conditionTypeKey: 'iterations' },
      endConditionValue: 3,
      numberOfIterations: 3,
    })
    expect(children.map((s) => [s.stepOrder, s.childStepId])).toEqual([
      [3, 1],
      [4, 1],
    ])
    expect(steps[0]?.childStepId).toBeNull()
  })

  it('maps end conditions and targets', () => {
    const [warmup, repeat, cooldown] = steps
    const [interval, recovery] = repeat?.workoutSteps ?? []

    expect(warmup).toMatchObject({
      stepType: { stepTypeId: 1, stepTypeKey: 'warmup' },
      endCondition: { conditionTypeId: 2, conditionTypeKey: 'time' },
      endConditionValue: 600,
      targetType: { workoutTargetTypeId: 1, workoutTargetTypeKey: 'no.target' },
      targetValueOne: null,
    })
    expect(interval).toMatchObject({
      endCondition: { conditionTypeId: 3, conditionTypeKey: 'distance' },
      endConditionValue: 1000,
      preferredEndConditionUnit: { unitKey: 'kilometer' },
      targetType: { workoutTargetTypeId: 6, workoutTargetTypeKey: 'pace.zone' },
    })
    expect(interval?.targetValueOne).toBeCloseTo(4, 6)
    expect(interval?.targetValueTwo).toBeCloseTo(4.166667, 5)
    expect(recovery).toMatchObject({
      stepType: { stepTypeId: 4, stepTypeKey: 'recovery' },
      endCondition: { conditionTypeId: 1, conditionTypeKey: 'lap.button' },
      endConditionValue: null,
      targetType: { workoutTargetTypeId: 4, workoutTargetTypeKey: 'heart.rate.zone' },
      targetValueOne: 120,
      targetValueTwo: 140,
      description: 'jog',
    })
    expect(cooldown?.preferredEndConditionUnit).toEqual({ unitKey: 'meter' })
  })

  it('reads back into the same workout', () => {
    expect(connectToWorkout(payload)).toEqual(workout)
  })

  it('reads back into document step entries', () => {
    expect(connectPayloadToSteps(payload)).toEqual([
      { warmup: '10min' },
      { 'repeat 3': [{ interval: '1km @ 4:00-4:10' }, { recovery: 'lap @hr 120-140 -- jog' }] },
      { cooldown: '1500m' },
    ])
  })
})

describe('connectToWorkout', () => {
  it('maps unknown step types to other', () => {
    const remote: ConnectWorkout = {
      workoutName: 'Drills',
      workoutSegments: [
        {
          segmentOrder: 1,
          workoutSteps: [
            {
              type: 'ExecutableStepDTO',
              stepOrder: 1,
              stepType: { stepTypeKey: 'main' },
              endCondition: { conditionTypeKey: 'time' },
              endConditionValue: 300,
            },
          ],
        },
      ],
    }

    expect(connectToWorkout(remote).steps).toEqual([{ type: 'step', kind: 'other', quantity: { type: 'time', seconds: 300 } }])
  })

  it('fails on a timed step without a value', () => {
    const remote: ConnectWorkout = {
      workoutName: 'X',
      workoutSegments: [
        {
          segmentOrder: 1,
          workoutSteps: [
            { type: 'ExecutableStepDTO', stepOrder: 1, stepType: { stepTypeKey: 'interval' }, endCondition: { conditionTypeKey: 'time' } },
          ],
        },
      ],
    }

    expect(() => connectToWorkout(remote)).toThrow(WorkoutConnectError)
    expect(() => connectToWorkout(remote)).toThrow('X step 1: time step without an end condition value')
  })
})

describe('readPinnedDate', () => {
  it('splits the date off the description', () => {
    expect(readPinnedDate('Date: 2025-03-04')).toEqual({ date: '2025-03-04' })
    expect(readPinnedDate('Easy (Date: 2025-03-04)')).toEqual({ description: 'Easy', date: '2025-03-04' })
    expect(readPinnedDate('Easy')).toEqual({ description: 'Easy' })
    expect(readPinnedDate(null)).toEqual({})
  })
})

describe('cleanWorkoutData', () => {
  it('drops bookkeeping fields, nulls and emptied containers', () => {
    const record = {
      workoutId: 1,
      author: { displayName: 'someone' },
      description: null,
      sportTypeKey: 'null',
      meta: { createdDate: '2025-01-01' },
      workoutSegments: [
        {
          segmentOrder: 1,
          workoutSteps: [{ stepId: null, targetType: {}, description: 'a' }],
          extra: [],
        },
      ],
    }

    expect(cleanWorkoutData(record)).toEqual({
      workoutId: 1,
      workoutSegments: [{ segmentOrder: 1, workoutSteps: [{ description: 'a' }] }],
    })
  })
})
