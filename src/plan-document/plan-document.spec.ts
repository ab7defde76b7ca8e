import { PlanDocumentError, StepSyntaxError, UnknownZoneReferenceError } from '../common/planner-errors'
import { compilePlan } from './plan-compiler'
import { buildPlanConfig, parsePlanDocument, stringifyPlanDocument } from './plan-document'
import { serializePlan } from './plan-serializer'

const PLAN = `
config:
  name_prefix: "HM25 "
  margins:
    faster: "0:03"
    slower: "0:03"
    hr_up: 5
    hr_down: 5
  paces:
    marathon: "5:30"
    tempo: 90% marathon
    race: 21.1km in 1:40:00
    easy: 6:00-6:30
  heart_rates:
    max_hr: 190
    Z2_HR: 70-80% max_hr

W01S01 Easy run: # keep it relaxed
  - warmup: 10min @hr Z2
  - interval: 5km @ easy
  - cooldown: 5min

"W01S02 Tempo (Data: 2025-02-05)":
  - date: 2025-02-05
  - warmup: 2km @ easy
  - repeat 3:
      - interval: 1km @ tempo -- strong
      - recovery: 90s
  - rest:
  - cooldown: lap
`

describe('parsePlanDocument', () => {
  it('reads config, workouts and key comments', () => {
    const document = parsePlanDocument(PLAN)

    expect(document.config.name_prefix).toBe('HM25 ')
    expect(document.workouts.map((w) => w.name)).toEqual(['W01S01 Easy run', 'W01S02 Tempo (Data: 2025-02-05)'])
    expect(document.workouts[0]?.description).toBe('keep it relaxed')
    expect(document.workouts[1]?.steps[0]).toEqual({ date: '2025-02-05' })
  })

  it('rejects documents that are not a mapping', () => {
    expect(() => parsePlanDocument('- just\n- a list\n')).toThrow(PlanDocumentError)
    expect(() => parsePlanDocument('a: [unclosed')).toThrow(PlanDocumentError)
  })

  it('rejects malformed margins', () => {
    expect(() => buildPlanConfig({ margins: { faster: 'soon' } })).toThrow("Invalid margin faster 'soon'")
  })
})

describe('compilePlan', () => {
  it('compiles every workout with the plan config', () => {
    const plan = compilePlan(parsePlanDocument(PLAN))

    expect(plan.config.margins).toEqual({ fasterSec: 3, slowerSec: 3, hrUpPct: 5, hrDownPct: 5 })
    expect(plan.workouts).toEqual([
      {
        name: 'HM25 W01S01 Easy run',
        description: 'keep it relaxed',
        steps: [
          {
            type: 'step',
            kind: 'warmup',
            quantity: { type: 'time', seconds: 600 },
            target: { kind: 'heartRate', low: 133, high: 152 },
          },
          {
            type: 'step',
            kind: 'interval',
            quantity: { type: 'distance', meters: 5000 },
            target: { kind: 'pace', low: 360, high: 390 },
          },
          { type: 'step', kind: 'cooldown', quantity: { type: 'time', seconds: 300 } },
        ],
      },
      {
        name: 'HM25 W01S02 Tempo',
        scheduledDate: '2025-02-05',
        steps: [
          {
            type: 'step',
            kind: 'warmup',
            quantity: { type: 'distance', meters: 2000 },
            target: { kind: 'pace', low: 360, high: 390 },
          },
          {
            type: 'repeat',
            count: 3,
            steps: [
              {
                type: 'step',
                kind: 'interval',
                quantity: { type: 'distance', meters: 1000 },
                target: { kind: 'pace', low: 294, high: 300 },
                description: 'strong',
              },
              { type: 'step', kind: 'recovery', quantity: { type: 'time', seconds: 90 } },
            ],
          },
          { type: 'step', kind: 'rest', quantity: { type: 'lap' } },
          { type: 'step', kind: 'cooldown', quantity: { type: 'lap' } },
        ],
      },
    ])
  })

  it('derives paces from distance and time', () => {
    const plan = compilePlan(parsePlanDocument(`${PLAN}\nW02S01 Race pace:\n  - interval: 3km @ race\n`))

    expect(plan.workouts[2]?.steps[0]).toMatchObject({ target: { kind: 'pace', low: 281, high: 287 } })
  })

  it('resolves zones whose names start with a digit', () => {
    const plan = compilePlan(parsePlanDocument('config:\n  paces:\n    10k: "4:30"\n\nW01S01 Intervals:\n  - interval: 2km @ 10k\n'))

    expect(plan.workouts[0]?.steps[0]).toMatchObject({ target: { kind: 'pace', low: 270, high: 270 } })
  })

  it('filters workouts by name', () => {
    const plan = compilePlan(parsePlanDocument(PLAN), { nameFilter: 'S02' })

    expect(plan.workouts.map((w) => w.name)).toEqual(['HM25 W01S02 Tempo'])
  })

  it('collects parser warnings with the workout name', () => {
    const plan = compilePlan(parsePlanDocument('W01S01 Steady:\n  - steady: 30min\n'))

    expect(plan.warnings).toEqual(["W01S01 Steady: 'steady' steps are compiled as 'interval'"])
  })

  it('fails the whole plan on one bad step and names the workout', () => {
    const document = parsePlanDocument(`${PLAN}\nW02S01 Broken:\n  - interval: 1km @ nowhere\n`)

    expect(() => compilePlan(document)).toThrow(UnknownZoneReferenceError)
    expect(() => compilePlan(document)).toThrow(/^HM25 W02S01 Broken: Unknown pace zone 'nowhere'/)
  })

  it('only accepts date as the first step', () => {
    const document = parsePlanDocument('W01S01:\n  - warmup: 5min\n  - date: 2025-02-05\n')

    expect(() => compilePlan(document)).toThrow(StepSyntaxError)
  })

  it('rejects an invalid pinned date', () => {
    const document = parsePlanDocument('W01S01:\n  - date: 2025-02-30\n  - warmup: 5min\n')

    expect(() => compilePlan(document)).toThrow("W01S01: Invalid date '2025-02-30', expected YYYY-MM-DD")
  })
})

describe('serializePlan', () => {
  it('compiles back to the same workouts', () => {
    const plan = compilePlan(parsePlanDocument(PLAN))

    const again = compilePlan(serializePlan(plan))

    expect(again.workouts).toEqual(plan.workouts)
  })

  it('survives a trip through YAML text, treadmill conversion included', () => {
    const plan = compilePlan(parsePlanDocument(PLAN), { treadmill: true })

    const text = stringifyPlanDocument(serializePlan(plan))
    const again = compilePlan(parsePlanDocument(text), { treadmill: true })

    expect(text).toContain('W01S01 Easy run: # keep it relaxed')
    expect(again.workouts).toEqual(plan.workouts)
  })

  it('writes resolved targets as ranges', () => {
    const plan = compilePlan(parsePlanDocument(PLAN), { nameFilter: 'S02' })

    expect(serializePlan(plan).workouts[0]?.steps).toEqual([
      { date: '2025-02-05' },
      { warmup: '2km @ 6:00-6:30' },
      { 'repeat 3': [{ interval: '1km @ 4:54-5:00 -- strong' }, { recovery: '90s' }] },
      { rest: 'lap' },
      { cooldown: 'lap' },
    ])
  })
})
