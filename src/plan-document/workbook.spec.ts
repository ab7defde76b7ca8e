import { PlanDocumentError } from '../common/planner-errors'
import { compilePlan } from './plan-compiler'
import { parsePlanDocument } from './plan-document'
import { workbookToPlanDocument } from './workbook'
import type { WorkbookTables } from './workbook'

const tables: WorkbookTables = {
  config: [
    { Parameter: 'name_prefix', Value: 'HM25' },
    { Parameter: 'margins', Value: '0:05', Slower: null, 'HR Up': 3, 'HR Down': null },
  ],
  paces: [{ Name: 'tempo', Value: '4:30' }],
  heartRates: [{ Name: 'Z2', Value: '130-145' }],
  workouts: [
    {
      Week: 1,
      Session: 1,
      Description: 'Intervals',
      Steps: 'warmup: 15min @hr Z2; repeat 5:\n  steady: 400m @ tempo\n  cooldown: 10min',
      Date: null,
    },
    { Week: null, Session: null, Description: null, Steps: null },
    { Week: 1, Session: 2, Description: 'Long', Steps: 'strides: 20s', Date: '2025-02-06' },
  ],
}

describe('workbookToPlanDocument', () => {
  it('builds the plan document from the four tables', () => {
    const { document } = workbookToPlanDocument(tables)

    expect(document.config).toEqual({
      name_prefix: 'HM25 ',
      margins: { faster: '0:05', slower: '0:03', hr_up: 3, hr_down: 5 },
      paces: { tempo: '4:30' },
      heart_rates: { Z2: '130-145' },
    })
    expect(document.workouts).toEqual([
      {
        name: 'W01S01 Intervals',
        description: 'Intervals',
        steps: [{ warmup: '15min @hr Z2' }, { 'repeat 5': [{ interval: '400m @ tempo' }] }, { cooldown: '10min' }],
      },
      {
        name: 'W01S02 Long',
        description: 'Long',
        steps: [{ date: '2025-02-06' }, { other: '20s' }],
      },
    ])
  })

  it('reports conversions as warnings', () => {
    const { warnings } = workbookToPlanDocument(tables)

    expect(warnings).toEqual([
      "W01S01 Intervals: 'steady' converted to 'interval'",
      'W01S01 Intervals: cooldown inside a repeat moved after it',
      "W01S02 Long: unknown step kind 'strides' converted to 'other'",
    ])
  })

  it('compiles to the same workouts as the equivalent YAML', () => {
    const yaml = [
      'config:',
      '  name_prefix: "HM25 "',
      '  margins: { faster: "0:05", slower: "0:03", hr_up: 3, hr_down: 5 }',
      '  paces: { tempo: "4:30" }',
      '  heart_rates: { Z2: 130-145 }',
      '"W01S01 Intervals": # Intervals',
      '  - warmup: 15min @hr Z2',
      '  - repeat 5:',
      '      - interval: 400m @ tempo',
      '  - cooldown: 10min',
      '',
    ].join('\n')

    const fromTables = compilePlan(workbookToPlanDocument(tables).document, { nameFilter: 'S01' })
    const fromYaml = compilePlan(parsePlanDocument(yaml))

    expect(fromTables.workouts).toEqual(fromYaml.workouts)
    expect(fromTables.workouts[0]?.steps[1]).toEqual({
      type: 'repeat',
      count: 5,
      steps: [
        {
          type: 'step',
          kind: 'interval',
          quantity: { type: 'distance', meters: 400 },
          target: { kind: 'pace', low: 265, high: 273 },
        },
      ],
    })
  })

  it('rejects rows without week or session', () => {
    expect(() => workbookToPlanDocument({ workouts: [{ Week: 1, Session: 'x', Steps: 'rest' }] })).toThrow(
      'Row 2: week and session must be positive whole numbers',
    )
  })

  it('rejects duplicate sessions', () => {
    const rows = [
      { Week: 1, Session: 1, Steps: 'rest' },
      { Week: 1, Session: 1, Steps: 'rest' },
    ]

    expect(() => workbookToPlanDocument({ workouts: rows })).toThrow(PlanDocumentError)
  })
})
