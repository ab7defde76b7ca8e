import { PlanDocumentError } from '../common/planner-errors'
import { isStepKind, outlineSteps, REPEAT_HEADER_RE } from '../steps/step-parser'
import type { StepOutline } from '../steps/step.types'
import { isIsoDate } from '../utils/dates'
import type { PlanDocument, PlanDocumentWorkout, RawMargins, RawPlanConfig, StepEntry } from './plan-document.types'

export type WorkbookCell = string | number | boolean | null | undefined
export type WorkbookRow = Record<string, WorkbookCell>

/** Sheets already read into rows keyed by their header cells. */
export type WorkbookTables = {
  config?: WorkbookRow[]
  paces?: WorkbookRow[]
  heartRates?: WorkbookRow[]
  workouts: WorkbookRow[]
}

export const DEFAULT_WORKBOOK_MARGINS: Required<RawMargins> = {
  faster: '0:03',
  slower: '0:03',
  hr_up: 5,
  hr_down: 5,
}

// header row is 1, data starts on row 2
const FIRST_DATA_ROW = 2

const normalizeHeader = (header: string) => header.trim().toLowerCase().replace(/[\s-]+/g, '_')

const cell = (row: WorkbookRow, column: string): WorkbookCell => {
  for (const [header, value] of Object.entries(row)) {
    if (normalizeHeader(header) === column) return value
  }
  return undefined
}

const text = (value: WorkbookCell): string => (value === null || value === undefined ? '' : String(value).trim())

const zoneValue = (value: WorkbookCell): string | number | null => {
  if (typeof value === 'number') return value
  const t = text(value)
  return t ? t : null
}

const readConfig = (rows: WorkbookRow[]): RawPlanConfig => {
  const margins: RawMargins = { ...DEFAULT_WORKBOOK_MARGINS }
  let prefix = ''

  for (const row of rows) {
    const parameter = text(cell(row, 'parameter')).toLowerCase()
    if (parameter === 'name_prefix') {
      prefix = text(cell(row, 'value'))
    } else if (parameter === 'margins') {
      const faster = zoneValue(cell(row, 'value'))
      const slower = zoneValue(cell(row, 'slower'))
      const up = zoneValue(cell(row, 'hr_up'))
      const down = zoneValue(cell(row, 'hr_down'))
      if (faster !== null) margins.faster = faster
      if (slower !== null) margins.slower = slower
      if (up !== null) margins.hr_up = up
      if (down !== null) margins.hr_down = down
    }
  }

  return {
    ...(prefix ? { name_prefix: `${prefix} ` } : {}),
    margins,
  }
}

const readZones = (rows: WorkbookRow[]): Record<string, string | number> => {
  const zones: Record<string, string | number> = {}
  for (const row of rows) {
    const name = text(cell(row, 'name'))
    const value = zoneValue(cell(row, 'value'))
    if (name && value !== null) zones[name] = value
  }
  return zones
}

const pad = (n: number) => String(n).padStart(2, '0')

const outlineToEntries = (lines: StepOutline[], workoutName: string, warnings: string[]): StepEntry[] => {
  const entries: StepEntry[] = []

  for (const line of lines) {
    const repeat = REPEAT_HEADER_RE.exec(line.text)
    if (repeat) {
      const children = outlineToEntries(line.children, workoutName, warnings)
      const cooldowns = children.filter((entry) => 'cooldown' in entry)
      if (cooldowns.length > 0) {
        warnings.push(`${workoutName}: cooldown inside a repeat moved after it`)
      }
      entries.push({ [`repeat ${repeat[1]}`]: children.filter((entry) => !('cooldown' in entry)) }, ...cooldowns)
      continue
    }

    const colon = line.text.indexOf(':')
    const rawKind = (colon >= 0 ? line.text.slice(0, colon) : line.text).trim().toLowerCase()
    const expression = colon >= 0 ? line.text.slice(colon + 1).trim() : ''

    let kind = rawKind
    if (rawKind === 'steady') {
      warnings.push(`${workoutName}: 'steady' converted to 'interval'`)
      kind = 'interval'
    } else if (!isStepKind(rawKind)) {
      warnings.push(`${workoutName}: unknown step kind '${rawKind}' converted to 'other'`)
      kind = 'other'
    }
    entries.push({ [kind]: expression || null })
  }

  return entries
}

const readWorkout = (row: WorkbookRow, rowNumber: number, warnings: string[]): PlanDocumentWorkout | null => {
  const weekText = text(cell(row, 'week'))
  const sessionText = text(cell(row, 'session'))
  const steps = text(cell(row, 'steps'))
  if (!weekText && !sessionText && !steps) return null

  const week = Number(weekText)
  const session = Number(sessionText)
  if (!Number.isInteger(week) || week < 1 || !Number.isInteger(session) || session < 1) {
    throw new PlanDocumentError(`Row ${rowNumber}: week and session must be positive whole numbers`, { row: rowNumber })
  }

  const description = text(cell(row, 'description'))
  const name = `W${pad(week)}S${pad(session)}${description ? ` ${description}` : ''}`
  if (!steps) throw new PlanDocumentError(`Row ${rowNumber}: '${name}' has no steps`, { row: rowNumber, workoutName: name })

  const date = text(cell(row, 'date'))
  if (date && !isIsoDate(date)) {
    throw new PlanDocumentError(`Row ${rowNumber}: invalid date '${date}', expected YYYY-MM-DD`, { row: rowNumber })
  }

  return {
    name,
    ...(description ? { description } : {}),
    steps: [...(date ? [{ date }] : []), ...outlineToEntries(outlineSteps(steps), name, warnings)],
  }
}

/**
 * Turn spreadsheet tables into the equivalent plan document.
 * Blank workout rows are skipped; missing margins fall back to 0:03 / 0:03 / 5% / 5%.
 */
export function workbookToPlanDocument(tables: WorkbookTables): { document: PlanDocument; warnings: string[] } {
  const warnings: string[] = []
  const paces = readZones(tables.paces ?? [])
  const heartRates = readZones(tables.heartRates ?? [])

  const config: RawPlanConfig = {
    ...readConfig(tables.config ?? []),
    ...(Object.keys(paces).length ? { paces } : {}),
    ...(Object.keys(heartRates).length ? { heart_rates: heartRates } : {}),
  }

  const workouts: PlanDocumentWorkout[] = []
  const seen = new Set<string>()
  tables.workouts.forEach((row, index) => {
    const workout = readWorkout(row, index + FIRST_DATA_ROW, warnings)
    if (!workout) return
    if (seen.has(workout.name)) {
      throw new PlanDocumentError(`Row ${index + FIRST_DATA_ROW}: duplicate workout '${workout.name}'`, {
        row: index + FIRST_DATA_ROW,
        workoutName: workout.name,
      })
    }
    seen.add(workout.name)
    workouts.push(workout)
  })

  return { document: { config, workouts }, warnings }
}
