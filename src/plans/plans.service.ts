import { Inject, Injectable, Logger } from '@nestjs/common'
import { stringify } from 'yaml'
import { runBatch } from '../common/batch-summary'
import type { BatchSummary } from '../common/batch-summary'
import { compileNameFilter } from '../common/name-filter'
import { cleanWorkoutData, connectToWorkout, toConnectPayload } from '../connect/connect-payload'
import { WORKOUT_CONNECT } from '../connect/connect.types'
import type { ConnectWorkout, ConnectWorkoutSummary, WorkoutConnect } from '../connect/connect.types'
import { compilePlan } from '../plan-document/plan-compiler'
import { parsePlanDocument, stringifyPlanDocument, toPlanDocument } from '../plan-document/plan-document'
import type { CompiledPlan, PlanDocument } from '../plan-document/plan-document.types'
import { workoutToDocumentEntry } from '../plan-document/plan-serializer'
import { workbookToPlanDocument } from '../plan-document/workbook'
import type { WorkbookTables } from '../plan-document/workbook'
import { exportWorkoutTcx, tcxFileName } from '../utils/tcxExporter'
import type { Workout } from '../workout-compiler/workout.types'

export type CompilePlanRequest = {
  // YAML text, or the same document already decoded from JSON
  document: string | Record<string, unknown>
  nameFilter?: string
  treadmill?: boolean
}

export type ImportPlanRequest = CompilePlanRequest & {
  // update workouts that already exist under the same name
  replace?: boolean
}

export const EXPORT_FORMATS = ['json', 'yaml', 'document'] as const
export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export type WorkoutSelection = {
  ids?: string[]
  nameFilter?: string
}

export type ExportPlanRequest = WorkoutSelection & {
  format?: ExportFormat
  clean?: boolean
  // stripped from names in the `document` format
  namePrefix?: string
}

export type CompileResult = {
  workouts: Workout[]
  payloads: ConnectWorkout[]
  warnings: string[]
}

export type ImportResult = {
  summary: BatchSummary
  warnings: string[]
}

export type ExportResult = {
  format: ExportFormat
  count: number
  content: string
  summary: BatchSummary
}

export type DeleteResult = {
  summary: BatchSummary
  warnings: string[]
}

export type TcxFile = {
  name: string
  fileName: string
  content: string
}

export type WorkbookResult = {
  document: string
  warnings: string[]
}

const WORKOUT_ID_RE = /^\d{9,10}$/

@Injectable()
export class PlansService {
  private readonly logger = new Logger(PlansService.name)

  constructor(@Inject(WORKOUT_CONNECT) private readonly connect: WorkoutConnect) {}

  /** Dry run: compiled workouts and the payloads an import would send. */
  compile(request: CompilePlanRequest): CompileResult {
    const plan = this.compilePlan(request)
    return { workouts: plan.workouts, payloads: plan.workouts.map(toConnectPayload), warnings: plan.warnings }
  }

  /**
   * Compile the whole plan, then create each workout remotely. A compile error
   * aborts before anything is sent.
   */
  async import(request: ImportPlanRequest): Promise<ImportResult> {
    const plan = this.compilePlan(request)

    const existing = new Map<string, string>()
    if (request.replace) {
      for (const w of await this.connect.listWorkouts()) existing.set(w.workoutName, w.workoutId)
    }

    const summary = await runBatch(
      plan.workouts,
      (w) => w.name,
      async (workout) => {
        const payload = toConnectPayload(workout)
        const id = existing.get(workout.name)
        if (id !== undefined) {
          await this.connect.updateWorkout(id, payload)
        } else {
          await this.connect.createWorkout(payload)
        }
        return 'done'
      },
      this.logger,
    )

    this.logger.log(`imported ${summary.succeeded.length} of ${plan.workouts.length} workouts`)
    return { summary, warnings: plan.warnings }
  }

  /**
   * Read the selected workouts one by one. A workout that cannot be read is
   * recorded in the summary and left out of the content.
   */
  async export(request: ExportPlanRequest): Promise<ExportResult> {
    const format = request.format ?? 'json'
    const { selected } = await this.select(request)

    if (format === 'document') {
      const prefix = request.namePrefix ?? ''
      const workouts: Workout[] = []
      const summary = await runBatch(
        selected,
        (w) => w.workoutName,
        async (w) => {
          workouts.push(connectToWorkout(await this.connect.getWorkout(w.workoutId)))
          return 'done'
        },
        this.logger,
      )
      const document: PlanDocument = {
        config: prefix ? { name_prefix: prefix } : {},
        workouts: workouts.map((w) => workoutToDocumentEntry(w, prefix)),
      }
      return { format, count: workouts.length, content: stringifyPlanDocument(document), summary }
    }

    const records: unknown[] = []
    const summary = await runBatch(
      selected,
      (w) => w.workoutName,
      async (w) => {
        const record = await this.connect.getWorkoutRecord(w.workoutId)
        records.push(request.clean ? cleanWorkoutData(record) : record)
        return 'done'
      },
      this.logger,
    )
    const content = format === 'yaml' ? stringify(records) : JSON.stringify(records, null, 2)
    return { format, count: records.length, content, summary }
  }

  /** Delete by id (9 or 10 digits; others are ignored with a warning) and/or name. */
  async delete(request: WorkoutSelection): Promise<DeleteResult> {
    const warnings: string[] = []
    const targets = new Map<string, string>()

    for (const id of request.ids ?? []) {
      if (!WORKOUT_ID_RE.test(id)) {
        const warning = `Ignoring invalid workout id '${id}': must be a 9 or 10 digit number`
        this.logger.warn(warning)
        warnings.push(warning)
        continue
      }
      targets.set(id, id)
    }

    const filter = compileNameFilter(request.nameFilter)
    if (filter) {
      for (const w of await this.connect.listWorkouts()) {
        if (filter.test(w.workoutName)) targets.set(w.workoutId, w.workoutName)
      }
    }

    if (targets.size === 0) warnings.push('No workouts matched')

    const summary = await runBatch(
      [...targets.entries()],
      ([id, name]) => (name === id ? id : `${name} (${id})`),
      async ([id]) => {
        await this.connect.deleteWorkout(id)
        return 'done'
      },
      this.logger,
    )
    return { summary, warnings }
  }

  toTcx(request: CompilePlanRequest): TcxFile[] {
    return this.compilePlan(request).workouts.map((workout) => ({
      name: workout.name,
      fileName: tcxFileName(workout),
      content: exportWorkoutTcx(workout),
    }))
  }

  convertWorkbook(tables: WorkbookTables): WorkbookResult {
    const { document, warnings } = workbookToPlanDocument(tables)
    warnings.forEach((w) => this.logger.warn(w))
    return { document: stringifyPlanDocument(document), warnings }
  }

  private compilePlan(request: CompilePlanRequest): CompiledPlan {
    const document = typeof request.document === 'string' ? parsePlanDocument(request.document) : toPlanDocument(request.document)
    const plan = compilePlan(document, { nameFilter: request.nameFilter, treadmill: request.treadmill })
    plan.warnings.forEach((w) => this.logger.warn(w))
    return plan
  }

  // ids win over the name filter
  private async select(request: WorkoutSelection): Promise<{ selected: ConnectWorkoutSummary[] }> {
    const all = await this.connect.listWorkouts()
    if (request.ids && request.ids.length > 0) {
      const ids = new Set(request.ids)
      return { selected: all.filter((w) => ids.has(w.workoutId)) }
    }
    const filter = compileNameFilter(request.nameFilter)
    return { selected: filter ? all.filter((w) => filter.test(w.workoutName)) : all }
  }
}
