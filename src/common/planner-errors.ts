export type PlannerErrorCode =
  | 'MALFORMED_ZONE_EXPRESSION'
  | 'UNRESOLVED_ZONE'
  | 'STEP_SYNTAX'
  | 'UNKNOWN_ZONE_REFERENCE'
  | 'DUPLICATE_SESSION'
  | 'INVALID_SCHEDULE_DATE'
  | 'INSUFFICIENT_SCHEDULE_WINDOW'
  | 'INVALID_PLAN_DOCUMENT'

export type PlannerErrorContext = {
  workoutName?: string
  step?: string
  lineNumber?: number
  column?: number
  row?: number
  zone?: string
  [key: string]: string | number | string[] | undefined
}

/**
 * Base of every parse, compile and scheduling failure.
 * `context` carries what a user needs to find the offending input.
 */
export abstract class PlannerError extends Error {
  abstract readonly code: PlannerErrorCode

  constructor(
    message: string,
    public readonly context: PlannerErrorContext = {},
  ) {
    super(message)
    this.name = new.target.name
  }

  /** Tag the error with the workout being compiled. Keeps the first tag. */
  withWorkout(workoutName: string): this {
    if (this.context.workoutName === undefined) {
      this.context.workoutName = workoutName
      this.message = `${workoutName}: ${this.message}`
    }
    return this
  }
}

export class MalformedZoneExpressionError extends PlannerError {
  readonly code = 'MALFORMED_ZONE_EXPRESSION'
}

/** Base zone missing or zone references forming a cycle. */
export class UnresolvedZoneError extends PlannerError {
  readonly code = 'UNRESOLVED_ZONE'
}

export class StepSyntaxError extends PlannerError {
  readonly code = 'STEP_SYNTAX'
}

export class UnknownZoneReferenceError extends PlannerError {
  readonly code = 'UNKNOWN_ZONE_REFERENCE'
}

export class DuplicateSessionError extends PlannerError {
  readonly code = 'DUPLICATE_SESSION'
}

export class InvalidScheduleDateError extends PlannerError {
  readonly code = 'INVALID_SCHEDULE_DATE'
}

export class InsufficientScheduleWindowError extends PlannerError {
  readonly code = 'INSUFFICIENT_SCHEDULE_WINDOW'
}

export class PlanDocumentError extends PlannerError {
  readonly code = 'INVALID_PLAN_DOCUMENT'
}

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err)
