export type ConnectSportType = {
  sportTypeId?: number
  sportTypeKey: string
}

export type ConnectStepType = {
  stepTypeId?: number
  stepTypeKey: string
}

export type ConnectEndCondition = {
  conditionTypeId?: number
  conditionTypeKey: string
}

export type ConnectTargetType = {
  workoutTargetTypeId?: number
  workoutTargetTypeKey: string
}

/** A step as the workout service stores it. Repeat groups nest `workoutSteps`. */
export type ConnectStep = {
  type: string
  stepId?: number | null
  stepOrder?: number
  childStepId?: number | null
  stepType: ConnectStepType
  endCondition?: ConnectEndCondition | null
  endConditionValue?: number | null
  preferredEndConditionUnit?: { unitKey: string } | null
  targetType?: ConnectTargetType | null
  // pace targets in m/s (slower, faster), heart rate in bpm (low, high)
  targetValueOne?: number | null
  targetValueTwo?: number | null
  zoneNumber?: number | null
  description?: string | null
  numberOfIterations?: number | null
  smartRepeat?: boolean
  workoutSteps?: ConnectStep[]
}

export type ConnectSegment = {
  segmentOrder: number
  sportType?: ConnectSportType
  workoutSteps: ConnectStep[]
}

export type ConnectWorkout = {
  workoutId?: string
  workoutName: string
  description?: string | null
  sportType?: ConnectSportType
  workoutSegments?: ConnectSegment[]
}

export type ConnectWorkoutSummary = {
  workoutId: string
  workoutName: string
  description?: string | null
}

/** One workout placed on the remote calendar. */
export type ScheduledWorkout = {
  scheduleId: string
  workoutId: string
  title: string
  date: string
}

/**
 * The external workout service. Ids are opaque strings; dates are YYYY-MM-DD.
 */
export interface WorkoutConnect {
  listWorkouts(): Promise<ConnectWorkoutSummary[]>
  getWorkout(id: string): Promise<ConnectWorkout>
  // raw record, extra fields included, for export
  getWorkoutRecord(id: string): Promise<Record<string, unknown>>
  createWorkout(payload: ConnectWorkout): Promise<ConnectWorkoutSummary>
  updateWorkout(id: string, payload: ConnectWorkout): Promise<void>
  deleteWorkout(id: string): Promise<void>
  scheduleWorkout(id: string, date: string): Promise<ScheduledWorkout>
  unscheduleWorkout(scheduleId: string): Promise<void>
  listScheduled(from: string, to: string): Promise<ScheduledWorkout[]>
}

export const WORKOUT_CONNECT = Symbol('WORKOUT_CONNECT')
