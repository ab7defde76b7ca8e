import { DuplicateSessionError } from '../common/planner-errors'

export type PlanIndexKey = {
  prefix: string
  week: number
  session: number
  description: string
}

export type PlanIndexEntry<T> = {
  key: PlanIndexKey
  workout: T
}

export type PlanPartition<T> = {
  entries: PlanIndexEntry<T>[]
  // names that do not follow `<prefix>W<ww>S<ss> <description>`
  excluded: string[]
}

const SESSION_RE = /^W(\d{2})S(\d{2})(?:\s+(.*))?$/

/**
 * Read the week/session key out of a workout name.
 *
 * The name must start with `prefix` and continue with `W<ww>S<ss>`, then either
 * end or carry a description after whitespace. Anything else returns null.
 */
export function parsePlanIndexKey(name: string, prefix: string): PlanIndexKey | null {
  if (!name.startsWith(prefix)) return null
  const m = SESSION_RE.exec(name.slice(prefix.length).trimStart())
  if (!m) return null

  const week = Number(m[1])
  const session = Number(m[2])
  if (week < 1 || session < 1) return null

  return { prefix, week, session, description: (m[3] ?? '').trim() }
}

export const compareIndexKeys = (a: PlanIndexKey, b: PlanIndexKey): number =>
  a.week - b.week || a.session - b.session

export const formatIndexKey = (key: Pick<PlanIndexKey, 'week' | 'session'>): string =>
  `W${String(key.week).padStart(2, '0')}S${String(key.session).padStart(2, '0')}`

/** Sorted plan entries plus the names left out. Duplicate week/session pairs fail. */
export function partitionPlan<T extends { name: string }>(workouts: T[], prefix: string): PlanPartition<T> {
  const entries: PlanIndexEntry<T>[] = []
  const excluded: string[] = []
  const seen = new Map<string, string>()

  for (const workout of workouts) {
    const key = parsePlanIndexKey(workout.name, prefix)
    if (!key) {
      excluded.push(workout.name)
      continue
    }

    const id = formatIndexKey(key)
    const previous = seen.get(id)
    if (previous !== undefined) {
      throw new DuplicateSessionError(`'${previous}' and '${workout.name}' are both ${prefix}${id}`, {
        workoutName: workout.name,
        session: id,
        names: [previous, workout.name],
      })
    }
    seen.set(id, workout.name)
    entries.push({ key, workout })
  }

  entries.sort((a, b) => compareIndexKeys(a.key, b.key))
  return { entries, excluded }
}

export const indexPlan = <T extends { name: string }>(workouts: T[], prefix: string): PlanIndexEntry<T>[] =>
  partitionPlan(workouts, prefix).entries
