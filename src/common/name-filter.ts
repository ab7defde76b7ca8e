import { describeError, PlanDocumentError } from './planner-errors'

/** Compile a user-supplied name regex; an empty pattern means no filter. */
export const compileNameFilter = (pattern: string | undefined): RegExp | null => {
  if (!pattern) return null
  try {
    return new RegExp(pattern)
  } catch (err) {
    throw new PlanDocumentError(`Invalid name filter '${pattern}': ${describeError(err)}`, { filter: pattern })
  }
}
