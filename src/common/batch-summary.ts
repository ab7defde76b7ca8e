import type { Logger } from '@nestjs/common'
import { describeError } from './planner-errors'

export type BatchFailure = {
  name: string
  error: string
}

export type BatchSummary = {
  succeeded: string[]
  skipped: string[]
  failed: BatchFailure[]
}

export type BatchOutcome = 'done' | 'skipped'

/**
 * Run `action` for each item strictly in order. A failing item is recorded and
 * the batch moves on to the next one.
 */
export async function runBatch<T>(
  items: readonly T[],
  nameOf: (item: T) => string,
  action: (item: T) => Promise<BatchOutcome>,
  logger?: Logger,
): Promise<BatchSummary> {
  const summary: BatchSummary = { succeeded: [], skipped: [], failed: [] }

  for (const item of items) {
    const name = nameOf(item)
    try {
      const outcome = await action(item)
      if (outcome === 'skipped') {
        summary.skipped.push(name)
        logger?.debug(`skipped ${name}`)
      } else {
        summary.succeeded.push(name)
        logger?.log(name)
      }
    } catch (err) {
      const error = describeError(err)
      summary.failed.push({ name, error })
      logger?.error(`${name}: ${error}`)
    }
  }

  return summary
}
