import {
  compareOperations,
  type DurationStats,
  type NormalizedRecord,
  type OperationKind,
  type OperationStats,
  type RunOperationStats,
} from '@log-timeline/pipeline-common'

interface RunningStats {
  count: number
  sum: number
  min: number
  max: number
}

/**
 * Zero durations stay in the raw records but never reach the statistics.
 */
export const hasPositiveDuration = (record: NormalizedRecord): boolean => record.durationMs > 0

const accumulate = (current: RunningStats | undefined, value: number): RunningStats => {
  if (!current) {
    return { count: 1, sum: value, min: value, max: value }
  }
  current.count += 1
  current.sum += value
  current.min = Math.min(current.min, value)
  current.max = Math.max(current.max, value)
  return current
}

const toDurationStats = (stats: RunningStats): DurationStats => ({
  count: stats.count,
  mean: stats.sum / stats.count,
  min: stats.min,
  max: stats.max,
})

/**
 * Statistics per (run, operation kind), ordered by run index then canonical kind order.
 * Groups without a positive duration produce no row.
 */
export const computeRunStatistics = (records: readonly NormalizedRecord[]): RunOperationStats[] => {
  const groups = new Map<string, { runIndex: number; operation: OperationKind; stats: RunningStats }>()

  for (const record of records) {
    if (!hasPositiveDuration(record)) {
      continue
    }
    const key = `${record.runIndex}:${record.operation}`
    const group = groups.get(key)
    if (group) {
      accumulate(group.stats, record.durationMs)
    } else {
      groups.set(key, {
        runIndex: record.runIndex,
        operation: record.operation,
        stats: accumulate(undefined, record.durationMs),
      })
    }
  }

  return Array.from(groups.values())
    .sort((a, b) => a.runIndex - b.runIndex || compareOperations(a.operation, b.operation))
    .map((group) => ({
      runIndex: group.runIndex,
      operation: group.operation,
      ...toDurationStats(group.stats),
    }))
}

/**
 * Statistics per operation kind across all runs, in canonical kind order.
 */
export const computeOperationStatistics = (
  records: readonly NormalizedRecord[]
): OperationStats[] => {
  const groups = new Map<OperationKind, RunningStats>()

  for (const record of records) {
    if (hasPositiveDuration(record)) {
      groups.set(record.operation, accumulate(groups.get(record.operation), record.durationMs))
    }
  }

  return Array.from(groups.entries())
    .sort(([a], [b]) => compareOperations(a, b))
    .map(([operation, stats]) => ({ operation, ...toDurationStats(stats) }))
}
