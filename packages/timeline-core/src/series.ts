import {
  compareOperations,
  groupByOperation,
  type NormalizedRecord,
  type OperationKind,
  type TimelinePoint,
  type TrendFit,
} from '@log-timeline/pipeline-common'
import { toTimelinePoint } from './trend'

export interface RunSeries {
  operation: OperationKind
  runIndex: number
  label: string
  points: TimelinePoint[]
}

export interface TrendLine {
  operation: OperationKind
  label: string
  slope: number
  points: TimelinePoint[]
}

const comparePoints = (a: TimelinePoint, b: TimelinePoint): number => a.x - b.x || a.y - b.y

/** Distinct run indices present in the records, ascending. */
export const runIds = (records: readonly NormalizedRecord[]): number[] =>
  Array.from(new Set(records.map((record) => record.runIndex))).sort((a, b) => a - b)

/**
 * One point series per (operation kind, run), points sorted by cumulative second.
 * Series are ordered by kind, then run.
 */
export const buildRunSeries = (records: readonly NormalizedRecord[]): RunSeries[] => {
  const series: RunSeries[] = []

  for (const [operation, partition] of groupByOperation(records)) {
    for (const runIndex of runIds(partition)) {
      const points = partition
        .filter((record) => record.runIndex === runIndex)
        .map(toTimelinePoint)
        .sort(comparePoints)
      series.push({ operation, runIndex, label: `${operation} - Run ${runIndex}`, points })
    }
  }

  return series
}

export const formatTrendLabel = (trend: TrendFit): string =>
  `${trend.operation} Trend (slope=${trend.slope.toFixed(6)})`

/**
 * Fitted values of each trend at the sorted cumulative seconds of the records it was fitted on.
 * @param trendRecords Records the trends were fitted on, after outlier removal.
 * @param trends Fits to evaluate.
 */
export const buildTrendLines = (
  trendRecords: readonly NormalizedRecord[],
  trends: readonly TrendFit[]
): TrendLine[] => {
  const partitions = groupByOperation(trendRecords)

  return [...trends]
    .sort((a, b) => compareOperations(a.operation, b.operation))
    .map((trend) => {
      const xs = (partitions.get(trend.operation) ?? [])
        .map((record) => record.cumulativeSecond)
        .sort((a, b) => a - b)
      return {
        operation: trend.operation,
        label: formatTrendLabel(trend),
        slope: trend.slope,
        points: xs.map((x) => ({ x, y: trend.slope * x + trend.intercept })),
      }
    })
}
