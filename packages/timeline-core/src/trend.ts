import {
  groupByOperation,
  type NormalizedRecord,
  type TimelinePoint,
  type TrendFit,
} from '@log-timeline/pipeline-common'
import { hasPositiveDuration } from './aggregate'
import { DEFAULT_OUTLIER_FACTOR, filterOutliers } from './outliers'

export interface LineFit {
  slope: number
  intercept: number
}

/**
 * Ordinary least-squares fit of y against x.
 * When every x is the same the slope is 0 and the intercept is the mean of y.
 * @returns null for fewer than two points.
 */
export const fitLine = (points: readonly TimelinePoint[]): LineFit | null => {
  if (points.length < 2) {
    return null
  }

  const meanX = points.reduce((sum, point) => sum + point.x, 0) / points.length
  const meanY = points.reduce((sum, point) => sum + point.y, 0) / points.length

  let sxx = 0
  let sxy = 0
  for (const point of points) {
    const dx = point.x - meanX
    sxx += dx * dx
    sxy += dx * (point.y - meanY)
  }

  const slope = sxx === 0 ? 0 : sxy / sxx
  return { slope, intercept: meanY - slope * meanX }
}

/**
 * Records a trend is fitted on: positive durations with per-kind outliers removed.
 */
export const selectTrendRecords = (
  records: readonly NormalizedRecord[],
  factor: number = DEFAULT_OUTLIER_FACTOR
): NormalizedRecord[] => filterOutliers(records.filter(hasPositiveDuration), factor)

export const toTimelinePoint = (record: NormalizedRecord): TimelinePoint => ({
  x: record.cumulativeSecond,
  y: record.durationMs,
})

/**
 * Fits duration against cumulative second for each operation kind.
 * Kinds left with fewer than two records after outlier removal get no fit.
 * @param records Normalized records of every run.
 * @param factor Outlier fence width as a multiple of the interquartile range.
 * @returns One fit per eligible kind, in canonical kind order.
 */
export const fitTrends = (
  records: readonly NormalizedRecord[],
  factor: number = DEFAULT_OUTLIER_FACTOR
): TrendFit[] => {
  const fits: TrendFit[] = []

  for (const [operation, partition] of groupByOperation(selectTrendRecords(records, factor))) {
    const line = fitLine(partition.map(toTimelinePoint))
    if (line) {
      fits.push({ operation, ...line, pointCount: partition.length })
    }
  }

  return fits
}
