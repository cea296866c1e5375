import { groupByOperation, type NormalizedRecord } from '@log-timeline/pipeline-common'

export const DEFAULT_OUTLIER_FACTOR = 1.5

/**
 * Quantile by linear interpolation between the closest ranks of the sorted values.
 * @param values Sample values, in any order.
 * @param q Quantile in [0, 1].
 * @returns The interpolated quantile; NaN for an empty sample.
 */
export const quantile = (values: readonly number[], q: number): number => {
  if (values.length === 0) {
    return Number.NaN
  }
  const sorted = [...values].sort((a, b) => a - b)
  const position = (sorted.length - 1) * q
  const lower = Math.floor(position)
  const upper = Math.ceil(position)
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower)
}

export interface OutlierBounds {
  q1: number
  q3: number
  lower: number
  upper: number
}

export const computeOutlierBounds = (
  values: readonly number[],
  factor: number = DEFAULT_OUTLIER_FACTOR
): OutlierBounds => {
  const q1 = quantile(values, 0.25)
  const q3 = quantile(values, 0.75)
  const iqr = q3 - q1
  return { q1, q3, lower: q1 - factor * iqr, upper: q3 + factor * iqr }
}

/**
 * Drops records whose duration falls outside the IQR fences of their operation kind.
 * Kinds with fewer than two records are kept as they are.
 * @param records Records to filter.
 * @param factor Fence width as a multiple of the interquartile range.
 * @returns Surviving records grouped by operation kind in canonical order.
 */
export const filterOutliers = <T extends NormalizedRecord>(
  records: readonly T[],
  factor: number = DEFAULT_OUTLIER_FACTOR
): T[] => {
  const kept: T[] = []

  for (const partition of groupByOperation(records).values()) {
    if (partition.length < 2) {
      kept.push(...partition)
      continue
    }

    const { lower, upper } = computeOutlierBounds(
      partition.map((record) => record.durationMs),
      factor
    )
    kept.push(
      ...partition.filter((record) => record.durationMs >= lower && record.durationMs <= upper)
    )
  }

  return kept
}
