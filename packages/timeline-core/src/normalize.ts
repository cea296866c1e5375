import type { NormalizedRecord, Run } from '@log-timeline/pipeline-common'

/**
 * Places every record on one timeline spanning all runs.
 *
 * Each run is shifted by the sum of `max(runLocalSecond) + 1` over the runs
 * before it, so every cumulative second of run N+1 is greater than every
 * cumulative second of run N.
 * @param runs Runs in timeline order.
 * @returns Records in run order, tagged with their 1-based run index.
 */
export const normalizeRuns = (runs: readonly Run[]): NormalizedRecord[] => {
  const normalized: NormalizedRecord[] = []
  let offset = 0

  runs.forEach((run, index) => {
    let maxSecond = -1
    for (const record of run) {
      normalized.push({
        ...record,
        runIndex: index + 1,
        cumulativeSecond: record.runLocalSecond + offset,
      })
      maxSecond = Math.max(maxSecond, record.runLocalSecond)
    }
    if (run.length > 0) {
      offset += maxSecond + 1
    }
  })

  return normalized
}
