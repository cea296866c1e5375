import type {
  MetricsCollector,
  PipelineResult,
  TextSource,
} from '@log-timeline/pipeline-common'
import { computeOperationStatistics, computeRunStatistics } from './aggregate'
import { extractSource, splitLines } from './extract'
import { normalizeRuns } from './normalize'
import { DEFAULT_OUTLIER_FACTOR } from './outliers'
import { segmentRuns } from './segment'
import { fitTrends } from './trend'

export interface PipelineOptions {
  /** Outlier fence width used before fitting trends. */
  outlierFactor?: number
  /** Receives per-stage timings when provided. */
  metrics?: MetricsCollector
}

const measure = <T>(metrics: MetricsCollector | undefined, stage: string, fn: () => T): T =>
  metrics ? metrics.recordStage(stage, fn) : fn()

/**
 * Runs every stage over sources that are already in their final order.
 * @param sources Log sources; their lines form one stream in array order.
 * @param options Outlier factor and optional stage metrics.
 * @returns Runs, normalized records, statistics and trend fits. All empty when no operation line matched.
 */
export const runPipeline = (
  sources: readonly TextSource[],
  options: PipelineOptions = {}
): PipelineResult => {
  const { metrics } = options
  const outlierFactor = options.outlierFactor ?? DEFAULT_OUTLIER_FACTOR

  let lineCount = 0
  const extracted = measure(metrics, 'extract', () =>
    sources.flatMap((source) => {
      lineCount += splitLines(source.text).length
      return extractSource(source.text)
    })
  )

  const runs = measure(metrics, 'segment', () => segmentRuns(extracted))
  const records = measure(metrics, 'normalize', () => normalizeRuns(runs))
  const runStatistics = measure(metrics, 'run-statistics', () => computeRunStatistics(records))
  const operationStatistics = measure(metrics, 'operation-statistics', () =>
    computeOperationStatistics(records)
  )
  const trends = measure(metrics, 'trend-fit', () => fitTrends(records, outlierFactor))

  return {
    sourceCount: sources.length,
    lineCount,
    runs,
    records,
    runStatistics,
    operationStatistics,
    trends,
  }
}
