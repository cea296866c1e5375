/**
 * Operation kinds reported by the benchmark workload, in canonical output order.
 */
export const OPERATION_KINDS = ['Insert', 'Update', 'Read'] as const

export type OperationKind = (typeof OPERATION_KINDS)[number]

/**
 * A single timed operation extracted from one log line.
 */
export interface OperationRecord {
  readonly operation: OperationKind
  /** Whole seconds elapsed since the start of the run that logged it. */
  readonly runLocalSecond: number
  readonly durationMs: number
}

/**
 * Tagged result of extracting one log line.
 */
export type ExtractionResult =
  | { readonly type: 'boundary' }
  | { readonly type: 'operation'; readonly record: OperationRecord }

/**
 * Records logged between two run boundaries.
 */
export type Run = readonly OperationRecord[]

/**
 * An operation record placed on the timeline spanning every run.
 */
export interface NormalizedRecord extends OperationRecord {
  /** 1-based position of the run in the input. */
  readonly runIndex: number
  readonly cumulativeSecond: number
}

/**
 * Descriptive statistics of the positive durations in one group.
 */
export interface DurationStats {
  count: number
  mean: number
  min: number
  max: number
}

export interface OperationStats extends DurationStats {
  operation: OperationKind
}

export interface RunOperationStats extends OperationStats {
  runIndex: number
}

/**
 * A plot point: cumulative second on x, duration in milliseconds on y.
 */
export interface TimelinePoint {
  x: number
  y: number
}

/**
 * Least-squares line of duration against cumulative second for one operation kind.
 */
export interface TrendFit {
  operation: OperationKind
  slope: number
  intercept: number
  pointCount: number
}

/**
 * A named block of log text, such as the contents of one log file.
 */
export interface TextSource {
  name: string
  text: string
}

export interface PipelineResult {
  sourceCount: number
  lineCount: number
  runs: Run[]
  records: NormalizedRecord[]
  runStatistics: RunOperationStats[]
  operationStatistics: OperationStats[]
  trends: TrendFit[]
}
