import type { PipelineResult } from '@log-timeline/pipeline-common'

export type TableCell = string | number

/**
 * A logical result set handed to whatever persists or displays it.
 */
export interface ResultTable {
  name: string
  columns: string[]
  rows: TableCell[][]
}

export interface ResultTables {
  rawData: ResultTable
  runStatistics: ResultTable
  consolidatedSummary: ResultTable
}

/**
 * Lays the pipeline output out as the three result sets of the operation report.
 * Raw data keeps zero-duration records; the statistics tables never include them.
 */
export const buildResultTables = (result: PipelineResult): ResultTables => ({
  rawData: {
    name: 'Raw Data',
    columns: ['Run', 'Second (s)', 'Cumulative Second (s)', 'Operation', 'Duration (ms)'],
    rows: result.records.map((record) => [
      record.runIndex,
      record.runLocalSecond,
      record.cumulativeSecond,
      record.operation,
      record.durationMs,
    ]),
  },
  runStatistics: {
    name: 'Run Statistics',
    columns: [
      'Run',
      'Operation',
      'Count',
      'Mean Duration (ms)',
      'Min Duration (ms)',
      'Max Duration (ms)',
    ],
    rows: result.runStatistics.map((row) => [
      row.runIndex,
      row.operation,
      row.count,
      row.mean,
      row.min,
      row.max,
    ]),
  },
  consolidatedSummary: {
    name: 'Consolidated Summary',
    columns: [
      'Operation',
      'Total Count',
      'Average Duration (ms)',
      'Minimum Duration (ms)',
      'Maximum Duration (ms)',
    ],
    rows: result.operationStatistics.map((row) => [
      row.operation,
      row.count,
      row.mean,
      row.min,
      row.max,
    ]),
  },
})
