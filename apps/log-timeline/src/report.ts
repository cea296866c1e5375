import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { PipelineResult, TrendFit } from '@log-timeline/pipeline-common'
import {
  buildResultTables,
  buildRunSeries,
  buildTrendLines,
  selectTrendRecords,
  type ResultTables,
  type RunSeries,
  type TrendLine,
} from '@log-timeline/core'

/**
 * Everything a presentation layer needs to chart or tabulate one analysis.
 */
export interface AnalysisReport {
  sources: string[]
  outlierFactor: number
  totals: {
    lines: number
    runs: number
    records: number
  }
  tables: ResultTables
  trends: TrendFit[]
  series: RunSeries[]
  trendLines: TrendLine[]
}

export const buildReport = (
  result: PipelineResult,
  sources: readonly string[],
  outlierFactor: number
): AnalysisReport => ({
  sources: [...sources],
  outlierFactor,
  totals: {
    lines: result.lineCount,
    runs: result.runs.length,
    records: result.records.length,
  },
  tables: buildResultTables(result),
  trends: result.trends,
  series: buildRunSeries(result.records),
  trendLines: buildTrendLines(selectTrendRecords(result.records, outlierFactor), result.trends),
})

/**
 * Writes the report as indented JSON, creating the parent directory when needed.
 */
export const writeReport = async (filePath: string, report: AnalysisReport): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true })
  await writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf8')
}
