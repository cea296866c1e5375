import pc from 'picocolors'
import type { OperationStats, PipelineResult, TrendFit } from '@log-timeline/pipeline-common'
import { formatTrendLabel } from '@log-timeline/core'
import { ConfigError } from './config'

export type Colors = ReturnType<typeof pc.createColors>

export const LOG_PREFIX = '[log-timeline]'

const formatMs = (value: number): string => `${value.toFixed(2)}ms`

const formatStatsRow = (row: OperationStats, colors: Colors): string =>
  `  ${colors.cyan(row.operation.padEnd(6))} count=${row.count} mean=${formatMs(row.mean)} min=${formatMs(row.min)} max=${formatMs(row.max)}`

const formatTrendRow = (trend: TrendFit, colors: Colors): string =>
  `  ${colors.cyan(formatTrendLabel(trend))} intercept=${trend.intercept.toFixed(2)} points=${trend.pointCount}`

/**
 * Console summary of one pipeline run.
 * @param colors Colour functions; pass `pc.createColors(false)` for plain text.
 */
export const formatSummary = (result: PipelineResult, colors: Colors = pc): string[] => {
  const lines = [
    colors.blue(`${LOG_PREFIX} Read ${result.sourceCount} sources (${result.lineCount} lines)`),
  ]

  if (result.records.length === 0) {
    lines.push(colors.yellow(`${LOG_PREFIX} No operation records found.`))
    return lines
  }

  lines.push(
    colors.blue(
      `${LOG_PREFIX} Found ${result.runs.length} runs with ${result.records.length} operation records`
    ),
    colors.bold('Consolidated summary:')
  )

  if (result.operationStatistics.length === 0) {
    lines.push('  (no positive durations)')
  } else {
    lines.push(...result.operationStatistics.map((row) => formatStatsRow(row, colors)))
  }

  lines.push(colors.bold('Trends (outliers removed):'))
  if (result.trends.length === 0) {
    lines.push('  (not enough points)')
  } else {
    lines.push(...result.trends.map((trend) => formatTrendRow(trend, colors)))
  }

  return lines
}

/**
 * Error lines for a failed run. Only invalid flags or config values get the help hint.
 */
export const formatFailure = (error: unknown, colors: Colors = pc): string[] => {
  const message = error instanceof Error ? error.message : String(error)
  const lines = [colors.red(message)]
  if (error instanceof ConfigError) {
    lines.push('Use --help to see valid options.')
  }
  return lines
}
