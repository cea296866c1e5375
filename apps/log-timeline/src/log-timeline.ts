/* eslint-disable no-console */
import pc from 'picocolors'
import { MetricsCollector } from '@log-timeline/pipeline-common'
import { runPipeline } from '@log-timeline/core'
import { loadConfigFile, parseArgs, resolveConfig, usage } from './config'
import { buildReport, writeReport } from './report'
import { orderSources, readSources } from './sources'
import { formatFailure, formatSummary, LOG_PREFIX } from './summary'

const run = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2))
  if (args.help) {
    console.log(usage)
    return
  }

  const fileConfig = args.configFile ? await loadConfigFile(args.configFile) : {}
  const config = resolveConfig(args, fileConfig)
  const log = (line: string): void => {
    if (!config.quiet) {
      console.log(line)
    }
  }

  if (config.sources.length === 0) {
    log(pc.yellow(`${LOG_PREFIX} No log sources given.`))
  }

  const metrics = new MetricsCollector('log-timeline')
  const paths = orderSources(config.sources, config.sortSources)
  const sources = await metrics.recordStageAsync('read', () => readSources(paths))
  const result = runPipeline(sources, { outlierFactor: config.outlierFactor, metrics })

  const report = metrics.recordStage('report', () =>
    buildReport(result, paths, config.outlierFactor)
  )
  await writeReport(config.outputFile, report)

  formatSummary(result).forEach(log)
  log(pc.green(`${LOG_PREFIX} Report written to ${config.outputFile}`))

  if (config.verbose && !config.quiet) {
    metrics.printSummary()
  }
}

run().catch((error: unknown) => {
  formatFailure(error).forEach((line) => console.error(line))
  process.exitCode = 1
})
