/* eslint-disable no-console */

/**
 * Timing and volume of one pipeline stage.
 */
export interface StageMetrics {
  stage: string
  items: number
  durationMs: number
  calls: number
}

/**
 * Snapshot of every stage recorded for one pipeline.
 */
export interface PipelineMetrics {
  pipelineName: string
  totalMs: number
  stages: StageMetrics[]
}

export interface MetricsCollectorOptions {
  now?: () => number
}

const countItems = (result: unknown): number => (Array.isArray(result) ? result.length : 1)

export class MetricsCollector {
  private readonly pipelineName: string
  private readonly now: () => number
  private stages = new Map<string, StageMetrics>()

  constructor(pipelineName: string, options: MetricsCollectorOptions = {}) {
    this.pipelineName = pipelineName
    this.now = options.now ?? (() => performance.now())
  }

  /**
   * Measure a synchronous stage. Array results count one item per element.
   */
  recordStage<T>(stage: string, fn: () => T): T {
    const start = this.now()
    const result = fn()
    this.add(stage, this.now() - start, countItems(result))
    return result
  }

  /**
   * Measure an async stage
   */
  async recordStageAsync<T>(stage: string, fn: () => Promise<T>): Promise<T> {
    const start = this.now()
    const result = await fn()
    this.add(stage, this.now() - start, countItems(result))
    return result
  }

  getMetrics(): PipelineMetrics {
    const stages = Array.from(this.stages.values(), (entry) => ({ ...entry }))
    return {
      pipelineName: this.pipelineName,
      totalMs: stages.reduce((sum, entry) => sum + entry.durationMs, 0),
      stages,
    }
  }

  reset(): void {
    this.stages = new Map()
  }

  /**
   * Summary lines in recording order, one per stage plus a total.
   */
  formatSummary(): string[] {
    const m = this.getMetrics()
    const lines = [`=== ${m.pipelineName} Metrics ===`]
    for (const entry of m.stages) {
      const share = m.totalMs > 0 ? (entry.durationMs / m.totalMs) * 100 : 0
      lines.push(
        `${entry.stage}: ${entry.items} items in ${entry.durationMs.toFixed(2)}ms (${share.toFixed(1)}%)`
      )
    }
    lines.push(`Total: ${m.totalMs.toFixed(2)}ms`)
    return lines
  }

  printSummary(): void {
    console.log(`\n${this.formatSummary().join('\n')}`)
  }

  private add(stage: string, durationMs: number, items: number): void {
    const current = this.stages.get(stage) ?? { stage, items: 0, durationMs: 0, calls: 0 }
    current.items += items
    current.durationMs += durationMs
    current.calls += 1
    this.stages.set(stage, current)
  }
}
