import type { ExtractionResult, OperationRecord, Run } from '@log-timeline/pipeline-common'

/**
 * Groups extraction results into runs delimited by boundary markers.
 * Sources are expected as one stream, concatenated in their resolved order;
 * a run left open at the end of one source continues into the next.
 * @param results Extraction results in stream order.
 * @returns Runs in stream order; never an empty run.
 */
export const segmentRuns = (results: Iterable<ExtractionResult>): Run[] => {
  const runs: Run[] = []
  let current: OperationRecord[] = []

  for (const result of results) {
    switch (result.type) {
      case 'operation':
        current.push(result.record)
        break
      case 'boundary':
        if (current.length > 0) {
          runs.push(current)
          current = []
        }
        break
      default: {
        const unexpected: never = result
        throw new Error(`Unexpected extraction result: ${JSON.stringify(unexpected)}`)
      }
    }
  }

  if (current.length > 0) {
    runs.push(current)
  }

  return runs
}
