import { isOperationKind, type ExtractionResult } from '@log-timeline/pipeline-common'

const RUN_BOUNDARY_MARKER = 'All Operations completed'
const OPERATION_PATTERN = /\[Second (\d+)\].*?(Insert|Update|Read) completed in (\d+) ms/

/**
 * Classifies one log line as a run boundary, a timed operation, or neither.
 * @param line A single line of log text, with or without its line terminator.
 * @returns The tagged extraction result; null for lines that carry neither.
 */
export const extractLine = (line: string): ExtractionResult | null => {
  if (line.includes(RUN_BOUNDARY_MARKER)) {
    return { type: 'boundary' }
  }

  const match = OPERATION_PATTERN.exec(line)
  if (!match) {
    return null
  }

  const [, second, operation, duration] = match
  const runLocalSecond = Number.parseInt(second, 10)
  const durationMs = Number.parseInt(duration, 10)
  // Digit runs beyond 2^53 would not parse exactly.
  if (
    !isOperationKind(operation) ||
    !Number.isSafeInteger(runLocalSecond) ||
    !Number.isSafeInteger(durationMs)
  ) {
    return null
  }

  return {
    type: 'operation',
    record: { operation, runLocalSecond, durationMs },
  }
}

/**
 * Splits on LF, CRLF or a lone CR. A terminator at the very end does not start another line.
 */
export const splitLines = (text: string): string[] => {
  if (text.length === 0) {
    return []
  }
  const lines = text.split(/\r\n|\r|\n/)
  if (lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines
}

/**
 * Extracts every recognised line of a source, in line order.
 */
export const extractSource = (text: string): ExtractionResult[] => {
  const results: ExtractionResult[] = []
  for (const line of splitLines(text)) {
    const result = extractLine(line)
    if (result) {
      results.push(result)
    }
  }
  return results
}
