import { readFile } from 'node:fs/promises'
import type { TextSource } from '@log-timeline/pipeline-common'

/**
 * A log source could not be read. Distinct from a source that was read but held no records.
 */
export class SourceReadError extends Error {
  readonly sourcePath: string

  constructor(sourcePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Cannot read log source ${sourcePath}: ${reason}`, { cause })
    this.name = 'SourceReadError'
    this.sourcePath = sourcePath
  }
}

/**
 * Fixes the order in which sources feed the run segmenter.
 * @param paths Source paths as configured.
 * @param sort Sort by name (UTF-16 code unit order) instead of keeping the given order.
 */
export const orderSources = (paths: readonly string[], sort: boolean): string[] => {
  return sort ? [...paths].sort() : [...paths]
}

/**
 * Reads every source in full. Reads run concurrently; the result keeps the order of `paths`.
 * @throws SourceReadError for the first source that cannot be read.
 */
export const readSources = async (paths: readonly string[]): Promise<TextSource[]> => {
  return Promise.all(
    paths.map(async (path) => {
      try {
        return { name: path, text: await readFile(path, 'utf8') }
      } catch (error: unknown) {
        throw new SourceReadError(path, error)
      }
    })
  )
}
