import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import * as yaml from 'js-yaml'
import { DEFAULT_OUTLIER_FACTOR } from '@log-timeline/core'

export const DEFAULT_OUTPUT_FILE = 'operation-stats.json'

/**
 * Options read from the command line. Unset values fall back to the config file, then to defaults.
 */
export interface CliArgs {
  help: boolean
  configFile?: string
  sources: string[]
  outputFile?: string
  outlierFactor?: number
  sortSources?: boolean
  quiet: boolean
  verbose: boolean
}

/**
 * Options read from a YAML config file.
 */
export interface FileConfig {
  /** Log files, resolved against the directory of the config file. */
  sources?: string[]
  sortSources?: boolean
  outputFile?: string
  outlierFactor?: number
}

/**
 * Fully resolved analyzer configuration.
 */
export interface AnalyzerConfig {
  sources: string[]
  /** Sort sources by name before reading; otherwise keep the given order. */
  sortSources: boolean
  outputFile: string
  /** IQR multiple for the outlier fences applied before trend fitting. */
  outlierFactor: number
  quiet: boolean
  verbose: boolean
}

/**
 * An invalid flag, config key or config value. The message names the offending flag or key.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

export const usage = `Usage: log-timeline [options] <log files...>

Options:
  --config <file>          YAML config file
  --output <file>          JSON report file (default: ${DEFAULT_OUTPUT_FILE})
  --outlier-factor <n>     IQR multiple for trend outlier fences (default: ${DEFAULT_OUTLIER_FACTOR})
  --no-sort                Keep sources in the given order instead of sorting by name
  --quiet                  Only print errors
  --verbose                Also print per-stage timings
  -h, --help               Show this help message
`

const requireValue = (value: string | undefined, flag: string): string => {
  if (value == null || value.startsWith('--')) {
    throw new ConfigError(`Missing value for ${flag}`)
  }
  return value
}

const parseOutlierFactor = (value: unknown, origin: string): number => {
  const parsed = typeof value === 'string' ? Number(value) : value
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid value for ${origin}: ${String(value)} (expected a positive number)`)
  }
  return parsed
}

/**
 * Parses CLI arguments.
 * @param argv CLI arguments (excluding node and script path).
 * @throws When a flag is unknown, is missing its value or has an invalid number.
 */
export const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = { help: false, sources: [], quiet: false, verbose: false }

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    const value = argv[i + 1]

    if (arg === '--help' || arg === '-h') {
      args.help = true
      continue
    }

    if (arg === '--config') {
      args.configFile = requireValue(value, arg)
      i += 1
      continue
    }

    if (arg === '--output') {
      args.outputFile = requireValue(value, arg)
      i += 1
      continue
    }

    if (arg === '--outlier-factor') {
      args.outlierFactor = parseOutlierFactor(requireValue(value, arg), arg)
      i += 1
      continue
    }

    if (arg === '--no-sort') {
      args.sortSources = false
      continue
    }

    if (arg === '--quiet') {
      args.quiet = true
      continue
    }

    if (arg === '--verbose') {
      args.verbose = true
      continue
    }

    if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown argument: ${arg}`)
    }

    args.sources.push(arg)
  }

  return args
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const isStringArray = (value: unknown): value is string[] => {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string')
}

const CONFIG_KEYS = new Set(['sources', 'sortSources', 'outputFile', 'outlierFactor'])

/**
 * Validates a YAML config document.
 * @param text YAML source.
 * @param origin Name used in error messages, usually the file path.
 * @returns Parsed options; relative source paths are returned as written.
 * @throws When the YAML is malformed, a key is unknown or a value has the wrong type.
 */
export const parseConfigDocument = (text: string, origin: string): FileConfig => {
  let document: unknown
  try {
    document = yaml.load(text, { filename: origin })
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`${origin}: invalid YAML: ${reason}`, { cause: error })
  }
  if (document == null) {
    return {}
  }
  if (!isRecord(document)) {
    throw new ConfigError(`${origin}: expected a mapping at the top level`)
  }

  for (const key of Object.keys(document)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new ConfigError(`${origin}: unknown config key "${key}"`)
    }
  }

  const config: FileConfig = {}
  const { sources, sortSources, outputFile, outlierFactor } = document

  if (sources !== undefined) {
    if (!isStringArray(sources)) {
      throw new ConfigError(`${origin}: "sources" must be a list of file paths`)
    }
    config.sources = sources
  }

  if (sortSources !== undefined) {
    if (typeof sortSources !== 'boolean') {
      throw new ConfigError(`${origin}: "sortSources" must be true or false`)
    }
    config.sortSources = sortSources
  }

  if (outputFile !== undefined) {
    if (typeof outputFile !== 'string' || outputFile.trim().length === 0) {
      throw new ConfigError(`${origin}: "outputFile" must be a file path`)
    }
    config.outputFile = outputFile
  }

  if (outlierFactor !== undefined) {
    config.outlierFactor = parseOutlierFactor(outlierFactor, `${origin}: "outlierFactor"`)
  }

  return config
}

/**
 * Reads a YAML config file; source paths in it are resolved against the file's directory.
 */
export const loadConfigFile = async (filePath: string): Promise<FileConfig> => {
  const text = await readFile(filePath, 'utf8')
  const config = parseConfigDocument(text, filePath)
  if (config.sources) {
    const baseDir = dirname(resolve(filePath))
    config.sources = config.sources.map((source) => resolve(baseDir, source))
  }
  return config
}

/**
 * Merges CLI arguments over config file values over defaults.
 * Sources named on the command line replace those of the config file.
 */
export const resolveConfig = (args: CliArgs, fileConfig: FileConfig = {}): AnalyzerConfig => ({
  sources: args.sources.length > 0 ? args.sources : fileConfig.sources ?? [],
  sortSources: args.sortSources ?? fileConfig.sortSources ?? true,
  outputFile: args.outputFile ?? fileConfig.outputFile ?? DEFAULT_OUTPUT_FILE,
  outlierFactor: args.outlierFactor ?? fileConfig.outlierFactor ?? DEFAULT_OUTLIER_FACTOR,
  quiet: args.quiet,
  verbose: args.verbose,
})
