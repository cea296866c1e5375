import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  ConfigError,
  DEFAULT_OUTPUT_FILE,
  loadConfigFile,
  parseArgs,
  parseConfigDocument,
  resolveConfig,
} from './config'

describe('parseArgs', () => {
  it('collects positional sources and flags', () => {
    const args = parseArgs([
      'spring.log.2',
      '--output',
      'out/report.json',
      'spring.log.1',
      '--outlier-factor',
      '3',
      '--no-sort',
      '--verbose',
    ])

    expect(args).toEqual({
      help: false,
      sources: ['spring.log.2', 'spring.log.1'],
      outputFile: 'out/report.json',
      outlierFactor: 3,
      sortSources: false,
      quiet: false,
      verbose: true,
    })
  })

  it('recognises help and config flags', () => {
    expect(parseArgs(['-h']).help).toBe(true)
    expect(parseArgs(['--config', 'timeline.yaml']).configFile).toBe('timeline.yaml')
  })

  it('rejects unknown flags, missing values and invalid factors', () => {
    expect(() => parseArgs(['--colour'])).toThrow(ConfigError)
    expect(() => parseArgs(['--colour'])).toThrow('Unknown argument: --colour')
    expect(() => parseArgs(['--output'])).toThrow('Missing value for --output')
    expect(() => parseArgs(['--output', '--quiet'])).toThrow('Missing value for --output')
    expect(() => parseArgs(['--outlier-factor', 'wide'])).toThrow(
      'Invalid value for --outlier-factor: wide (expected a positive number)'
    )
    expect(() => parseArgs(['--outlier-factor', '0'])).toThrow('Invalid value for --outlier-factor')
  })
})

describe('parseConfigDocument', () => {
  it('reads every supported key', () => {
    const text = [
      'sources:',
      '  - logs/spring.log.1',
      '  - logs/spring.log.2',
      'sortSources: false',
      'outputFile: stats.json',
      'outlierFactor: 2.5',
    ].join('\n')

    expect(parseConfigDocument(text, 'timeline.yaml')).toEqual({
      sources: ['logs/spring.log.1', 'logs/spring.log.2'],
      sortSources: false,
      outputFile: 'stats.json',
      outlierFactor: 2.5,
    })
  })

  it('treats an empty document as no options', () => {
    expect(parseConfigDocument('', 'timeline.yaml')).toEqual({})
  })

  it('rejects unknown keys and wrongly typed values', () => {
    expect(() => parseConfigDocument('logPattern: spring.log.*', 'timeline.yaml')).toThrow(
      'timeline.yaml: unknown config key "logPattern"'
    )
    expect(() => parseConfigDocument('sources: spring.log', 'timeline.yaml')).toThrow(
      'timeline.yaml: "sources" must be a list of file paths'
    )
    expect(() => parseConfigDocument('sortSources: "yes"', 'timeline.yaml')).toThrow(
      'timeline.yaml: "sortSources" must be true or false'
    )
    expect(() => parseConfigDocument('outlierFactor: -1', 'timeline.yaml')).toThrow(
      'Invalid value for timeline.yaml: "outlierFactor": -1 (expected a positive number)'
    )
    expect(() => parseConfigDocument('- a\n- b', 'timeline.yaml')).toThrow(
      'timeline.yaml: expected a mapping at the top level'
    )
  })

  it('surfaces malformed YAML', () => {
    expect(() => parseConfigDocument('sources: [a, b', 'timeline.yaml')).toThrow(ConfigError)
    expect(() => parseConfigDocument('sources: [a, b', 'timeline.yaml')).toThrow(
      'timeline.yaml: invalid YAML'
    )
  })
})

describe('loadConfigFile', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'log-timeline-config-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('resolves sources against the config file directory', async () => {
    const configFile = join(tempDir, 'timeline.yaml')
    await writeFile(configFile, 'sources:\n  - logs/spring.log.1\noutputFile: stats.json\n')

    const config = await loadConfigFile(configFile)

    expect(config.sources).toEqual([join(tempDir, 'logs', 'spring.log.1')])
    expect(config.outputFile).toBe('stats.json')
  })
})

describe('resolveConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(resolveConfig(parseArgs([]))).toEqual({
      sources: [],
      sortSources: true,
      outputFile: DEFAULT_OUTPUT_FILE,
      outlierFactor: 1.5,
      quiet: false,
      verbose: false,
    })
  })

  it('prefers command-line values over the config file', () => {
    const config = resolveConfig(parseArgs(['a.log', '--outlier-factor', '2', '--quiet']), {
      sources: ['b.log'],
      sortSources: false,
      outputFile: 'file.json',
      outlierFactor: 4,
    })

    expect(config).toEqual({
      sources: ['a.log'],
      sortSources: false,
      outputFile: 'file.json',
      outlierFactor: 2,
      quiet: true,
      verbose: false,
    })
  })
})
