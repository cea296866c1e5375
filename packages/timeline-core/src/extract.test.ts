import { describe, expect, it } from 'vitest'
import { extractLine, extractSource, splitLines } from './extract'

describe('extractLine', () => {
  it('extracts second, kind and duration from an operation line', () => {
    const line = '2024-05-02 10:00:03 INFO  [Second 3] Thread pool-1-thread-2: Insert completed in 12 ms '

    expect(extractLine(line)).toEqual({
      type: 'operation',
      record: { operation: 'Insert', runLocalSecond: 3, durationMs: 12 },
    })
  })

  it('tolerates trailing punctuation after the unit', () => {
    expect(extractLine(' [Second 0] Thread t1: Read completed in 7 ms )')).toEqual({
      type: 'operation',
      record: { operation: 'Read', runLocalSecond: 0, durationMs: 7 },
    })
    expect(extractLine(' [Second 14] Thread t9: Update completed in 250 ms)')).toEqual({
      type: 'operation',
      record: { operation: 'Update', runLocalSecond: 14, durationMs: 250 },
    })
  })

  it('takes the first operation when a line mentions several', () => {
    const result = extractLine('[Second 1] Read completed in 3 ms; Update completed in 4 ms')
    expect(result).toEqual({
      type: 'operation',
      record: { operation: 'Read', runLocalSecond: 1, durationMs: 3 },
    })
  })

  it('classifies a completion marker as a boundary even with operation text on the line', () => {
    const line = 'INFO All Operations completed [Second 4] Thread t1: Insert completed in 5 ms'
    expect(extractLine(line)).toEqual({ type: 'boundary' })
    expect(extractLine('All Operations completed')).toEqual({ type: 'boundary' })
  })

  it('ignores unrelated lines', () => {
    expect(extractLine('All 100 reads completed in 2.5 seconds')).toBeNull()
    expect(extractLine('Insert completed in 5 ms')).toBeNull()
    expect(extractLine('[Second 2] Thread t1: insert completed in 5 ms')).toBeNull()
    expect(extractLine('[Second 2] Thread t1: Delete completed in 5 ms')).toBeNull()
    expect(extractLine('')).toBeNull()
  })

  it('ignores lines whose numbers exceed the exact integer range', () => {
    expect(extractLine('[Second 1] Thread t1: Insert completed in 9007199254740993 ms')).toBeNull()
    expect(extractLine('[Second 99999999999999999999] Thread t1: Read completed in 4 ms')).toBeNull()
    expect(extractLine('[Second 1] Thread t1: Read completed in 9007199254740991 ms')).toEqual({
      type: 'operation',
      record: { operation: 'Read', runLocalSecond: 1, durationMs: 9007199254740991 },
    })
  })
})

describe('splitLines', () => {
  it('splits on LF and CRLF and drops the final terminator', () => {
    expect(splitLines('a\r\nb\nc\n')).toEqual(['a', 'b', 'c'])
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b'])
    expect(splitLines('')).toEqual([])
  })

  it('treats a lone CR as a line terminator', () => {
    expect(splitLines('a\rb\r\rc\r')).toEqual(['a', 'b', '', 'c'])
    expect(splitLines('a\r\nb\rc\nd')).toEqual(['a', 'b', 'c', 'd'])
  })
})

describe('extractSource', () => {
  it('returns recognised lines in order', () => {
    const text = [
      'Storing Docs for Read and Update ........',
      ' [Second 1] Thread t1: Insert completed in 5 ms ',
      'All Operations completed',
      ' [Second 0] Thread t2: Read completed in 2 ms )',
      '',
    ].join('\r\n')

    expect(extractSource(text)).toEqual([
      { type: 'operation', record: { operation: 'Insert', runLocalSecond: 1, durationMs: 5 } },
      { type: 'boundary' },
      { type: 'operation', record: { operation: 'Read', runLocalSecond: 0, durationMs: 2 } },
    ])
  })

  it('keeps the operations of a CR-terminated log apart from its boundary', () => {
    const text = [
      '[Second 0] Thread t1: Insert completed in 5 ms',
      '[Second 1] Thread t2: Read completed in 3 ms )',
      'All Operations completed',
      '',
    ].join('\r')

    expect(extractSource(text)).toEqual([
      { type: 'operation', record: { operation: 'Insert', runLocalSecond: 0, durationMs: 5 } },
      { type: 'operation', record: { operation: 'Read', runLocalSecond: 1, durationMs: 3 } },
      { type: 'boundary' },
    ])
  })
})
