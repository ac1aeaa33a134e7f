import { describe, it, expect } from 'vitest'
import { createLogger, errorFields, isLogLevel, type LogLevel } from '../logger.js'

function capture() {
  const lines: Array<{ line: string; level: LogLevel }> = []
  const sink = (line: string, level: LogLevel) => { lines.push({ line, level }) }
  return { lines, sink }
}

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z')

describe('createLogger', () => {
  it('writes one JSON object per entry', () => {
    const { lines, sink } = capture()
    const log = createLogger('engine', { sink, now: fixedNow })
    log.info('chunk generated', { n: 256 })

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!.line)).toEqual({
      ts: '2026-01-02T03:04:05.000Z',
      level: 'info',
      scope: 'engine',
      msg: 'chunk generated',
      n: 256,
    })
  })

  it('filters below the configured level', () => {
    const { lines, sink } = capture()
    const log = createLogger('x', { sink, level: 'warn' })
    log.debug('a')
    log.info('b')
    log.warn('c')
    log.error('d')
    expect(lines.map((l) => l.level)).toEqual(['warn', 'error'])
  })

  it('child loggers extend the scope', () => {
    const { lines, sink } = capture()
    createLogger('server', { sink }).child('registry').info('loaded')
    expect(JSON.parse(lines[0]!.line).scope).toBe('server:registry')
  })
})

describe('errorFields', () => {
  it('extracts the message from errors', () => {
    expect(errorFields(new Error('boom'))).toEqual({ error: 'boom' })
  })

  it('stringifies anything else', () => {
    expect(errorFields(42)).toEqual({ error: '42' })
  })
})

describe('isLogLevel', () => {
  it('recognizes levels', () => {
    expect(isLogLevel('warn')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})
