import { describe, it, expect } from 'vitest'
import { HISTORY_SECONDS } from '@wavescope/config'
import { loadEnv } from '../lib/env.js'

describe('loadEnv', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadEnv({})).toEqual({
      PORT: 4000,
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      PLUGIN_DIR: 'plugins/transforms',
      HISTORY_SECONDS,
      CORS_ORIGINS: ['http://localhost:3000'],
    })
  })

  it('reads overrides and splits the origin list', () => {
    const env = loadEnv({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      HISTORY_SECONDS: '12.5',
      CORS_ORIGINS: 'http://a.test, http://b.test',
      PLUGIN_DIR: '/srv/plugins',
    })
    expect(env.PORT).toBe(8080)
    expect(env.LOG_LEVEL).toBe('debug')
    expect(env.HISTORY_SECONDS).toBe(12.5)
    expect(env.CORS_ORIGINS).toEqual(['http://a.test', 'http://b.test'])
    expect(env.PLUGIN_DIR).toBe('/srv/plugins')
  })

  it('treats blank values as unset', () => {
    expect(loadEnv({ PORT: '  ' }).PORT).toBe(4000)
  })

  it('rejects a malformed port', () => {
    expect(() => loadEnv({ PORT: '80.5' })).toThrow(
      'Invalid environment variable PORT: expected a positive integer, got "80.5"',
    )
    expect(() => loadEnv({ PORT: 'http' })).toThrow(/^Invalid environment variable PORT/)
  })

  it('rejects a non-positive history length', () => {
    expect(() => loadEnv({ HISTORY_SECONDS: '0' })).toThrow(
      'Invalid environment variable HISTORY_SECONDS: expected a positive number, got "0"',
    )
  })

  it('rejects an unknown log level', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/)
  })
})
