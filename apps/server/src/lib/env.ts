/**
 * Environment variable validation — fail-fast on startup.
 *
 * Call `loadEnv()` once in the entry point. A malformed value throws
 * immediately, naming the variable, rather than surfacing later as a
 * misbehaving server.
 */

import { HISTORY_SECONDS } from '@wavescope/config'
import { isLogLevel, type LogLevel } from '@wavescope/shared'

export type EnvSource = Record<string, string | undefined>

export interface ServerEnv {
  PORT: number
  NODE_ENV: string
  LOG_LEVEL: LogLevel
  PLUGIN_DIR: string
  HISTORY_SECONDS: number
  CORS_ORIGINS: string[]
}

function optional(source: EnvSource, key: string, fallback: string): string {
  const val = source[key]
  return val === undefined || val.trim() === '' ? fallback : val
}

function positiveNumber(source: EnvSource, key: string, fallback: number, integer = false): number {
  const raw = optional(source, key, String(fallback))
  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new Error(`Invalid environment variable ${key}: expected a positive ${integer ? 'integer' : 'number'}, got "${raw}"`)
  }
  return value
}

export function loadEnv(source: EnvSource = process.env): ServerEnv {
  const level = optional(source, 'LOG_LEVEL', 'info')
  if (!isLogLevel(level)) {
    throw new Error(`Invalid environment variable LOG_LEVEL: expected debug, info, warn or error, got "${level}"`)
  }

  return {
    PORT: positiveNumber(source, 'PORT', 4000, true),
    NODE_ENV: optional(source, 'NODE_ENV', 'development'),
    LOG_LEVEL: level,
    PLUGIN_DIR: optional(source, 'PLUGIN_DIR', 'plugins/transforms'),
    HISTORY_SECONDS: positiveNumber(source, 'HISTORY_SECONDS', HISTORY_SECONDS),
    CORS_ORIGINS: optional(source, 'CORS_ORIGINS', 'http://localhost:3000').split(',').map((o) => o.trim()),
  }
}
