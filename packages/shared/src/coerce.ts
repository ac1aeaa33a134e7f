import type { ParamSpec, ParamValue, ParamValues, Schema } from '@wavescope/types'

/** `{key: default}` for every spec, in schema order. */
export function schemaDefaults(schema: Schema): ParamValues {
  const values: ParamValues = {}
  for (const spec of schema) values[spec.key] = copyValue(spec.default)
  return values
}

function copyValue(value: ParamValue): ParamValue {
  return Array.isArray(value) ? [...value] : value
}

function toNumber(raw: unknown): number | undefined {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : undefined
  if (typeof raw === 'boolean') return raw ? 1 : 0
  if (typeof raw === 'string' && raw.trim() !== '') {
    const n = Number(raw)
    return Number.isFinite(n) ? n : undefined
  }
  return undefined
}

function toBool(raw: unknown): boolean | undefined {
  if (typeof raw === 'boolean') return raw
  if (raw === 1 || raw === 0) return raw === 1
  if (typeof raw === 'string') {
    const s = raw.trim().toLowerCase()
    if (s === 'true' || s === '1') return true
    if (s === 'false' || s === '0') return false
  }
  return undefined
}

function toStringList(raw: unknown): string[] | undefined {
  if (typeof raw === 'string') {
    return raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0)
  }
  if (Array.isArray(raw)) {
    const out: string[] = []
    for (const item of raw) {
      if (typeof item !== 'string') return undefined
      const s = item.trim()
      if (s.length > 0) out.push(s)
    }
    return out
  }
  return undefined
}

/**
 * Coerce one raw value to the spec's type.
 * Returns `undefined` when the value cannot be interpreted.
 */
export function coerceValue(spec: ParamSpec, raw: unknown): ParamValue | undefined {
  switch (spec.type) {
    case 'float':
    case 'int': {
      let n = toNumber(raw)
      if (n === undefined) return undefined
      if (spec.type === 'int') n = Math.round(n)
      if (spec.min !== undefined) n = Math.max(spec.min, n)
      if (spec.max !== undefined) n = Math.min(spec.max, n)
      return n
    }
    case 'bool':
      return toBool(raw)
    case 'string':
      if (typeof raw === 'string') return raw
      if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw)
      return undefined
    case 'enum':
      return typeof raw === 'string' && (spec.choices ?? []).includes(raw) ? raw : undefined
    case 'string_list':
      return toStringList(raw)
  }
}

/**
 * Coerce a loosely-typed parameter map against a schema.
 *
 * Starts from `base` (schema defaults when omitted), then applies every
 * interpretable entry of `raw`. Keys the schema does not declare are dropped;
 * uninterpretable values leave the base value in place.
 */
export function coerceParams(schema: Schema, raw: Readonly<Record<string, unknown>>, base?: ParamValues): ParamValues {
  const values = base ? { ...schemaDefaults(schema), ...copyKnown(schema, base) } : schemaDefaults(schema)
  for (const spec of schema) {
    if (!(spec.key in raw)) continue
    const value = coerceValue(spec, raw[spec.key])
    if (value !== undefined) values[spec.key] = value
  }
  return values
}

function copyKnown(schema: Schema, base: ParamValues): ParamValues {
  const out: ParamValues = {}
  for (const spec of schema) {
    const value = base[spec.key]
    if (value !== undefined) out[spec.key] = copyValue(value)
  }
  return out
}

// ─── Typed readers over coerced maps ────────────────────────────────────────

export function readNumber(values: ParamValues, key: string, fallback: number): number {
  const v = values[key]
  return typeof v === 'number' ? v : fallback
}

export function readBool(values: ParamValues, key: string, fallback: boolean): boolean {
  const v = values[key]
  return typeof v === 'boolean' ? v : fallback
}

export function readString(values: ParamValues, key: string, fallback: string): string {
  const v = values[key]
  return typeof v === 'string' ? v : fallback
}

export function readStringList(values: ParamValues, key: string): string[] {
  const v = values[key]
  return Array.isArray(v) ? [...v] : []
}

/** Narrow a string to one of `choices`, else `fallback`. */
export function readChoice<T extends string>(values: ParamValues, key: string, choices: readonly T[], fallback: T): T {
  const v = values[key]
  for (const choice of choices) {
    if (choice === v) return choice
  }
  return fallback
}
