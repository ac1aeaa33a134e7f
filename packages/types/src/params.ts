/** Value a tunable parameter can hold. */
export type ParamValue = number | boolean | string | string[]

/** Open key/value map of parameter values (as carried across boundaries). */
export type ParamValues = Record<string, ParamValue>

export type ParamType = 'float' | 'int' | 'bool' | 'string' | 'enum' | 'string_list'

/** Describes one tunable parameter of a signal component or transform plugin. */
export interface ParamSpec {
  readonly key: string
  readonly label: string
  readonly type: ParamType
  readonly default: ParamValue
  readonly min?: number
  readonly max?: number
  readonly step?: number
  readonly choices?: readonly string[]
  readonly description?: string
  readonly examples?: readonly string[]
}

/** Ordered, immutable list of parameter specs. */
export type Schema = readonly ParamSpec[]
