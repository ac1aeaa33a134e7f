import { z } from 'zod'

export const paramValueSchema = z.union([
  z.number().finite(),
  z.boolean(),
  z.string(),
  z.array(z.string()),
])

export const paramValuesSchema = z.record(paramValueSchema)

export const paramSpecSchema = z.object({
  key: z.string().min(1),
  label: z.string(),
  type: z.enum(['float', 'int', 'bool', 'string', 'enum', 'string_list']),
  default: paramValueSchema,
  min: z.number().optional(),
  max: z.number().optional(),
  step: z.number().optional(),
  choices: z.array(z.string()).optional(),
  description: z.string().optional(),
  examples: z.array(z.string()).optional(),
})

/**
 * Keep only the entries of `raw` that are valid parameter values.
 * Returns the kept map and the keys that were dropped.
 */
export function pickParamValues(raw: unknown): { values: z.infer<typeof paramValuesSchema>; dropped: string[] } {
  const values: z.infer<typeof paramValuesSchema> = {}
  const dropped: string[] = []
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { values, dropped }
  }
  for (const [key, value] of Object.entries(raw)) {
    const parsed = paramValueSchema.safeParse(value)
    if (parsed.success) values[key] = parsed.data
    else dropped.push(key)
  }
  return { values, dropped }
}
