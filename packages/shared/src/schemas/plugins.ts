import { z } from 'zod'
import { paramSpecSchema } from './params.js'

export const pluginMetadataSchema = z.object({
  id: z.string().min(1, 'Plugin id is required'),
  name: z.string().min(1, 'Plugin name is required'),
  kind: z.string().min(1),
  version: z.string().min(1),
  description: z.string().default(''),
})

export type PluginMetadataInput = z.input<typeof pluginMetadataSchema>

// ─── Values returned by externally loaded plugins ───────────────────────────

export const parameterSchemaListSchema = z.array(paramSpecSchema)

// Always copied: a plugin may reuse its output buffers between calls.
const rowSchema = z
  .union([z.instanceof(Float32Array), z.instanceof(Float64Array), z.array(z.number())])
  .transform((row) => Float32Array.from(row))

const axisSchema = z
  .union([z.instanceof(Float64Array), z.instanceof(Float32Array), z.array(z.number())])
  .transform((axis) => Float64Array.from(axis))

/** Accepts typed arrays or plain number arrays and returns fresh typed copies. */
export const transformResultSchema = z.object({
  image: z.array(rowSchema).min(1, 'Result image needs at least one row'),
  yAxis: axisSchema,
  xAxis: axisSchema,
  yLabel: z.string(),
  meta: z.record(z.unknown()).default({}),
})
