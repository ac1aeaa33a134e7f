import { z } from 'zod'
import { paramValuesSchema } from './params.js'

// ─── Messages between the analysis loop and its transform thread ────────────

const float32Array = z.custom<Float32Array>((value) => value instanceof Float32Array, 'Expected a Float32Array')
const float64Array = z.custom<Float64Array>((value) => value instanceof Float64Array, 'Expected a Float64Array')

export const transformThreadOptionsSchema = z.object({
  /** External plugin directory; built-ins only when null. */
  pluginDir: z.string().nullable(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
})

export type TransformThreadOptions = z.infer<typeof transformThreadOptionsSchema>

export const transformThreadRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('transform'),
    id: z.number().int(),
    pluginId: z.string(),
    samples: float32Array,
    sampleRate: z.number().positive(),
    params: paramValuesSchema,
  }),
  z.object({ type: z.literal('reload'), id: z.number().int() }),
])

export type TransformThreadRequest = z.infer<typeof transformThreadRequestSchema>

/** Just the id, to answer a request that failed validation. */
export const transformThreadAddressSchema = z.object({ id: z.number().int() })

/** Results arrive already validated and copied on the thread side. */
const threadResultSchema = z.object({
  image: z.array(float32Array),
  yAxis: float64Array,
  xAxis: float64Array,
  yLabel: z.string(),
  meta: z.record(z.unknown()),
})

export const transformThreadReplySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('result'), id: z.number().int(), result: threadResultSchema }),
  z.object({ type: z.literal('reloaded'), id: z.number().int(), loaded: z.number().int(), failed: z.number().int() }),
  z.object({ type: z.literal('error'), id: z.number().int(), message: z.string() }),
])

export type TransformThreadReply = z.infer<typeof transformThreadReplySchema>
