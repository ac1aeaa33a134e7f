import { z } from 'zod'
import { paramValuesSchema } from './params.js'

export const COMPONENT_KINDS = ['noise', 'sine', 'rect_pulse', 'gauss_pulse', 'chirp'] as const

export const componentKindSchema = z.enum(COMPONENT_KINDS)

export const addComponentSchema = z.object({
  kind: componentKindSchema,
  params: paramValuesSchema.optional(),
  enabled: z.boolean().optional(),
})

export const updateComponentSchema = z
  .object({
    enabled: z.boolean().optional(),
    params: paramValuesSchema.optional(),
  })
  .refine((v) => v.enabled !== undefined || v.params !== undefined, {
    message: 'Provide enabled and/or params',
  })

export const componentIndexParam = z.object({
  index: z.coerce.number().int().min(0, 'Invalid component index'),
})

export const selectTransformSchema = z.object({
  pluginId: z.string().min(1),
  params: paramValuesSchema.optional(),
})

export type AddComponentInput = z.infer<typeof addComponentSchema>
export type UpdateComponentInput = z.infer<typeof updateComponentSchema>
export type SelectTransformInput = z.infer<typeof selectTransformSchema>
