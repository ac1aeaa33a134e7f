import { z } from 'zod'

export const pipelineSettingsSchema = z.object({
  sampleRate: z.number().positive('Sample rate must be positive').max(10_000_000),
  chunkLength: z.number().int('Chunk length must be an integer').min(1),
  amplitudeClip: z.number().min(0),
  windowSeconds: z.number().positive().max(3600),
  frameRate: z.number().positive().max(240),
  pluginId: z.string().min(1, 'Plugin id is required'),
})

export const settingsPatchSchema = pipelineSettingsSchema.partial().strict()

export type SettingsPatch = z.infer<typeof settingsPatchSchema>
