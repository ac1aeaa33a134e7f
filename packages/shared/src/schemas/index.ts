export {
  paramValueSchema,
  paramValuesSchema,
  paramSpecSchema,
  pickParamValues,
} from './params.js'

export {
  pipelineSettingsSchema,
  settingsPatchSchema,
  type SettingsPatch,
} from './settings.js'

export {
  pluginMetadataSchema,
  parameterSchemaListSchema,
  transformResultSchema,
  type PluginMetadataInput,
} from './plugins.js'

export {
  COMPONENT_KINDS,
  componentKindSchema,
  addComponentSchema,
  updateComponentSchema,
  componentIndexParam,
  selectTransformSchema,
  type AddComponentInput,
  type UpdateComponentInput,
  type SelectTransformInput,
} from './control.js'

export {
  OBSOLETE_TRANSFORM_KEYS,
  parseSavedConfiguration,
  type ParsedConfiguration,
} from './configuration.js'

export {
  transformThreadAddressSchema,
  transformThreadOptionsSchema,
  transformThreadRequestSchema,
  transformThreadReplySchema,
  type TransformThreadOptions,
  type TransformThreadRequest,
  type TransformThreadReply,
} from './thread.js'
