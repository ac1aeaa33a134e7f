// Shared value types for the generator, analysis and host layers.

export type {
  ParamValue,
  ParamValues,
  ParamType,
  ParamSpec,
  Schema,
} from './params.js'

export type {
  Chunk,
  ComponentKind,
  ComponentSnapshot,
  ComponentEntry,
  LoopState,
} from './signal.js'

export type {
  TransformResult,
  TransformPlugin,
  PluginMetadata,
  PluginInfo,
} from './transform.js'

export type {
  PipelineSettings,
  ParamsSnapshot,
  SavedConfiguration,
} from './settings.js'
