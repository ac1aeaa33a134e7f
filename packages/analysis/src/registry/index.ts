export {
  PluginRegistry,
  pluginFromModule,
  type PluginFailure,
  type PluginRegistryOptions,
  type ReloadSummary,
} from './registry.js';
export {
  DirectoryPluginSource,
  StaticPluginSource,
  type PluginCandidate,
  type PluginSource,
} from './source.js';
