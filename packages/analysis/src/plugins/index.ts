// Built-in transforms, registered before any external plugin.
import type { PluginMetadata, TransformPlugin } from '@wavescope/types';
import { CWT_META, CwtScalogramPlugin } from './cwt-morlet.js';
import { DWT_META, DwtWptPlugin } from './dwt-wpt.js';

export interface BuiltinPlugin {
  metadata: PluginMetadata;
  create(): TransformPlugin;
}

export const BUILTIN_PLUGINS: readonly BuiltinPlugin[] = [
  { metadata: CWT_META, create: () => new CwtScalogramPlugin() },
  { metadata: DWT_META, create: () => new DwtWptPlugin() },
];

export { CWT_META, CWT_SCHEMA, CwtScalogramPlugin, FREQ_SPACINGS, frequencyGrid, type FreqSpacing } from './cwt-morlet.js';
export {
  DWT_META,
  DWT_SCHEMA,
  DwtWptPlugin,
  DECOMPOSITION_MODES,
  NODE_SELECTIONS,
  selectPacketNodes,
} from './dwt-wpt.js';
export {
  MIN_TRANSFORM_SAMPLES,
  MAGNITUDE_MODES,
  NORMALIZE_MODES,
  applyMagnitude,
  normalizeImage,
  degenerateResult,
  timeAxis,
  type MagnitudeMode,
  type NormalizeMode,
} from './common.js';
