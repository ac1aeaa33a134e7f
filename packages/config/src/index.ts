// Pipeline defaults, hard limits, environment overrides and the shared
// parameter store.

export {
  MAX_CHUNK,
  MAX_WINDOW_SAMPLES,
  MIN_WINDOW_SAMPLES,
  HISTORY_SECONDS,
  MAX_HISTORY_SAMPLES,
  BUILTIN_CWT_ID,
  BUILTIN_DWT_ID,
  DEFAULT_SETTINGS,
  SETTINGS_ENV_KEYS,
  resolveSettings,
  windowLength,
  historyCapacity,
  type EnvSource,
} from './settings.js'

export {
  SharedParams,
  type ParamsListener,
} from './shared-params.js'
