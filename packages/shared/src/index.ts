// Boundary schemas, parameter coercion and the structured logger.

export * from './schemas/index.js'

export {
  schemaDefaults,
  coerceValue,
  coerceParams,
  readNumber,
  readBool,
  readString,
  readStringList,
  readChoice,
} from './coerce.js'

export {
  createLogger,
  errorFields,
  isLogLevel,
  silentLogger,
  stdioSink,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogFields,
  type LogLevel,
  type LogSink,
} from './logger.js'
