export { configureLogger, getLogger, createJsonSink, createPrettySink } from './logger.js'
/** @internal Reset all logger state. For test teardown only. */
export { resetLogger } from './logger.js'
export type { LoggerConfig, LogWriter } from './logger.js'
export {
  ROOT_CATEGORY,
  VALID_ENVIRONMENTS,
  VALID_LOG_LEVELS,
  isEnvironment,
  isLogLevel,
  validateEnvironment,
  validateLogLevel,
} from './constants.js'
export type { Environment, LogLevel } from './constants.js'
