export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, isLogLevel, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getReleaseLogger,
  logger,
} from './logger.js';
export type { ChartwrightLogger, LoggerConfig, LoggerContext, LogLevel } from './types.js';
export { LOG_LEVELS } from './types.js';
