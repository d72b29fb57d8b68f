export { LoggerService } from './custom-logger.service';
export type { LogMetadata } from './custom-logger.service';
export { LOG_LEVEL_NAMES, resolveLogLevels } from './log-levels';
export type { LogLevelName } from './log-levels';
export { loggerProviders } from './logger.providers';
