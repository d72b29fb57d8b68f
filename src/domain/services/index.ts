export { CLOCK } from './clock.interface';
export type { Clock } from './clock.interface';

export { ID_GENERATOR } from './id-generator.interface';
export type { IdGenerator } from './id-generator.interface';

export { LOGGER_SERVICE } from './logger.interface';
export type { ILogger, LogContext } from './logger.interface';
