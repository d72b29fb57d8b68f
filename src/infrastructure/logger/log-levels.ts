import type { LogLevel } from '@nestjs/common';

/** Nest log levels from most to least severe. */
export const LOG_LEVEL_NAMES = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/** Levels enabled for a threshold: the threshold itself and everything more severe. */
export function resolveLogLevels(threshold: LogLevelName): LogLevel[] {
  return LOG_LEVEL_NAMES.slice(0, LOG_LEVEL_NAMES.indexOf(threshold) + 1);
}
