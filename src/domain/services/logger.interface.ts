export const LOGGER_SERVICE = Symbol('LOGGER_SERVICE');

/**
 * Structured fields appended to a log line, e.g. `{ id, iataCode }`.
 */
export type LogContext = Record<string, unknown>;

/**
 * Logging port used by use cases, services and the HTTP layer.
 *
 * Bound to the console logger in the application module; tests pass a
 * plain object of jest.fn() instead.
 */
export interface ILogger {
  log(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}
