/**
 * Log levels supported by the logger
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Structured fields attached to a log line
 */
export type LogData = Record<string, unknown>;

/**
 * Port interface for logging.
 * Components receive a child logger bound to `{ component }`.
 */
export interface ILogger {
  trace(message: string, data?: LogData): void;
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;

  /**
   * Errors go under `err` so pino serializes message and stack
   */
  error(message: string, error?: Error | unknown, data?: LogData): void;
  fatal(message: string, error?: Error | unknown, data?: LogData): void;

  child(bindings: LogData): ILogger;
}
