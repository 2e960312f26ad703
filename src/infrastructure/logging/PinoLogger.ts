import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
}

type DataLevel = 'trace' | 'debug' | 'info' | 'warn';
type ErrorLevel = 'error' | 'fatal';

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  constructor(options: PinoLoggerOptions | pino.Logger = {}) {
    if (PinoLogger.isPinoLogger(options)) {
      this.logger = options;
      return;
    }

    const transport = options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

    this.logger = pino({
      name: options.name ?? 'location-lighting-mode',
      level: options.level ?? 'info',
      ...(transport && { transport }),
    });
  }

  private static isPinoLogger(value: PinoLoggerOptions | pino.Logger): value is pino.Logger {
    return 'child' in value;
  }

  private write(level: DataLevel, message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger[level](data, message);
    } else {
      this.logger[level](message);
    }
  }

  private writeError(
    level: ErrorLevel,
    message: string,
    error?: Error | unknown,
    data?: Record<string, unknown>
  ): void {
    const errorData = error instanceof Error ? { err: error, ...data } : { error, ...data };
    this.logger[level](errorData, message);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.writeError('error', message, error, data);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.writeError('fatal', message, error, data);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(this.logger.child(bindings));
  }
}
