import { extractErrorInfo } from '@telemetry-guard/errors';

import { ConsoleTransport } from './transports/console-transport.js';
import { type LogEntry, LogLevel, type LogTransport, type LoggerConfig } from './types.js';

/**
 * Levelled logger. Child loggers share the parent's level and transports.
 */
export class Logger {
  public readonly level: LogLevel;
  public readonly component: string;
  private readonly transports: readonly LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = typeof config.level === 'string' ? Logger.parseLevel(config.level) : config.level;
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Parse a level name such as "warn" or "WARNING"
   */
  static parseLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
      case 'WARNING':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        throw new Error(`Invalid log level: ${level}`);
    }
  }

  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Log at ERROR. Any thrown value is accepted; package errors keep their code and context.
   */
  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, data, error);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(data && { data }),
      ...(error !== undefined && { error: extractErrorInfo(error) }),
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (failure) {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, failure);
      }
    }
  }
}
