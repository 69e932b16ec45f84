import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { LogLevel, type LogFormat, type LogStream } from './types.js';

/**
 * Environment variable that overrides any configured log level
 */
export const LOG_LEVEL_ENV = 'TELEMETRY_GUARD_LOG_LEVEL';

export class LoggerFactory {
  /**
   * Human-readable lines on stderr, coloured when stderr is a terminal
   */
  static createConsoleLogger(
    component: string,
    level: LogLevel | string = LogLevel.INFO,
    stream: LogStream = process.stderr
  ): Logger {
    return new Logger({
      component,
      level: typeof level === 'string' ? Logger.parseLevel(level) : level,
      transports: [
        new ConsoleTransport({ format: 'text', colors: process.stderr.isTTY, stream }),
      ],
    });
  }

  /**
   * JSON lines for log shippers
   */
  static createStructuredLogger(
    component: string,
    level: LogLevel | string = LogLevel.INFO,
    stream: LogStream = process.stderr
  ): Logger {
    return new Logger({
      component,
      level: typeof level === 'string' ? Logger.parseLevel(level) : level,
      transports: [new ConsoleTransport({ format: 'json', stream })],
    });
  }

  /**
   * Create a logger from the `logging` section of the configuration file.
   * The TELEMETRY_GUARD_LOG_LEVEL environment variable wins over the file.
   */
  static fromConfig(
    component: string,
    config: { level: string; format: LogFormat },
    env: NodeJS.ProcessEnv = process.env
  ): Logger {
    const level = env[LOG_LEVEL_ENV] ?? config.level;

    return config.format === 'json'
      ? LoggerFactory.createStructuredLogger(component, level)
      : LoggerFactory.createConsoleLogger(component, level);
  }
}
