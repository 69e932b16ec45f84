/**
 * @telemetry-guard/logging - Structured logging with pluggable transports
 */

export { Logger } from './logger.js';
export { LoggerFactory, LOG_LEVEL_ENV } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export {
  LogLevel,
  LOG_LEVELS,
  LOG_FORMATS,
  isLogLevel,
  isLogFormat,
  type LogLevelString,
  type LogFormat,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportConfig,
  type LogStream,
} from './types.js';
