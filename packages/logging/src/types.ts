/**
 * Logging types shared by the logger and its transports
 */

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevelString = (typeof LOG_LEVELS)[number];

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export const LOG_FORMATS = ['json', 'text'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  /** Colon-separated path such as `telemetry-guard:resilience:loki` */
  readonly component: string;
  readonly message: string;
  readonly data?: Readonly<Record<string, unknown>>;
  /** Flattened error fields: code, category and correlation id for the package's own errors */
  readonly error?: Readonly<Record<string, unknown>>;
}

/**
 * Receives every entry at or above the logger's level. Writes are synchronous so a breaker
 * transition is logged before the call that caused it returns.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  readonly level: LogLevel | LogLevelString;
  readonly component: string;
  readonly transports?: readonly LogTransport[];
}

/**
 * Where console output goes. Defaults to stderr so stdout stays free for command output.
 */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface ConsoleTransportConfig {
  readonly format?: LogFormat;
  readonly colors?: boolean;
  readonly stream?: LogStream;
}

export const isLogLevel = (value: string): value is LogLevelString =>
  (LOG_LEVELS as readonly string[]).includes(value);

export const isLogFormat = (value: string): value is LogFormat =>
  (LOG_FORMATS as readonly string[]).includes(value);
