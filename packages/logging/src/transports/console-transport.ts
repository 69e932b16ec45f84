import {
  type ConsoleTransportConfig,
  type LogEntry,
  LogLevel,
  type LogStream,
  type LogTransport,
} from '../types.js';

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
};

const RESET = '\x1b[0m';

/**
 * One line per entry on a stream, as text or JSON
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly format: 'json' | 'text';
  private readonly colors: boolean;
  private readonly stream: LogStream;

  constructor(config: ConsoleTransportConfig = {}) {
    this.format = config.format ?? 'text';
    this.colors = config.colors ?? false;
    this.stream = config.stream ?? process.stderr;
  }

  write(entry: LogEntry): void {
    this.stream.write(`${this.render(entry)}\n`);
  }

  render(entry: LogEntry): string {
    return this.format === 'json' ? renderJson(entry) : this.renderText(entry);
  }

  private renderText(entry: LogEntry): string {
    const levelName = LogLevel[entry.level];
    const level = this.colors ? `${LEVEL_COLORS[entry.level]}${levelName}${RESET}` : levelName;

    const parts = [
      entry.timestamp.toISOString(),
      level,
      `[${entry.component}]`,
      entry.message,
    ];
    if (entry.data && Object.keys(entry.data).length > 0) {
      parts.push(JSON.stringify(entry.data));
    }
    if (entry.error) {
      parts.push(describeError(entry.error));
    }

    return parts.join(' ');
  }
}

function renderJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: LogLevel[entry.level],
    component: entry.component,
    message: entry.message,
    ...(entry.data && Object.keys(entry.data).length > 0 && { data: entry.data }),
    ...(entry.error && { error: entry.error }),
  });
}

/**
 * `error=<code|name>: <message>`, falling back to the raw fields for non-errors
 */
function describeError(error: Readonly<Record<string, unknown>>): string {
  const { code, name, message } = error;
  const label = typeof code === 'string' ? code : typeof name === 'string' ? name : undefined;

  if (label !== undefined && typeof message === 'string') {
    return `error=${label}: ${message}`;
  }
  return `error=${JSON.stringify(error)}`;
}
