import { ConsoleTransport } from './transports/console-transport.js';
import { type LogData, type LogEntry, LogLevel, type LogTransport, type LoggerConfig } from './types.js';

/**
 * Parse a level name such as `warn` or `WARNING` into a LogLevel
 */
export function parseLogLevel(level: LogLevel | string): LogLevel {
  if (typeof level !== 'string') {
    return level;
  }

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

/**
 * Structured logger with multiple transport support
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string;
  private transports: LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = parseLogLevel(config.level);
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Create a child logger sharing level and transports
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
    });
  }

  getComponent(): string {
    return this.component;
  }

  debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    this.log(LogLevel.ERROR, message, data, error);
  }

  /**
   * Log at a level chosen at run time. Non-Error values passed as `error` are dropped.
   */
  log(level: LogLevel, message: string, data?: LogData, error?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(data && { data }),
      ...(error instanceof Error && { error }),
    };

    this.transports.forEach(transport => {
      transport.log(entry).catch(err => {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, err);
      });
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  setLevel(level: LogLevel | string): void {
    this.level = parseLogLevel(level);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  removeTransport(transportName: string): void {
    this.transports = this.transports.filter(t => t.name !== transportName);
  }

  /**
   * Close all transports
   */
  async close(): Promise<void> {
    await Promise.all(
      this.transports
        .filter((t): t is LogTransport & { close: () => Promise<void> } => !!t.close)
        .map(t => t.close())
    );
  }
}
