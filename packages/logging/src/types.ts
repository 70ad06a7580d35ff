/**
 * Log entries, transports and logger settings
 */

/** Severity, ordered so that a logger passes every level at or above its own */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = keyof typeof LogLevel;

/** `text` for one readable line per entry, `json` for one JSON object per line */
export type LogFormat = 'json' | 'text';

export type LogData = Readonly<Record<string, unknown>>;

export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  /** Logger component, `parent:child` for child loggers */
  readonly component: string;
  readonly message: string;
  readonly data?: LogData;
  readonly error?: Error;
}

/**
 * Destination of log entries. A failing transport is reported on stderr and never breaks the
 * caller.
 */
export interface LogTransport {
  readonly name: string;
  log(entry: LogEntry): Promise<void>;
  close?(): Promise<void>;
}

export interface LoggerConfig {
  /** A level, or a name such as `info` or `WARNING` */
  readonly level: LogLevel | string;
  readonly component: string;
  readonly transports?: LogTransport[];
}

export interface ConsoleTransportConfig {
  readonly format?: LogFormat;
  /** Color level names; defaults to whether stderr is a terminal */
  readonly colors?: boolean;
}
