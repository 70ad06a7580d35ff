/**
 * Logging module - structured logger with pluggable transports
 */

export {
  LogLevel,
  type LogLevelName,
  type LogFormat,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportConfig,
  type LogData,
} from './types.js';
export { Logger, parseLogLevel } from './logger.js';
export { LoggerFactory, type LoggerReference } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
