import { Logger, parseLogLevel } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { LogLevel, type LogFormat } from './types.js';

/**
 * A logger, the name of a shared logger, or `null` to disable logging
 */
export type LoggerReference = Logger | string | null;

const namedLoggers = new Map<string, Logger>();

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger with console transport only
   */
  static createConsoleLogger(
    component: string,
    level: LogLevel | string = LogLevel.INFO,
    format: LogFormat = 'text'
  ): Logger {
    return new Logger({
      component,
      level: parseLogLevel(level),
      transports: [new ConsoleTransport({ format })],
    });
  }

  /**
   * Get the shared logger registered under a name, creating a console logger on first use.
   * Shared loggers start at WARN so that routine INFO lines stay quiet until configured.
   */
  static getLogger(name: string): Logger {
    let logger = namedLoggers.get(name);
    if (!logger) {
      logger = LoggerFactory.createConsoleLogger(name, LogLevel.WARN);
      namedLoggers.set(name, logger);
    }
    return logger;
  }

  /**
   * Register a logger under a name, replacing any previous one
   */
  static setLogger(name: string, logger: Logger): void {
    namedLoggers.set(name, logger);
  }

  /**
   * Resolve a logger reference: names go through the shared registry, `null` disables logging
   */
  static resolve(reference: LoggerReference): Logger | null {
    if (reference === null) {
      return null;
    }
    return typeof reference === 'string' ? LoggerFactory.getLogger(reference) : reference;
  }
}
