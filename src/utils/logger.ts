/**
 * Scoped logger on top of electron-log's Node entry point.
 *
 * Only the console transport is active; applications that want a log file
 * turn it on through {@link configure_logging}.
 *
 * @module utils/logger
 */

import log from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

log.transports.file.level = false;
log.transports.console.level = 'info';

export class Logger {
  private readonly prefix: string;

  constructor(scope: string) {
    this.prefix = `[${scope}]`;
  }

  error(message: string, ...args: unknown[]): void {
    log.error(this.prefix, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    log.warn(this.prefix, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    log.info(this.prefix, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    log.debug(this.prefix, message, ...args);
  }
}

/**
 * Set the console level and optionally enable the file transport.
 */
export function configure_logging(level: LogLevel, file_level: LogLevel | false = false): void {
  log.transports.console.level = level;
  log.transports.file.level = file_level;
}

export function create_logger(scope: string): Logger {
  return new Logger(scope);
}
