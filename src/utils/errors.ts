/**
 * Error classes thrown by the transport and configuration layers.
 *
 * Protocol-level outcomes (busy, unresponsive device, malformed frames) are
 * returned as data by the engine and never thrown; these classes cover the
 * conditions below it.
 *
 * @module utils/errors
 */

export class DriverError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'DriverError';
  }
}

/** Serial port failure: open, write, unexpected close. Fatal to the session. */
export class IoError extends DriverError {
  constructor(message: string, details?: unknown) {
    super(message, 'IO_ERROR', details);
    this.name = 'IoError';
  }
}

/** A read or write deadline expired before the device answered. */
export class TimeoutError extends DriverError {
  constructor(message: string = 'Operation timed out') {
    super(message, 'TIMEOUT_ERROR');
    this.name = 'TimeoutError';
  }
}

/** The port is already held by another session. */
export class PortInUseError extends IoError {
  constructor(public path: string) {
    super(`Port ${path} is already in use`);
    this.code = 'PORT_IN_USE';
    this.name = 'PortInUseError';
  }
}

export class ConfigError extends DriverError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export function is_error(error: unknown): error is Error {
  return error instanceof Error;
}

export function get_error_message(error: unknown): string {
  if (is_error(error)) {
    return error.message;
  }
  return String(error);
}
