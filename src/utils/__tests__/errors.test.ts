import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DriverError,
  IoError,
  PortInUseError,
  TimeoutError,
  get_error_message,
  is_error
} from '../errors';

describe('error hierarchy', () => {
  it('tags each class with its code and name', () => {
    expect(new IoError('x')).toMatchObject({ code: 'IO_ERROR', name: 'IoError' });
    expect(new TimeoutError()).toMatchObject({ code: 'TIMEOUT_ERROR', message: 'Operation timed out' });
    expect(new ConfigError('x')).toMatchObject({ code: 'CONFIG_ERROR', name: 'ConfigError' });
  });

  it('treats a held port as an I/O failure', () => {
    const err = new PortInUseError('/dev/ttyUSB0');
    expect(err).toBeInstanceOf(IoError);
    expect(err).toBeInstanceOf(DriverError);
    expect(err.message).toBe('Port /dev/ttyUSB0 is already in use');
    expect(err.code).toBe('PORT_IN_USE');
    expect(err.path).toBe('/dev/ttyUSB0');
  });

  it('keeps details for later inspection', () => {
    const cause = new Error('EACCES');
    expect(new IoError('open failed', cause).details).toBe(cause);
  });
});

describe('get_error_message', () => {
  it('reads the message of errors and stringifies anything else', () => {
    expect(get_error_message(new Error('boom'))).toBe('boom');
    expect(get_error_message('plain')).toBe('plain');
    expect(get_error_message(42)).toBe('42');
    expect(is_error({ message: 'not an error' })).toBe(false);
  });
});
