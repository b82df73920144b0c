/**
 * Driver configuration.
 *
 * Values are validated once with zod; everything downstream receives a fully
 * populated {@link DriverConfig}.
 *
 * @module config/driver_config
 */

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

/** Telemetry line rate of the CloudWatcher. */
export const DEFAULT_BAUD_RATE = 9600;

/** Line rate the bootloader listens on. */
export const DEFAULT_UPGRADE_BAUD_RATE = 57600;

/** Per-command response deadline in ms. */
export const DEFAULT_READ_TIMEOUT_MS = 2000;

export const DEFAULT_WRITE_TIMEOUT_MS = 1000;

/** Retries of a malformed response before ProtocolFailure. */
export const DEFAULT_RETRY_COUNT = 3;

/** Timeouts in a row tolerated before DeviceUnresponsive. */
export const DEFAULT_TIMEOUT_RETRIES = 2;

export const DriverConfigSchema = z.object({
  port: z.string().min(1, 'port is required'),
  baud: z.number().int().positive().default(DEFAULT_BAUD_RATE),
  read_timeout: z.number().int().positive().default(DEFAULT_READ_TIMEOUT_MS),
  write_timeout: z.number().int().positive().default(DEFAULT_WRITE_TIMEOUT_MS),
  retry_count: z.number().int().min(0).default(DEFAULT_RETRY_COUNT),
  timeout_retries: z.number().int().min(0).default(DEFAULT_TIMEOUT_RETRIES),
  upgrade_baud: z.number().int().positive().default(DEFAULT_UPGRADE_BAUD_RATE),
  log_level: z.enum(['error', 'warn', 'info', 'debug']).default('info')
});

export type DriverConfigInput = z.input<typeof DriverConfigSchema>;
export type DriverConfig = z.output<typeof DriverConfigSchema>;

/**
 * Validate and fill defaults.
 *
 * @throws {ConfigError} listing every invalid field.
 */
export function resolve_config(input: DriverConfigInput): DriverConfig {
  const result = DriverConfigSchema.safeParse(input);
  if (!result.success) {
    const fields = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid driver configuration: ${fields}`, result.error.issues);
  }
  return result.data;
}

const ENV_PREFIX = 'CLOUDWATCHER_';

const NUMERIC_ENV_KEYS = [
  'baud',
  'read_timeout',
  'write_timeout',
  'retry_count',
  'timeout_retries',
  'upgrade_baud'
] as const;

/**
 * Build a configuration from `CLOUDWATCHER_*` environment variables,
 * e.g. `CLOUDWATCHER_PORT=/dev/ttyUSB0 CLOUDWATCHER_READ_TIMEOUT=3000`.
 */
export function config_from_env(env: NodeJS.ProcessEnv = process.env): DriverConfig {
  const input: Record<string, unknown> = { port: env[`${ENV_PREFIX}PORT`] ?? '' };

  for (const key of NUMERIC_ENV_KEYS) {
    const value = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (value !== undefined && value !== '') {
      input[key] = Number(value);
    }
  }
  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level !== undefined && level !== '') {
    input.log_level = level;
  }

  const result = DriverConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${ENV_PREFIX}* environment: ${result.error.issues.map((i) => i.message).join('; ')}`,
      result.error.issues
    );
  }
  return result.data;
}
