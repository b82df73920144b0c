/**
 * Device profile: the command vocabulary and sensor table of a device.
 *
 * The profile is plain JSON. The bundled CloudWatcher profile lives in
 * `config/cloudwatcher.json`; other firmware revisions can be described by a
 * separate file passed to {@link load_device_profile}.
 *
 * @module config/device_profile
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, get_error_message } from '../utils/errors';
import cloudwatcher_profile from '../../config/cloudwatcher.json';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const PrefixSchema = z
  .string()
  .min(2)
  .max(15)
  .regex(/^![\x21-\x7e]+$/, 'block prefix must be "!" followed by printable ASCII');

const ResponseShapeSchema = z.object({
  framing: z.enum(['fixed', 'delimited']).default('fixed'),
  /** Allowed prefixes for each data block, in wire order. */
  blocks: z.array(z.array(PrefixSchema).min(1))
});

const ArgumentSpecSchema = z
  .object({
    width: z.number().int().min(1).max(8),
    min: z.number().int().min(0),
    max: z.number().int().min(0)
  })
  .refine((a) => a.min <= a.max, 'argument min must not exceed max')
  .refine((a) => String(a.max).length <= a.width, 'argument max does not fit in width');

const CommandDefSchema = z.object({
  token: z.string().regex(/^[\x21-\x7e]{1,2}$/, 'token must be one or two printable characters'),
  description: z.string().optional(),
  argument: ArgumentSpecSchema.optional(),
  response: ResponseShapeSchema,
  timeout_ms: z.number().int().positive().optional()
});

const CalibrationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('polynomial'), coefficients: z.array(z.number()).min(1) }),
  z.object({ kind: z.literal('anemometer'), slope: z.number(), offset: z.number() }),
  z.object({ kind: z.literal('thermistor'), adc_max: z.number().int().positive() }),
  z.object({ kind: z.literal('ldr'), adc_max: z.number().int().positive() }),
  z.object({ kind: z.literal('ldr_relative'), adc_max: z.number().int().positive() })
]);

const SensorVariantSchema = z
  .object({
    prefix: PrefixSchema,
    raw_range: z.tuple([z.number(), z.number()]),
    absent: z.array(z.number()).default([]),
    calibration: CalibrationSchema
  })
  .refine((v) => v.raw_range[0] <= v.raw_range[1], 'raw_range must be ascending');

const SensorSpecSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  unit: z.string(),
  variants: z.array(SensorVariantSchema).min(1),
  /** Presence flag read first; a zero count marks the sensor absent. */
  requires: z.object({ command: z.string().min(1), prefix: PrefixSchema }).optional()
});

export const DeviceProfileSchema = z
  .object({
    name: z.string().min(1),
    commands: z.record(CommandDefSchema),
    sensors: z.array(SensorSpecSchema).default([])
  })
  .superRefine((profile, ctx) => {
    const seen = new Set<string>();
    profile.sensors.forEach((sensor, index) => {
      if (sensor.requires !== undefined) {
        const gate = profile.commands[sensor.requires.command];
        if (gate === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['sensors', index, 'requires'],
            message: `sensor "${sensor.name}" requires unknown command "${sensor.requires.command}"`
          });
        } else if (!gate.response.blocks.flat().includes(sensor.requires.prefix)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['sensors', index, 'requires'],
            message: `prefix "${sensor.requires.prefix}" is not returned by "${sensor.requires.command}"`
          });
        }
      }

      if (seen.has(sensor.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sensors', index, 'name'],
          message: `duplicate sensor "${sensor.name}"`
        });
      }
      seen.add(sensor.name);

      const command = profile.commands[sensor.command];
      if (command === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sensors', index, 'command'],
          message: `sensor "${sensor.name}" refers to unknown command "${sensor.command}"`
        });
        return;
      }
      const declared = command.response.blocks.flat();
      for (const variant of sensor.variants) {
        if (!declared.includes(variant.prefix)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['sensors', index, 'variants'],
            message: `prefix "${variant.prefix}" is not returned by "${sensor.command}"`
          });
        }
      }
    });
  });

export type DeviceProfile = z.output<typeof DeviceProfileSchema>;
export type CommandDef = DeviceProfile['commands'][string];
export type ArgumentSpec = NonNullable<CommandDef['argument']>;
export type ResponseShape = CommandDef['response'];
export type SensorSpec = DeviceProfile['sensors'][number];
export type SensorVariant = SensorSpec['variants'][number];
export type Calibration = SensorVariant['calibration'];

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Validate an already-parsed profile document.
 *
 * @throws {ConfigError} when the document does not describe a valid profile.
 */
export function parse_device_profile(document: unknown, source = 'profile'): DeviceProfile {
  const result = DeviceProfileSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid device profile (${source}): ${issues}`, result.error.issues);
  }
  return result.data;
}

/**
 * Read and validate a profile JSON file.
 *
 * @throws {ConfigError} when the file cannot be read, is not JSON, or fails validation.
 */
export async function load_device_profile(path: string): Promise<DeviceProfile> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read device profile ${path}: ${get_error_message(err)}`, err);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Device profile ${path} is not valid JSON: ${get_error_message(err)}`, err);
  }
  return parse_device_profile(document, path);
}

/** The bundled CloudWatcher profile. */
export const DEFAULT_PROFILE: DeviceProfile = parse_device_profile(
  cloudwatcher_profile,
  'config/cloudwatcher.json'
);

export function find_sensor(profile: DeviceProfile, name: string): SensorSpec | undefined {
  return profile.sensors.find((s) => s.name === name);
}
