/**
 * Telemetry decoder: validated frames to calibrated readings.
 *
 * Pure functions. A sensor whose block is missing, unparseable or carries an
 * absent sentinel, or whose presence flag reads zero, yields a `sensor_absent`
 * reading; a count outside the valid
 * range is clamped and flagged `out_of_range`. One bad sensor never fails the
 * others in a snapshot.
 *
 * @module telemetry/decoder
 */

import type { SensorSpec, SensorVariant } from '../config/device_profile';
import type { ExecuteResult, Frame, FrameBlock, ProtocolError } from '../protocol/types';
import { apply_calibration } from './calibration';
import { DEFAULT_ELECTRICAL_CONSTANTS } from './electrical_constants';
import type {
  ElectricalConstants,
  TelemetryReading,
  TelemetrySnapshot,
  Validity
} from './telemetry_types';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Parse a block's ASCII body as an integer count. */
export function parse_count(block: FrameBlock): number | null {
  return INTEGER_PATTERN.test(block.text) ? Number.parseInt(block.text, 10) : null;
}

function reading(
  sensor: SensorSpec,
  raw: number | null,
  value: number | null,
  validity: Validity
): TelemetryReading {
  return Object.freeze({ sensor: sensor.name, raw, value, unit: sensor.unit, validity });
}

function select_variant(
  frame: Frame,
  sensor: SensorSpec
): { variant: SensorVariant; block: FrameBlock } | null {
  for (const variant of sensor.variants) {
    const block = frame.blocks.find((b) => b.prefix === variant.prefix);
    if (block !== undefined) return { variant, block };
  }
  return null;
}

/**
 * Decode one sensor from a validated frame.
 *
 * @param constants - Device electrical constants, used by the thermistor and LDR calibrations.
 */
export function decode_reading(
  frame: Frame,
  sensor: SensorSpec,
  constants: ElectricalConstants = DEFAULT_ELECTRICAL_CONSTANTS
): TelemetryReading {
  const selected = select_variant(frame, sensor);
  if (selected === null) {
    return reading(sensor, null, null, 'sensor_absent');
  }
  const { variant, block } = selected;

  const raw = parse_count(block);
  if (raw === null) {
    return reading(sensor, null, null, 'sensor_absent');
  }
  if (variant.absent.includes(raw)) {
    return reading(sensor, raw, null, 'sensor_absent');
  }

  const [low, high] = variant.raw_range;
  const clamped = Math.min(Math.max(raw, low), high);
  const value = apply_calibration(variant.calibration, clamped, constants);
  if (!Number.isFinite(value)) {
    return reading(sensor, raw, null, 'sensor_absent');
  }
  return reading(sensor, raw, value, clamped === raw ? 'in_range' : 'out_of_range');
}

/**
 * Whether a sensor's presence flag reads zero. A missing or failed presence
 * read leaves the sensor to its own command.
 */
export function gated_absent(sensor: SensorSpec, results: ReadonlyMap<string, ExecuteResult>): boolean {
  const { requires } = sensor;
  if (requires === undefined) return false;
  const gate = results.get(requires.command);
  if (gate === undefined || !gate.ok) return false;
  const block = gate.frame.blocks.find((b) => b.prefix === requires.prefix);
  return block !== undefined && parse_count(block) === 0;
}

/**
 * Build a snapshot from the results of the commands the sensors need.
 *
 * @param results - Execute results keyed by command name.
 */
export function decode_snapshot(
  results: ReadonlyMap<string, ExecuteResult>,
  sensors: readonly SensorSpec[],
  constants: ElectricalConstants = DEFAULT_ELECTRICAL_CONSTANTS,
  taken_at: Date = new Date()
): TelemetrySnapshot {
  const readings: Record<string, TelemetryReading> = {};
  const errors: Record<string, ProtocolError> = {};

  for (const sensor of sensors) {
    if (gated_absent(sensor, results)) {
      readings[sensor.name] = reading(sensor, null, null, 'sensor_absent');
      continue;
    }
    const result = results.get(sensor.command);
    if (result === undefined) continue;
    if (result.ok) {
      readings[sensor.name] = decode_reading(result.frame, sensor, constants);
    } else {
      errors[sensor.name] = result.error;
    }
  }

  return Object.freeze({ taken_at, readings, errors });
}
