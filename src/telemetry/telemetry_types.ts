/**
 * Telemetry reading types.
 *
 * @module telemetry/telemetry_types
 */

import type { ProtocolError } from '../protocol/types';

export type Validity = 'in_range' | 'out_of_range' | 'sensor_absent';

/** One decoded sensor value. Immutable once built. */
export interface TelemetryReading {
  readonly sensor: string;
  /** Count as reported by the device; null when the block was missing or unparseable. */
  readonly raw: number | null;
  /** Calibrated value; null when the sensor is absent. */
  readonly value: number | null;
  readonly unit: string;
  readonly validity: Validity;
}

/** Constants reported by the device in its `!M` block. */
export interface ElectricalConstants {
  /** Volts. */
  zener_voltage: number;
  /** kOhm. */
  ldr_max_resistance: number;
  /** kOhm. */
  ldr_pull_up_resistance: number;
  rain_beta: number;
  /** kOhm. */
  rain_res_at_25: number;
  /** kOhm. */
  rain_pull_up_resistance: number;
}

/**
 * Result of one pull of every configured sensor. Sensors whose command failed
 * appear under `errors`, keyed by sensor name.
 */
export interface TelemetrySnapshot {
  readonly taken_at: Date;
  readonly readings: Readonly<Record<string, TelemetryReading>>;
  readonly errors: Readonly<Record<string, ProtocolError>>;
}
