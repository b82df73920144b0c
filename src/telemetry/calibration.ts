/**
 * Raw count to engineering unit conversions.
 *
 * All functions expect the count already clamped to the sensor's valid range.
 *
 * @module telemetry/calibration
 */

import type { Calibration } from '../config/device_profile';
import type { ElectricalConstants } from './telemetry_types';

const ABSOLUTE_ZERO = 273.15;

/** Sum of c[i] * raw^i, lowest order first. */
export function polynomial(coefficients: readonly number[], raw: number): number {
  let acc = 0;
  for (let i = coefficients.length - 1; i >= 0; i--) {
    acc = acc * raw + coefficients[i];
  }
  return acc;
}

/** Resistance of the lower leg of a divider read by an ADC of full scale `adc_max`. */
export function divider_resistance(pull_up: number, adc_max: number, raw: number): number {
  return pull_up / (adc_max / raw - 1);
}

/** Beta-equation thermistor temperature in degrees C. */
export function thermistor_temperature(
  raw: number,
  adc_max: number,
  pull_up: number,
  r25: number,
  beta: number
): number {
  const r = Math.log(divider_resistance(pull_up, adc_max, raw) / r25);
  return 1 / (r / beta + 1 / (ABSOLUTE_ZERO + 25)) - ABSOLUTE_ZERO;
}

export function apply_calibration(
  calibration: Calibration,
  raw: number,
  constants: ElectricalConstants
): number {
  switch (calibration.kind) {
    case 'polynomial':
      return polynomial(calibration.coefficients, raw);
    case 'anemometer':
      return raw > 0 ? raw * calibration.slope + calibration.offset : 0;
    case 'thermistor':
      return thermistor_temperature(
        raw,
        calibration.adc_max,
        constants.rain_pull_up_resistance,
        constants.rain_res_at_25,
        constants.rain_beta
      );
    case 'ldr':
      return divider_resistance(constants.ldr_pull_up_resistance, calibration.adc_max, raw);
    case 'ldr_relative':
      return (
        1 -
        divider_resistance(constants.ldr_pull_up_resistance, calibration.adc_max, raw) /
          constants.ldr_max_resistance
      );
  }
}
