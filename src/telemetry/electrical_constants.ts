/**
 * Decoder for the binary `!M` electrical constants block.
 *
 * Body layout after the "!M" prefix (big-endian u16 pairs, first byte unused):
 *
 *   [0]      unused
 *   [1..2]   zener voltage      / 100 V
 *   [3..4]   LDR max resistance   kOhm
 *   [5..6]   LDR pull-up        / 10 kOhm
 *   [7..8]   rain sensor beta
 *   [9..10]  rain R at 25 C     / 10 kOhm
 *   [11..12] rain pull-up       / 10 kOhm
 *
 * @module telemetry/electrical_constants
 */

import { find_block } from '../protocol/frame_codec';
import type { Frame } from '../protocol/types';
import type { ElectricalConstants } from './telemetry_types';

/** Used until the device has reported its own constants. */
export const DEFAULT_ELECTRICAL_CONSTANTS: Readonly<ElectricalConstants> = Object.freeze({
  zener_voltage: 3,
  ldr_max_resistance: 1744,
  ldr_pull_up_resistance: 56,
  rain_beta: 3450,
  rain_res_at_25: 1,
  rain_pull_up_resistance: 1
});

const CONSTANTS_BODY_LENGTH = 13;

function u16(body: Uint8Array, offset: number): number {
  return 256 * body[offset] + body[offset + 1];
}

/**
 * @returns the constants, or null when the frame carries no complete `!M` block.
 */
export function parse_electrical_constants(frame: Frame): ElectricalConstants | null {
  const block = find_block(frame, '!M');
  if (block === undefined || block.body.length < CONSTANTS_BODY_LENGTH) {
    return null;
  }
  const v = block.body;
  return {
    zener_voltage: u16(v, 1) / 100,
    ldr_max_resistance: u16(v, 3),
    ldr_pull_up_resistance: u16(v, 5) / 10,
    rain_beta: u16(v, 7),
    rain_res_at_25: u16(v, 9) / 10,
    rain_pull_up_resistance: u16(v, 11) / 10
  };
}

/**
 * Inverse of {@link parse_electrical_constants}; builds the 13-byte body.
 */
export function encode_electrical_constants(c: ElectricalConstants): Uint8Array {
  const body = new Uint8Array(CONSTANTS_BODY_LENGTH);
  const put = (offset: number, value: number) => {
    const n = Math.round(value) & 0xffff;
    body[offset] = n >> 8;
    body[offset + 1] = n & 0xff;
  };
  put(1, c.zener_voltage * 100);
  put(3, c.ldr_max_resistance);
  put(5, c.ldr_pull_up_resistance * 10);
  put(7, c.rain_beta);
  put(9, c.rain_res_at_25 * 10);
  put(11, c.rain_pull_up_resistance * 10);
  return body;
}
