/**
 * Typed CloudWatcher operations on top of a {@link DeviceSession}.
 *
 * Every method returns a {@link DeviceResult}; this module never throws.
 *
 * @module device/cloudwatcher
 */

import { find_block } from '../protocol/frame_codec';
import type { ExecuteResult, Frame, ProtocolError } from '../protocol/types';
import type { DeviceSession, SnapshotResult } from '../session/device_session';
import { parse_count } from '../telemetry/decoder';
import type { ElectricalConstants } from '../telemetry/telemetry_types';

export type DeviceResult<T> = { ok: true; value: T } | { ok: false; error: ProtocolError };

export interface AnalogValues {
  zener_voltage: number;
  ldr_voltage: number;
  rain_sensor_temp: number;
}

export interface InternalErrors {
  first_address_byte_errors: number;
  command_byte_errors: number;
  second_address_byte_errors: number;
  pec_byte_errors: number;
}

export type SwitchStatus = 'open' | 'closed';

const SWITCH_OPEN_TEXT = 'Switch Open';
const SWITCH_CLOSED_TEXT = 'Switch Close';

function payload_error<T>(command: string, message: string): DeviceResult<T> {
  return { ok: false, error: { kind: 'invalid_payload', command, message } };
}

export class CloudWatcher {
  constructor(private readonly session: DeviceSession) {}

  // -----------------------------------------------------------------------
  // Identification
  // -----------------------------------------------------------------------

  get_internal_name(): Promise<DeviceResult<string>> {
    return this.text('get_internal_name', '!N');
  }

  get_version(): Promise<DeviceResult<string>> {
    return this.text('get_version', '!V');
  }

  get_serial_number(): Promise<DeviceResult<string>> {
    return this.text('get_serial_number', '!K');
  }

  /** Reset the device's receive buffer pointers. */
  async reset_buffers(): Promise<DeviceResult<void>> {
    const result = await this.session.execute('reset_buffers');
    return result.ok ? { ok: true, value: undefined } : result;
  }

  // -----------------------------------------------------------------------
  // Raw values
  // -----------------------------------------------------------------------

  async get_analog_values(): Promise<DeviceResult<AnalogValues>> {
    return this.counts('get_analog_values', ['!6', '!4', '!5'], ([zener, ldr, rain]) => ({
      zener_voltage: zener,
      ldr_voltage: ldr,
      rain_sensor_temp: rain
    }));
  }

  async get_internal_errors(): Promise<DeviceResult<InternalErrors>> {
    return this.counts('get_internal_errors', ['!E1', '!E2', '!E3', '!E4'], ([e1, e2, e3, e4]) => ({
      first_address_byte_errors: e1,
      command_byte_errors: e2,
      second_address_byte_errors: e3,
      pec_byte_errors: e4
    }));
  }

  async get_rain_frequency(): Promise<DeviceResult<number>> {
    return this.counts('get_rain_frequency', ['!R'], ([freq]) => freq);
  }

  /** Sky IR temperature in degrees C. */
  async get_sky_ir_temperature(): Promise<DeviceResult<number>> {
    return this.counts('get_sky_ir_temperature', ['!1'], ([raw]) => raw / 100);
  }

  /** IR sensor body temperature in degrees C. */
  async get_ir_sensor_temperature(): Promise<DeviceResult<number>> {
    return this.counts('get_ir_sensor_temperature', ['!2'], ([raw]) => raw / 100);
  }

  async get_wind_sensor_presence(): Promise<DeviceResult<boolean>> {
    return this.counts('get_wind_sensor_presence', ['!v'], ([flag]) => flag === 1);
  }

  async get_electrical_constants(): Promise<DeviceResult<ElectricalConstants>> {
    const read = await this.session.get_electrical_constants();
    return read.ok ? { ok: true, value: read.constants } : read;
  }

  // -----------------------------------------------------------------------
  // Relay switch
  // -----------------------------------------------------------------------

  async get_switch_status(): Promise<DeviceResult<SwitchStatus>> {
    return this.switch_command('get_switch_status');
  }

  /** Open (true) or close (false) the relay; resolves to the reported state. */
  async set_switch(open: boolean): Promise<DeviceResult<SwitchStatus>> {
    return this.switch_command(open ? 'set_switch_open' : 'set_switch_closed');
  }

  // -----------------------------------------------------------------------
  // Rain sensor heater
  // -----------------------------------------------------------------------

  async get_heater_pwm(): Promise<DeviceResult<number>> {
    return this.counts('get_heater_pwm', ['!Q'], ([pwm]) => pwm);
  }

  /** Set the heater duty (1..1023); resolves to the duty the device reports. */
  async set_heater_pwm(pwm: number): Promise<DeviceResult<number>> {
    return this.counts('set_heater_pwm', ['!Q'], ([reported]) => reported, pwm);
  }

  // -----------------------------------------------------------------------
  // Telemetry
  // -----------------------------------------------------------------------

  read_telemetry(): Promise<SnapshotResult> {
    return this.session.read_telemetry();
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private async text(name: string, prefix: string): Promise<DeviceResult<string>> {
    const result = await this.session.execute(name);
    if (!result.ok) return result;
    const block = find_block(result.frame, prefix);
    return block === undefined
      ? payload_error(name, `no ${prefix} block`)
      : { ok: true, value: block.text };
  }

  private async counts<T>(
    name: string,
    prefixes: readonly string[],
    build: (values: number[]) => T,
    argument?: number
  ): Promise<DeviceResult<T>> {
    const result: ExecuteResult = await this.session.execute(name, argument);
    if (!result.ok) return result;
    const values = read_counts(result.frame, prefixes);
    if (typeof values === 'string') {
      return payload_error(name, values);
    }
    return { ok: true, value: build(values) };
  }

  private async switch_command(name: string): Promise<DeviceResult<SwitchStatus>> {
    const result = await this.session.execute(name);
    if (!result.ok) return result;
    const [block] = result.frame.blocks;
    if (block.prefix === '!X' && block.text === SWITCH_OPEN_TEXT) {
      return { ok: true, value: 'open' };
    }
    if (block.prefix === '!Y' && block.text === SWITCH_CLOSED_TEXT) {
      return { ok: true, value: 'closed' };
    }
    return payload_error(name, `invalid switch status "${block.text}"`);
  }
}

/**
 * Integer bodies of the given blocks, or a description of the first one missing.
 */
function read_counts(frame: Frame, prefixes: readonly string[]): number[] | string {
  const values: number[] = [];
  for (const prefix of prefixes) {
    const block = find_block(frame, prefix);
    if (block === undefined) return `no ${prefix} block`;
    const value = parse_count(block);
    if (value === null) return `${prefix} is not an integer: "${block.text}"`;
    values.push(value);
  }
  return values;
}
