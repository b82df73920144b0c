import { describe, it, expect } from 'vitest';
import { DEFAULT_PROFILE, find_sensor, type SensorSpec } from '../../config/device_profile';
import { bind_command, decode_frame, encode_response, type ResponseBlock } from '../../protocol/frame_codec';
import type { ExecuteResult, Frame } from '../../protocol/types';
import { thermistor_temperature } from '../calibration';
import { decode_reading, decode_snapshot } from '../decoder';
import { DEFAULT_ELECTRICAL_CONSTANTS } from '../electrical_constants';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function sensor(name: string): SensorSpec {
  const found = find_sensor(DEFAULT_PROFILE, name);
  if (found === undefined) throw new Error(`no sensor ${name}`);
  return found;
}

function frame(command: string, blocks: ResponseBlock[]): Frame {
  const bound = bind_command(DEFAULT_PROFILE, command);
  if (!bound.ok) throw new Error(`cannot bind ${command}`);
  const decoded = decode_frame(encode_response(blocks), bound.command);
  if (!decoded.ok) throw new Error(`bad fixture for ${command}: ${decoded.error.detail}`);
  return decoded.frame;
}

const ANALOG = frame('get_analog_values', [
  { prefix: '!6', body: '700' },
  { prefix: '!4', body: '512' },
  { prefix: '!5', body: '512' }
]);

// ---------------------------------------------------------------------------
// decode_reading
// ---------------------------------------------------------------------------

describe('decode_reading', () => {
  it('applies the high-precision humidity calibration', () => {
    const r = decode_reading(frame('get_humidity', [{ prefix: '!hh', body: '32768' }]), sensor('relative_humidity'));
    expect(r.validity).toBe('in_range');
    expect(r.raw).toBe(32768);
    expect(r.unit).toBe('percent');
    expect(r.value).toBeCloseTo(56.5, 9);
  });

  it('selects the low-precision variant by prefix', () => {
    const r = decode_reading(frame('get_humidity', [{ prefix: '!h', body: '50' }]), sensor('relative_humidity'));
    expect(r.value).toBeCloseTo(56.5, 9);
  });

  it('maps the absent sentinel to sensor_absent', () => {
    const r = decode_reading(frame('get_humidity', [{ prefix: '!hh', body: '65535' }]), sensor('relative_humidity'));
    expect(r).toEqual({
      sensor: 'relative_humidity',
      raw: 65535,
      value: null,
      unit: 'percent',
      validity: 'sensor_absent'
    });
  });

  it('maps the low-precision temperature sentinel to sensor_absent', () => {
    const r = decode_reading(frame('get_temperature', [{ prefix: '!t', body: '100' }]), sensor('temperature'));
    expect(r.validity).toBe('sensor_absent');
    expect(r.value).toBeNull();
  });

  it('applies the high-precision temperature calibration', () => {
    const r = decode_reading(frame('get_temperature', [{ prefix: '!th', body: '32768' }]), sensor('temperature'));
    expect(r.value).toBeCloseTo(41.01, 6);
  });

  it('scales IR temperatures from hundredths of a degree', () => {
    const r = decode_reading(frame('get_sky_ir_temperature', [{ prefix: '!1', body: '-1850' }]), sensor('sky_ir_temperature'));
    expect(r.raw).toBe(-1850);
    expect(r.value).toBeCloseTo(-18.5, 9);
    expect(r.validity).toBe('in_range');
  });

  it('clamps an out-of-range count and flags it', () => {
    const r = decode_reading(frame('get_rain_frequency', [{ prefix: '!R', body: '7000' }]), sensor('rain_frequency'));
    expect(r).toEqual({
      sensor: 'rain_frequency',
      raw: 7000,
      value: 6500,
      unit: 'count',
      validity: 'out_of_range'
    });
  });

  it('converts the rain sensor thermistor count', () => {
    const r = decode_reading(ANALOG, sensor('rain_sensor_temperature'));
    expect(r.raw).toBe(512);
    expect(r.value).toBeCloseTo(24.9496, 3);
  });

  it('uses the rain sensor constants the device reports', () => {
    const r = decode_reading(ANALOG, sensor('rain_sensor_temperature'), {
      ...DEFAULT_ELECTRICAL_CONSTANTS,
      rain_pull_up_resistance: 2
    });
    expect(r.value).toBeCloseTo(thermistor_temperature(512, 1023, 2, 1, 3450), 9);
    expect(r.value).toBeCloseTo(8.1, 1);
  });

  it('clamps a railed thermistor count to 1022', () => {
    const railed = frame('get_analog_values', [
      { prefix: '!6', body: '700' },
      { prefix: '!4', body: '512' },
      { prefix: '!5', body: '1023' }
    ]);
    const r = decode_reading(railed, sensor('rain_sensor_temperature'));
    expect(r.validity).toBe('out_of_range');
    expect(r.value).toBeCloseTo(-86.6723, 3);
  });

  it('derives LDR resistance and relative light from the device constants', () => {
    const light = decode_reading(ANALOG, sensor('ambient_light'), DEFAULT_ELECTRICAL_CONSTANTS);
    expect(light.value).toBeCloseTo(56.1096, 3);

    const relative = decode_reading(ANALOG, sensor('relative_ambient_light'));
    expect(relative.value).toBeCloseTo(0.96783, 4);

    const doubled = decode_reading(ANALOG, sensor('ambient_light'), {
      ...DEFAULT_ELECTRICAL_CONSTANTS,
      ldr_pull_up_resistance: 112
    });
    expect(doubled.value).toBeCloseTo(112.2192, 3);
  });

  it('reports zero wind for a zero count and scales positive counts', () => {
    const still = decode_reading(frame('get_wind_sensor', [{ prefix: '!w', body: '0' }]), sensor('wind_speed'));
    expect(still.value).toBe(0);
    const breeze = decode_reading(frame('get_wind_sensor', [{ prefix: '!w', body: '10' }]), sensor('wind_speed'));
    expect(breeze.value).toBeCloseTo(11.4, 9);
  });

  it('treats a missing block as sensor_absent', () => {
    const r = decode_reading(frame('get_humidity', [{ prefix: '!hh', body: '100' }]), sensor('temperature'));
    expect(r).toMatchObject({ raw: null, value: null, validity: 'sensor_absent' });
  });

  it('treats a non-numeric body as sensor_absent', () => {
    const r = decode_reading(frame('get_rain_frequency', [{ prefix: '!R', body: 'n/a' }]), sensor('rain_frequency'));
    expect(r).toMatchObject({ raw: null, value: null, validity: 'sensor_absent' });
  });

  it('returns frozen readings', () => {
    const r = decode_reading(ANALOG, sensor('ambient_light'));
    expect(Object.isFrozen(r)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// decode_snapshot
// ---------------------------------------------------------------------------

describe('decode_snapshot', () => {
  it('keeps good sensors when another sensor command failed', () => {
    const results = new Map<string, ExecuteResult>([
      ['get_humidity', { ok: true, frame: frame('get_humidity', [{ prefix: '!hh', body: '65535' }]), attempts: 1 }],
      ['get_rain_frequency', { ok: true, frame: frame('get_rain_frequency', [{ prefix: '!R', body: '2700' }]), attempts: 1 }],
      ['get_temperature', { ok: false, error: { kind: 'device_unresponsive', attempts: 3 } }]
    ]);
    const taken_at = new Date('2024-01-01T00:00:00Z');

    const snapshot = decode_snapshot(
      results,
      [sensor('relative_humidity'), sensor('rain_frequency'), sensor('temperature'), sensor('wind_speed')],
      DEFAULT_ELECTRICAL_CONSTANTS,
      taken_at
    );

    expect(snapshot.taken_at).toBe(taken_at);
    expect(Object.keys(snapshot.readings).sort()).toEqual(['rain_frequency', 'relative_humidity']);
    expect(snapshot.readings.relative_humidity.validity).toBe('sensor_absent');
    expect(snapshot.readings.rain_frequency.value).toBe(2700);
    expect(snapshot.errors).toEqual({ temperature: { kind: 'device_unresponsive', attempts: 3 } });
  });

  it('marks a sensor absent when its presence flag reads zero', () => {
    const results = new Map<string, ExecuteResult>([
      ['get_wind_sensor_presence', { ok: true, frame: frame('get_wind_sensor_presence', [{ prefix: '!v', body: '0' }]), attempts: 1 }]
    ]);

    const snapshot = decode_snapshot(results, [sensor('wind_speed')]);

    expect(snapshot.readings.wind_speed).toEqual({
      sensor: 'wind_speed',
      raw: null,
      value: null,
      unit: 'km/h',
      validity: 'sensor_absent'
    });
    expect(snapshot.errors).toEqual({});
  });

  it('decodes the sensor when its presence flag is set or unreadable', () => {
    const wind: ExecuteResult = {
      ok: true,
      frame: frame('get_wind_sensor', [{ prefix: '!w', body: '10' }]),
      attempts: 1
    };
    const fitted = new Map<string, ExecuteResult>([
      ['get_wind_sensor_presence', { ok: true, frame: frame('get_wind_sensor_presence', [{ prefix: '!v', body: '1' }]), attempts: 1 }],
      ['get_wind_sensor', wind]
    ]);
    const unknown = new Map<string, ExecuteResult>([
      ['get_wind_sensor_presence', { ok: false, error: { kind: 'device_unresponsive', attempts: 3 } }],
      ['get_wind_sensor', wind]
    ]);

    expect(decode_snapshot(fitted, [sensor('wind_speed')]).readings.wind_speed.value).toBeCloseTo(11.4, 9);
    expect(decode_snapshot(unknown, [sensor('wind_speed')]).readings.wind_speed.value).toBeCloseTo(11.4, 9);
  });
});
