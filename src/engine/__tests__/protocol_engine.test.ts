/**
 * Tests for the protocol engine.
 *
 * Covers the happy path, Busy rejection, timeout retries and DeviceUnresponsive,
 * malformed frame retries and ProtocolFailure, stale frame resynchronisation,
 * I/O failures, delimited framing and phase_change events.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DEFAULT_PROFILE } from '../../config/device_profile';
import { bind_command } from '../../protocol/frame_codec';
import type { Command, EnginePhase } from '../../protocol/types';
import { IoError } from '../../utils/errors';
import { ProtocolEngine } from '../protocol_engine';
import { FakeTransport } from '../../../test/fixtures/fake_transport';
import { SimulatedCloudWatcher } from '../../../test/fixtures/simulated_device';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function command(name: string, argument?: number): Command {
  const bound = bind_command(DEFAULT_PROFILE, name, argument);
  if (!bound.ok) throw new Error(`cannot bind ${name}`);
  return bound.command;
}

describe('ProtocolEngine', () => {
  let transport: FakeTransport;
  let device: SimulatedCloudWatcher;
  let engine: ProtocolEngine;

  beforeEach(async () => {
    transport = new FakeTransport();
    await transport.open();
    device = new SimulatedCloudWatcher();
    device.attach(transport);
    engine = new ProtocolEngine(transport, { read_timeout: 2000, retry_count: 3, timeout_retries: 2 });
  });

  // --- Happy path ---------------------------------------------------------

  it('returns the validated frame of a single round trip', async () => {
    const result = await engine.execute(command('get_version'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.attempts).toBe(1);
    expect(result.frame.blocks[0].text).toBe('5.88');
    expect(transport.written_text()).toEqual(['B!']);
    expect(engine.get_phase()).toBe('idle');
    expect(engine.is_busy()).toBe(false);
  });

  it('sends the bound argument', async () => {
    const result = await engine.execute(command('set_heater_pwm', 512));
    expect(result.ok && result.frame.blocks[0].text).toBe('512');
    expect(transport.written_text()).toEqual(['P0512!']);
  });

  it('emits phase_change for every transition', async () => {
    const phases: EnginePhase[] = [];
    engine.on('phase_change', (p: EnginePhase) => phases.push(p));

    await engine.execute(command('get_version'));
    expect(phases).toEqual(['awaiting_response', 'decoding', 'idle']);
  });

  // --- Busy ---------------------------------------------------------------

  it('returns busy while another command is in flight', async () => {
    const first = engine.execute(command('get_version'));
    const second = await engine.execute(command('get_internal_name'));

    expect(second).toEqual({ ok: false, error: { kind: 'busy' } });
    expect((await first).ok).toBe(true);
    expect(transport.written_text()).toEqual(['B!']);
  });

  // --- Timeouts -----------------------------------------------------------

  it('succeeds after two timeouts', async () => {
    device.faults.push('timeout', 'timeout');
    const phases: EnginePhase[] = [];
    engine.on('phase_change', (p: EnginePhase) => phases.push(p));

    const result = await engine.execute(command('get_version'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.attempts).toBe(3);
    expect(transport.written_text()).toEqual(['B!', 'B!', 'B!']);
    expect(engine.get_counters()).toMatchObject({ commands: 1, retries: 2, timeouts: 2 });
    expect(phases).toEqual([
      'awaiting_response',
      'retrying',
      'awaiting_response',
      'retrying',
      'awaiting_response',
      'decoding',
      'idle'
    ]);
  });

  it('reports device_unresponsive after three consecutive timeouts', async () => {
    device.faults.push('timeout', 'timeout', 'timeout');

    const result = await engine.execute(command('get_version'));

    expect(result).toEqual({ ok: false, error: { kind: 'device_unresponsive', attempts: 3 } });
    expect(transport.written).toHaveLength(3);
    expect(engine.get_phase()).toBe('idle');
  });

  it('honours a zero timeout retry budget', async () => {
    engine = new ProtocolEngine(transport, { read_timeout: 2000, retry_count: 3, timeout_retries: 0 });
    device.faults.push('timeout');

    const result = await engine.execute(command('get_version'));
    expect(result).toEqual({ ok: false, error: { kind: 'device_unresponsive', attempts: 1 } });
  });

  // --- Malformed frames ---------------------------------------------------

  it('resends after a malformed frame and discards pending input', async () => {
    device.faults.push('wrong_prefix');

    const result = await engine.execute(command('get_version'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.attempts).toBe(2);
    expect(transport.discard_count).toBe(1);
    expect(engine.get_counters().malformed).toBe(1);
  });

  it('reports protocol_failure once the retry budget is spent', async () => {
    device.faults.push('bad_terminator', 'bad_terminator', 'bad_terminator', 'bad_terminator');

    const result = await engine.execute(command('get_version'));

    expect(result).toEqual({
      ok: false,
      error: { kind: 'protocol_failure', reason: 'missing_terminator', attempts: 4 }
    });
    expect(transport.written).toHaveLength(4);
    expect(engine.get_counters()).toMatchObject({ malformed: 4, retries: 3 });
  });

  it('resets the timeout run when a malformed frame arrives', async () => {
    device.faults.push('timeout', 'timeout', 'bad_terminator', 'timeout', 'timeout');

    const result = await engine.execute(command('get_version'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.attempts).toBe(6);
  });

  // --- Stale frames -------------------------------------------------------

  it('drops a stale frame and reads the real answer without resending', async () => {
    device.faults.push('stale');

    const result = await engine.execute(command('get_version'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.attempts).toBe(1);
    expect(result.frame.blocks[0].text).toBe('5.88');
    expect(transport.written_text()).toEqual(['B!']);
    expect(engine.get_counters().stale_frames).toBe(1);
    expect(transport.pending_bytes()).toBe(0);
  });

  it('resynchronises a multi-block response behind a stale frame', async () => {
    device.faults.push('stale');

    const result = await engine.execute(command('get_analog_values'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.frame.blocks.map((b) => b.text)).toEqual(['700', '512', '400']);
  });

  // --- I/O errors ---------------------------------------------------------

  it('returns io without retrying when the transport fails', async () => {
    transport.write_error = new IoError('device unplugged');
    const on_io = vi.fn();
    engine.on('io_error', on_io);

    const result = await engine.execute(command('get_version'));

    expect(result).toEqual({ ok: false, error: { kind: 'io', message: 'device unplugged' } });
    expect(on_io).toHaveBeenCalledWith('device unplugged');
    expect(engine.get_counters().io_errors).toBe(1);
    expect(engine.is_busy()).toBe(false);
  });

  // --- Delimited framing --------------------------------------------------

  it('reads delimited responses up to the handshake block', async () => {
    const fixed = command('get_analog_values');
    const delimited: Command = { ...fixed, response: { framing: 'delimited', blocks: fixed.response.blocks } };

    const result = await engine.execute(delimited);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.frame.blocks.map((b) => b.prefix)).toEqual(['!6', '!4', '!5']);
  });
});
