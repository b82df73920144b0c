/**
 * Protocol engine: one command round trip at a time.
 *
 * State transitions:
 *   IDLE --> AWAITING_RESPONSE        on execute()
 *   AWAITING_RESPONSE --> DECODING    once the response bytes are in
 *   DECODING --> AWAITING_RESPONSE    stale frame: one extra read, no resend
 *   DECODING --> IDLE                 valid frame, or retries exhausted
 *   AWAITING_RESPONSE --> RETRYING    on timeout
 *   DECODING --> RETRYING             on malformed frame
 *   RETRYING --> AWAITING_RESPONSE    input discarded, command resent
 *   any --> IDLE                      on I/O error (not retried)
 *
 * Outcomes are returned as {@link ExecuteResult}; nothing here throws.
 *
 * @module engine/protocol_engine
 */

import { EventEmitter } from 'events';
import { HANDSHAKE_BLOCK } from '../protocol/constants';
import { decode_frame, encode_command, expected_response_length } from '../protocol/frame_codec';
import type {
  Command,
  EngineCounters,
  EnginePhase,
  ExecuteResult,
  Frame,
  Malformed
} from '../protocol/types';
import type { Transport } from '../transport/transport';
import { TimeoutError, get_error_message } from '../utils/errors';
import { create_logger } from '../utils/logger';

const log = create_logger('Engine');

export interface EngineOptions {
  /** Default response deadline in ms, used when a command declares none. */
  read_timeout: number;
  /** Resends after a malformed response before ProtocolFailure. */
  retry_count: number;
  /** Consecutive timeouts tolerated before DeviceUnresponsive. */
  timeout_retries: number;
}

/** Result of one write/read/decode pass. */
type Exchange =
  | { kind: 'frame'; frame: Frame }
  | { kind: 'malformed'; error: Malformed }
  | { kind: 'timeout' }
  | { kind: 'io'; message: string };

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length === 0) return b;
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

/**
 * Serializes command/response exchanges over a transport.
 *
 * Emits:
 *   'phase_change' (phase: EnginePhase) -- whenever the phase transitions
 *   'io_error'     (message: string)    -- the transport failed; the link is unusable
 */
export class ProtocolEngine extends EventEmitter {
  private phase: EnginePhase = 'idle';
  private in_flight = false;
  private counters: EngineCounters = {
    commands: 0,
    retries: 0,
    timeouts: 0,
    malformed: 0,
    stale_frames: 0,
    io_errors: 0
  };

  constructor(
    private readonly transport: Transport,
    private readonly options: EngineOptions
  ) {
    super();
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  get_phase(): EnginePhase {
    return this.phase;
  }

  is_busy(): boolean {
    return this.in_flight;
  }

  get_counters(): EngineCounters {
    return { ...this.counters };
  }

  /**
   * Send a command and wait for its validated response.
   *
   * Returns `busy` without touching the transport if a command is in flight.
   */
  async execute(command: Command): Promise<ExecuteResult> {
    if (this.in_flight) {
      return { ok: false, error: { kind: 'busy' } };
    }
    this.in_flight = true;
    this.counters.commands++;
    try {
      return await this.run(command);
    } finally {
      this.in_flight = false;
      this._transition('idle');
    }
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private async run(command: Command): Promise<ExecuteResult> {
    const wire = encode_command(command);
    const timeout_ms = command.timeout_ms ?? this.options.read_timeout;

    let attempts = 0;
    let consecutive_timeouts = 0;
    let malformed_count = 0;

    for (;;) {
      attempts++;
      if (attempts > 1) {
        this.counters.retries++;
        this._transition('retrying');
        this.transport.discard_input();
      }
      this._transition('awaiting_response');

      const outcome = await this.exchange(command, wire, timeout_ms);

      switch (outcome.kind) {
        case 'frame':
          log.debug(`${command.name} ok after ${attempts} attempt(s)`);
          return { ok: true, frame: outcome.frame, attempts };

        case 'io':
          this.counters.io_errors++;
          log.error(`${command.name}: ${outcome.message}`);
          this.emit('io_error', outcome.message);
          return { ok: false, error: { kind: 'io', message: outcome.message } };

        case 'timeout':
          this.counters.timeouts++;
          consecutive_timeouts++;
          log.warn(`${command.name}: no response within ${timeout_ms} ms (${consecutive_timeouts} in a row)`);
          if (consecutive_timeouts > this.options.timeout_retries) {
            return { ok: false, error: { kind: 'device_unresponsive', attempts } };
          }
          break;

        case 'malformed':
          consecutive_timeouts = 0;
          malformed_count++;
          this.counters.malformed++;
          log.warn(`${command.name}: ${outcome.error.reason} (${outcome.error.detail})`);
          if (malformed_count > this.options.retry_count) {
            return {
              ok: false,
              error: { kind: 'protocol_failure', reason: outcome.error.reason, attempts }
            };
          }
          break;
      }
    }
  }

  /**
   * Write the command, read the response and decode it. A response of the
   * wrong length gets exactly one further read, keeping any bytes that follow
   * a stale terminator.
   */
  private async exchange(command: Command, wire: Uint8Array, timeout_ms: number): Promise<Exchange> {
    try {
      await this.transport.write(wire);

      let raw = await this.read_response(command, timeout_ms, new Uint8Array(0));
      this._transition('decoding');
      let decoded = decode_frame(raw, command);

      if (!decoded.ok && decoded.error.reason === 'length_mismatch') {
        this.counters.stale_frames++;
        const offset = decoded.error.resync_offset;
        const carry = offset === undefined ? new Uint8Array(0) : raw.slice(offset);
        log.debug(`${command.name}: stale frame, reading again (${carry.length} bytes carried)`);

        this._transition('awaiting_response');
        raw = await this.read_response(command, timeout_ms, carry);
        this._transition('decoding');
        decoded = decode_frame(raw, command);
      }

      return decoded.ok
        ? { kind: 'frame', frame: decoded.frame }
        : { kind: 'malformed', error: decoded.error };
    } catch (err) {
      if (err instanceof TimeoutError) {
        return { kind: 'timeout' };
      }
      return { kind: 'io', message: get_error_message(err) };
    }
  }

  private async read_response(
    command: Command,
    timeout_ms: number,
    carry: Uint8Array
  ): Promise<Uint8Array> {
    if (command.response.framing === 'delimited') {
      return concat(carry, await this.transport.read_until(HANDSHAKE_BLOCK, timeout_ms));
    }
    const need = expected_response_length(command) - carry.length;
    if (need <= 0) {
      return carry;
    }
    return concat(carry, await this.transport.read_exact(need, timeout_ms));
  }

  private _transition(new_phase: EnginePhase): void {
    if (this.phase === new_phase) return;
    this.phase = new_phase;
    this.emit('phase_change', new_phase);
  }
}
