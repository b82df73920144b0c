/**
 * Device session: exclusive owner of one port.
 *
 * A session runs either in telemetry mode, where commands go through the
 * protocol engine, or in upgrade mode, where the port belongs to the upgrade
 * machine. The two never overlap. An I/O failure closes the session.
 *
 * @module session/device_session
 */

import { EventEmitter } from 'events';
import { DEFAULT_PROFILE, type DeviceProfile } from '../config/device_profile';
import { resolve_config, type DriverConfig, type DriverConfigInput } from '../config/driver_config';
import { ProtocolEngine } from '../engine/protocol_engine';
import { bind_command } from '../protocol/frame_codec';
import type { EngineCounters, ExecuteResult, ProtocolError } from '../protocol/types';
import { decode_snapshot, gated_absent } from '../telemetry/decoder';
import { parse_electrical_constants } from '../telemetry/electrical_constants';
import type { ElectricalConstants, TelemetrySnapshot } from '../telemetry/telemetry_types';
import { SerialTransport } from '../transport/serial_transport';
import type { Transport } from '../transport/transport';
import { UpgradeMachine } from '../upgrade/upgrade_machine';
import type { UpgradeOptions, UpgradePhase } from '../upgrade/upgrade_types';
import { get_error_message } from '../utils/errors';
import { configure_logging, create_logger } from '../utils/logger';

const log = create_logger('Session');

const CONSTANTS_COMMAND = 'get_electrical_constants';

export type SessionMode = 'telemetry' | 'upgrade' | 'closed';

export interface SessionOptions {
  /** Command and sensor table; the bundled CloudWatcher profile by default. */
  profile?: DeviceProfile;
  /** Pre-built transport; a {@link SerialTransport} on `config.port` by default. */
  transport?: Transport;
}

export type SnapshotResult =
  | { ok: true; snapshot: TelemetrySnapshot }
  | { ok: false; error: ProtocolError };

export type BeginUpgradeResult =
  | { ok: true; handle: UpgradeMachine }
  | { ok: false; error: ProtocolError };

/** Errors after which a snapshot cannot continue with the next command. */
const FATAL_KINDS: ReadonlySet<ProtocolError['kind']> = new Set(['io', 'closed', 'busy', 'upgrade_active']);

/**
 * Emits:
 *   'mode_change' (mode: SessionMode) -- telemetry, upgrade or closed
 */
export class DeviceSession extends EventEmitter {
  private mode: SessionMode = 'telemetry';
  private readonly engine: ProtocolEngine;
  private upgrade: UpgradeMachine | null = null;
  private constants: ElectricalConstants | null = null;

  private constructor(
    readonly config: DriverConfig,
    readonly profile: DeviceProfile,
    private readonly transport: Transport
  ) {
    super();
    this.engine = new ProtocolEngine(transport, {
      read_timeout: config.read_timeout,
      retry_count: config.retry_count,
      timeout_retries: config.timeout_retries
    });
  }

  /**
   * Validate the configuration, open the port and return a session.
   *
   * @throws {ConfigError} on invalid configuration.
   * @throws {IoError} if the port cannot be opened or is already held.
   */
  static async open(input: DriverConfigInput, options: SessionOptions = {}): Promise<DeviceSession> {
    const config = resolve_config(input);
    configure_logging(config.log_level);

    const transport =
      options.transport ??
      new SerialTransport({
        path: config.port,
        baud_rate: config.baud,
        write_timeout_ms: config.write_timeout
      });
    await transport.open();
    log.info(`session open on ${config.port}`);
    return new DeviceSession(config, options.profile ?? DEFAULT_PROFILE, transport);
  }

  // -----------------------------------------------------------------------
  // Accessors
  // -----------------------------------------------------------------------

  get_mode(): SessionMode {
    return this.mode;
  }

  is_open(): boolean {
    return this.mode !== 'closed';
  }

  get_counters(): EngineCounters {
    return this.engine.get_counters();
  }

  // -----------------------------------------------------------------------
  // Telemetry mode
  // -----------------------------------------------------------------------

  /**
   * Bind a profile command and run it through the engine.
   */
  async execute(name: string, argument?: number): Promise<ExecuteResult> {
    const blocked = this.mode_error();
    if (blocked !== null) {
      return { ok: false, error: blocked };
    }
    const bound = bind_command(this.profile, name, argument);
    if (!bound.ok) {
      return bound;
    }

    const result = await this.engine.execute(bound.command);
    if (!result.ok && result.error.kind === 'io') {
      await this.close_after_failure(result.error.message);
    }
    return result;
  }

  /**
   * Electrical constants, read from the device once per session.
   */
  async get_electrical_constants(): Promise<
    { ok: true; constants: ElectricalConstants } | { ok: false; error: ProtocolError }
  > {
    if (this.constants !== null) {
      return { ok: true, constants: this.constants };
    }
    const result = await this.execute(CONSTANTS_COMMAND);
    if (!result.ok) {
      return result;
    }
    const constants = parse_electrical_constants(result.frame);
    if (constants === null) {
      return {
        ok: false,
        error: { kind: 'invalid_payload', command: CONSTANTS_COMMAND, message: 'incomplete !M block' }
      };
    }
    this.constants = constants;
    return { ok: true, constants };
  }

  /**
   * Pull every sensor in the profile once. Each command is sent once even
   * when several sensors share it; a command whose sensors all read absent
   * on their presence flag is not sent.
   */
  async read_telemetry(): Promise<SnapshotResult> {
    const blocked = this.mode_error();
    if (blocked !== null) {
      return { ok: false, error: blocked };
    }

    let constants: ElectricalConstants | undefined;
    if (Object.prototype.hasOwnProperty.call(this.profile.commands, CONSTANTS_COMMAND)) {
      const read = await this.get_electrical_constants();
      if (read.ok) {
        constants = read.constants;
      } else if (FATAL_KINDS.has(read.error.kind)) {
        return read;
      } else {
        log.warn('electrical constants unavailable, using defaults');
      }
    }

    // Presence flags go ahead of the commands they gate.
    const commands = [
      ...new Set(
        this.profile.sensors.flatMap((s) => (s.requires === undefined ? [s.command] : [s.requires.command, s.command]))
      )
    ];
    const results = new Map<string, ExecuteResult>();
    for (const name of commands) {
      const users = this.profile.sensors.filter((s) => s.command === name);
      if (users.length > 0 && users.every((s) => gated_absent(s, results))) {
        log.debug(`${name} skipped, no sensor fitted`);
        continue;
      }
      const result = await this.execute(name);
      if (!result.ok && FATAL_KINDS.has(result.error.kind)) {
        return result;
      }
      results.set(name, result);
    }

    return { ok: true, snapshot: decode_snapshot(results, this.profile.sensors, constants) };
  }

  // -----------------------------------------------------------------------
  // Upgrade mode
  // -----------------------------------------------------------------------

  /**
   * Hand the port to a new upgrade machine. Telemetry commands are refused
   * until it reaches done or aborted.
   *
   * @throws {DriverError} if the image is empty or too large.
   */
  begin_upgrade(image: Uint8Array, options: Partial<UpgradeOptions> = {}): BeginUpgradeResult {
    const blocked = this.mode_error();
    if (blocked !== null) {
      return { ok: false, error: blocked };
    }
    if (this.engine.is_busy()) {
      return { ok: false, error: { kind: 'busy' } };
    }

    const machine = new UpgradeMachine(this.transport, image, {
      upgrade_baud: this.config.upgrade_baud,
      telemetry_baud: this.config.baud,
      ...options
    });
    machine.on('phase_change', (phase: UpgradePhase) => {
      if (phase === 'done' || phase === 'aborted') {
        this.upgrade = null;
        this.constants = null;
        if (this.mode === 'upgrade') {
          this._set_mode('telemetry');
        }
      }
    });

    this.upgrade = machine;
    this._set_mode('upgrade');
    return { ok: true, handle: machine };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Abort any upgrade in progress and release the port.
   */
  async close(): Promise<void> {
    if (this.mode === 'closed') return;
    if (this.upgrade !== null) {
      await this.upgrade.abort('session closed');
    }
    this._set_mode('closed');
    await this.transport.close();
    log.info(`session on ${this.config.port} closed`);
  }

  private mode_error(): ProtocolError | null {
    if (this.mode === 'closed') return { kind: 'closed' };
    if (this.mode === 'upgrade') return { kind: 'upgrade_active' };
    return null;
  }

  private async close_after_failure(message: string): Promise<void> {
    log.error(`closing session after I/O failure: ${message}`);
    try {
      await this.close();
    } catch (err) {
      log.error(`port release failed: ${get_error_message(err)}`);
    }
  }

  private _set_mode(mode: SessionMode): void {
    if (this.mode === mode) return;
    this.mode = mode;
    this.emit('mode_change', mode);
  }
}

/**
 * Open a session, run `fn`, and close the session on every exit path.
 */
export async function with_session<T>(
  config: DriverConfigInput,
  fn: (session: DeviceSession) => Promise<T>,
  options: SessionOptions = {}
): Promise<T> {
  const session = await DeviceSession.open(config, options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
