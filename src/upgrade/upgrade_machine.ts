/**
 * Firmware upgrade state machine.
 *
 * State transitions:
 *   IDLE --> HANDSHAKE_SENT                 reboot sequence written, port at upgrade baud
 *   HANDSHAKE_SENT --> BOOTLOADER_CONFIRMED  prompt 'c' received, 'd' answered
 *   BOOTLOADER_CONFIRMED --> TRANSFERRING    image header ACKed
 *   TRANSFERRING --> TRANSFERRING            block ACKed (next block) or NAK/timeout (same block)
 *   TRANSFERRING --> VERIFYING               last block ACKed
 *   VERIFYING --> COMMITTING                 device CRC-32 matches the image
 *   COMMITTING --> DONE                      commit ACKed
 *   any --> ABORTED                          retries exhausted, mismatch, I/O error or abort()
 *
 * Each step() performs exactly one exchange. Abort requests are honoured
 * between exchanges, never in the middle of one. The telemetry baud rate is
 * restored on every exit path.
 *
 * @module upgrade/upgrade_machine
 */

import { EventEmitter } from 'events';
import { setTimeout as delay } from 'node:timers/promises';
import {
  BL_CAN,
  BL_DEFAULT_BLOCK_SIZE,
  BL_ENQ,
  BL_EOT,
  BL_PROMPT,
  BL_PROMPT_REPLY,
  REBOOT_GAP_MS,
  REBOOT_SEQUENCE
} from '../protocol/constants';
import { encode_command } from '../protocol/frame_codec';
import type { Transport } from '../transport/transport';
import { DriverError, TimeoutError, get_error_message } from '../utils/errors';
import { create_logger } from '../utils/logger';
import {
  CHECKSUM_REPORT_LENGTH,
  MAX_BLOCK_SIZE,
  build_block_frame,
  build_header,
  parse_checksum_report,
  parse_reply,
  split_image,
  type ImageBlock
} from './bootloader_codec';
import { crc32_compute } from './crc32';
import {
  is_terminal,
  type BlockAckState,
  type UpgradeAborted,
  type UpgradeHandle,
  type UpgradeOptions,
  type UpgradePhase,
  type UpgradeStatus
} from './upgrade_types';

const log = create_logger('Upgrade');

export const DEFAULT_UPGRADE_OPTIONS: Readonly<UpgradeOptions> = Object.freeze({
  upgrade_baud: 57600,
  telemetry_baud: 9600,
  block_size: BL_DEFAULT_BLOCK_SIZE,
  block_retries: 3,
  block_timeout_ms: 1000,
  handshake_timeout_ms: 5000,
  reply_timeout_ms: 3000,
  reboot_gap_ms: REBOOT_GAP_MS
});

const MAX_BLOCK_COUNT = 0xffff;

function hex32(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`;
}

/**
 * Drives one firmware image into the device's bootloader.
 *
 * Emits:
 *   'phase_change' (phase: UpgradePhase)     -- whenever the phase transitions
 *   'progress'     (status: UpgradeStatus)   -- after every step
 *   'complete'     (status: UpgradeStatus)   -- image committed
 *   'failed'       (aborted: UpgradeAborted) -- upgrade aborted
 */
export class UpgradeMachine extends EventEmitter implements UpgradeHandle {
  private phase: UpgradePhase = 'idle';
  private readonly options: UpgradeOptions;
  private readonly image: Uint8Array;
  private readonly blocks: ImageBlock[];
  private readonly ack_states: BlockAckState[];
  private readonly block_sends: number[];
  private block_index = 0;
  private bytes_acked = 0;
  private total_retries = 0;
  private unknown_bytes = 0;
  private aborted: UpgradeAborted | null = null;
  private abort_requested: string | null = null;
  private running: Promise<UpgradeStatus> | null = null;
  /** True while the port runs at the upgrade baud rate. */
  private baud_switched = false;

  /**
   * @throws {DriverError} if the image is empty or does not fit the block scheme.
   */
  constructor(
    private readonly transport: Transport,
    image: Uint8Array,
    options: Partial<UpgradeOptions> = {}
  ) {
    super();
    this.options = { ...DEFAULT_UPGRADE_OPTIONS, ...options };

    const { block_size } = this.options;
    if (!Number.isInteger(block_size) || block_size < 1 || block_size > MAX_BLOCK_SIZE) {
      throw new DriverError(`block_size must be 1..${MAX_BLOCK_SIZE}`, 'INVALID_IMAGE');
    }
    if (image.length === 0) {
      throw new DriverError('Firmware image is empty', 'INVALID_IMAGE');
    }

    this.image = image.slice();
    this.blocks = split_image(this.image, block_size);
    if (this.blocks.length > MAX_BLOCK_COUNT) {
      throw new DriverError(`Image needs ${this.blocks.length} blocks, max ${MAX_BLOCK_COUNT}`, 'INVALID_IMAGE');
    }
    this.ack_states = this.blocks.map((): BlockAckState => 'pending');
    this.block_sends = this.blocks.map(() => 0);
  }

  // -----------------------------------------------------------------------
  // Public accessors
  // -----------------------------------------------------------------------

  get_phase(): UpgradePhase {
    return this.phase;
  }

  get_status(): UpgradeStatus {
    const current = Math.min(this.block_index, this.blocks.length - 1);
    return {
      phase: this.phase,
      block_index: this.block_index,
      block_count: this.blocks.length,
      bytes_acked: this.bytes_acked,
      image_length: this.image.length,
      block_attempts: this.block_index < this.blocks.length ? this.block_sends[current] : 0,
      total_retries: this.total_retries,
      unknown_bytes: this.unknown_bytes,
      aborted: this.aborted
    };
  }

  get_block_states(): readonly BlockAckState[] {
    return [...this.ack_states];
  }

  is_active(): boolean {
    return !is_terminal(this.phase);
  }

  // -----------------------------------------------------------------------
  // Driving
  // -----------------------------------------------------------------------

  /**
   * Perform one exchange. Concurrent callers share the step in progress;
   * a terminal machine returns its status unchanged.
   */
  step(): Promise<UpgradeStatus> {
    if (is_terminal(this.phase)) {
      return Promise.resolve(this.get_status());
    }
    if (this.running !== null) {
      return this.running;
    }
    const running = this._step().finally(() => {
      this.running = null;
    });
    this.running = running;
    return running;
  }

  async run(on_progress?: (status: UpgradeStatus) => void): Promise<UpgradeStatus> {
    let status = this.get_status();
    while (!is_terminal(status.phase)) {
      status = await this.step();
      on_progress?.(status);
    }
    return status;
  }

  /**
   * Request an abort. Takes effect once the exchange in progress returns.
   * Idempotent; does nothing after done or aborted.
   */
  async abort(cause: string = 'aborted by caller'): Promise<UpgradeStatus> {
    if (is_terminal(this.phase)) {
      return this.get_status();
    }
    if (this.running !== null) {
      if (this.abort_requested === null) {
        this.abort_requested = cause;
      }
      await this.running;
    }
    if (!is_terminal(this.phase)) {
      await this._abort(cause);
    }
    return this.get_status();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async _step(): Promise<UpgradeStatus> {
    try {
      switch (this.phase) {
        case 'idle':
          await this._enter_bootloader();
          break;
        case 'handshake_sent':
          await this._await_prompt();
          break;
        case 'bootloader_confirmed':
          await this._send_header();
          break;
        case 'transferring':
          await this._send_block();
          break;
        case 'verifying':
          await this._verify();
          break;
        case 'committing':
          await this._commit();
          break;
        case 'done':
        case 'aborted':
          break;
      }
    } catch (err) {
      const cause =
        err instanceof TimeoutError ? `timeout in ${this.phase}` : `I/O error: ${get_error_message(err)}`;
      await this._abort(cause);
    }

    if (this.abort_requested !== null && !is_terminal(this.phase)) {
      await this._abort(this.abort_requested);
    }

    const status = this.get_status();
    this.emit('progress', status);
    return status;
  }

  private async _enter_bootloader(): Promise<void> {
    for (const token of REBOOT_SEQUENCE) {
      await this.transport.write(
        encode_command({
          name: 'reboot',
          token,
          argument: new Uint8Array(0),
          response: { framing: 'fixed', blocks: [] }
        })
      );
      if (this.options.reboot_gap_ms > 0) {
        await delay(this.options.reboot_gap_ms);
      }
    }
    this.transport.discard_input();
    await this.transport.set_baud_rate(this.options.upgrade_baud);
    this.baud_switched = true;
    log.info(`reboot sequence sent, waiting for bootloader at ${this.options.upgrade_baud} baud`);
    this._transition('handshake_sent');
  }

  private async _await_prompt(): Promise<void> {
    const deadline = Date.now() + this.options.handshake_timeout_ms;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError('no bootloader prompt');
      }
      const [byte] = await this.transport.read_exact(1, remaining);
      if (byte === BL_PROMPT) break;
      this.unknown_bytes++;
    }
    await this.transport.write(Uint8Array.of(BL_PROMPT_REPLY));
    // Prompts repeated before the answer landed.
    this.transport.discard_input();
    log.info('bootloader confirmed');
    this._transition('bootloader_confirmed');
  }

  private async _send_header(): Promise<void> {
    await this.transport.write(
      build_header(this.image.length, this.blocks.length, this.options.block_size)
    );
    const reply = await this._read_reply(this.options.reply_timeout_ms);
    if (parse_reply(reply) !== 'ack') {
      await this._abort('image header rejected');
      return;
    }
    this._transition('transferring');
  }

  /**
   * First reply byte after the header. The bootloader may still be repeating
   * its prompt when the answer arrives; those bytes are skipped.
   */
  private async _read_reply(timeout_ms: number): Promise<number> {
    const deadline = Date.now() + timeout_ms;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError('no reply to image header');
      }
      const [byte] = await this.transport.read_exact(1, remaining);
      if (byte !== BL_PROMPT) return byte;
    }
  }

  private async _send_block(): Promise<void> {
    const index = this.block_index;
    const block = this.blocks[index];

    if (this.block_sends[index] > 0) {
      this.total_retries++;
      this.transport.discard_input();
    }
    this.block_sends[index]++;
    this.ack_states[index] = 'pending';
    await this.transport.write(build_block_frame(block, this.options.block_size));

    let state: BlockAckState;
    try {
      const [reply] = await this.transport.read_exact(1, this.options.block_timeout_ms);
      state = parse_reply(reply) === 'ack' ? 'acked' : 'nacked';
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      state = 'timed_out';
    }
    this.ack_states[index] = state;

    if (state === 'acked') {
      this.bytes_acked += block.data.length;
      this.block_index++;
      if (this.block_index === this.blocks.length) {
        log.info(`all ${this.blocks.length} blocks acknowledged`);
        this._transition('verifying');
      }
      return;
    }

    log.warn(`block ${index} ${state} (send ${this.block_sends[index]})`);
    if (this.block_sends[index] > this.options.block_retries) {
      await this._abort(`block ${index} ${state} after ${this.block_sends[index]} sends`);
    }
  }

  private async _verify(): Promise<void> {
    await this.transport.write(Uint8Array.of(BL_ENQ));
    const report = await this.transport.read_exact(CHECKSUM_REPORT_LENGTH, this.options.reply_timeout_ms);
    const reported = parse_checksum_report(report);
    const expected = crc32_compute(this.image);

    if (reported === null) {
      await this._abort('malformed checksum report');
      return;
    }
    if (reported !== expected) {
      await this._abort(`checksum mismatch: device ${hex32(reported)}, image ${hex32(expected)}`);
      return;
    }
    this._transition('committing');
  }

  private async _commit(): Promise<void> {
    await this.transport.write(Uint8Array.of(BL_EOT));
    const [reply] = await this.transport.read_exact(1, this.options.reply_timeout_ms);
    if (parse_reply(reply) !== 'ack') {
      await this._abort('commit not acknowledged');
      return;
    }
    await this._restore_baud();
    log.info(`firmware committed (${this.image.length} bytes)`);
    this._transition('done');
    this.emit('complete', this.get_status());
  }

  private async _abort(cause: string): Promise<void> {
    if (is_terminal(this.phase)) return;
    this.aborted = { phase: this.phase, cause };

    if (this.baud_switched) {
      try {
        await this.transport.write(Uint8Array.of(BL_CAN, BL_CAN));
      } catch (err) {
        log.warn(`could not send cancel: ${get_error_message(err)}`);
      }
    }
    try {
      await this._restore_baud();
    } catch (err) {
      log.error(`could not restore ${this.options.telemetry_baud} baud: ${get_error_message(err)}`);
    }

    log.error(`upgrade aborted in ${this.aborted.phase}: ${cause}`);
    this._transition('aborted');
    this.emit('failed', this.aborted);
  }

  private async _restore_baud(): Promise<void> {
    if (!this.baud_switched) return;
    this.transport.discard_input();
    await this.transport.set_baud_rate(this.options.telemetry_baud);
    this.baud_switched = false;
  }

  private _transition(new_phase: UpgradePhase): void {
    if (this.phase === new_phase) return;
    this.phase = new_phase;
    this.emit('phase_change', new_phase);
  }
}

/**
 * Start an upgrade. The returned handle does nothing until stepped.
 */
export function begin(
  transport: Transport,
  image: Uint8Array,
  options: Partial<UpgradeOptions> = {}
): UpgradeMachine {
  return new UpgradeMachine(transport, image, options);
}
