/**
 * Simulated CloudWatcher bootloader.
 *
 * Sits behind a {@link FakeTransport}: ignores traffic until the port is
 * switched to the upgrade baud rate, then prompts with 'c' and speaks the
 * block/ACK protocol. Scripted replies let a test NAK, drop or garble
 * individual block sends.
 *
 * @module test/fixtures/simulated_bootloader
 */

import {
  BL_ACK,
  BL_CAN,
  BL_ENQ,
  BL_EOT,
  BL_HEADER,
  BL_NAK,
  BL_PROMPT,
  BL_PROMPT_REPLY,
  BL_STX
} from '../../src/protocol/constants';
import { build_checksum_report, parse_block_frame } from '../../src/upgrade/bootloader_codec';
import { crc32_compute } from '../../src/upgrade/crc32';
import type { FakeTransport } from './fake_transport';

export type ScriptedReply = 'nak' | 'timeout' | 'garbage';

export interface BootloaderScript {
  /** Replies to use, in order, for sends of a block before it is ACKed. */
  block_replies?: Record<number, ScriptedReply[]>;
  /** Bytes sent before the prompt. */
  noise_before_prompt?: number[];
  /** Extra prompts sent right after the first one. */
  repeat_prompt?: number;
  /** Prompts still in flight when the header arrives, sent ahead of its reply. */
  late_prompts?: number;
  /** Never prompt. */
  silent?: boolean;
  reject_header?: boolean;
  /** Report a checksum that does not match what was received. */
  corrupt_checksum?: boolean;
  reject_commit?: boolean;
}

export class SimulatedBootloader {
  /** Block index of every block frame received, in order. */
  readonly block_sends: number[] = [];
  /** Reboot-mode traffic, as ASCII. */
  readonly reboot_commands: string[] = [];
  prompt_answered = false;
  header_received = false;
  verify_requests = 0;
  commit_received = false;
  cancel_received = false;

  private in_bootloader = false;
  private block_size = 0;
  private image_length = 0;
  private image = new Uint8Array(0);
  private readonly replies: Record<number, ScriptedReply[]>;

  constructor(
    private readonly upgrade_baud: number = 57600,
    private readonly script: BootloaderScript = {}
  ) {
    this.replies = {};
    for (const [index, list] of Object.entries(script.block_replies ?? {})) {
      this.replies[Number(index)] = [...list];
    }
  }

  attach(transport: FakeTransport): void {
    transport.responder = (data, t) => this.handle(data, t);
    transport.baud_listener = (baud, t) => {
      if (baud !== this.upgrade_baud) {
        this.in_bootloader = false;
        return;
      }
      this.in_bootloader = true;
      if (this.script.silent) return;
      t.push(this.script.noise_before_prompt ?? []);
      t.push([BL_PROMPT]);
      for (let i = 0; i < (this.script.repeat_prompt ?? 0); i++) {
        t.push([BL_PROMPT]);
      }
    };
  }

  /** Bytes the bootloader has written to flash. */
  received_image(): Uint8Array {
    return this.image.slice(0, this.image_length);
  }

  private handle(data: Uint8Array, t: FakeTransport): void {
    if (!this.in_bootloader) {
      this.reboot_commands.push(String.fromCharCode(...data));
      return;
    }

    switch (data[0]) {
      case BL_PROMPT_REPLY:
        this.prompt_answered = true;
        return;
      case BL_HEADER:
        this.header_received = true;
        this.image_length = (data[1] * 2 ** 24) + (data[2] << 16) + (data[3] << 8) + data[4];
        this.block_size = (data[7] << 8) | data[8];
        this.image = new Uint8Array(((data[5] << 8) | data[6]) * this.block_size);
        for (let i = 0; i < (this.script.late_prompts ?? 0); i++) {
          t.push([BL_PROMPT]);
        }
        t.push([this.script.reject_header ? BL_NAK : BL_ACK]);
        return;
      case BL_STX:
        this.handle_block(data, t);
        return;
      case BL_ENQ: {
        this.verify_requests++;
        const crc = crc32_compute(this.received_image());
        t.push(build_checksum_report(this.script.corrupt_checksum ? (crc ^ 0x1) >>> 0 : crc));
        return;
      }
      case BL_EOT:
        this.commit_received = true;
        t.push([this.script.reject_commit ? BL_NAK : BL_ACK]);
        return;
      case BL_CAN:
        this.cancel_received = true;
        return;
      default:
        return;
    }
  }

  private handle_block(data: Uint8Array, t: FakeTransport): void {
    const parsed = parse_block_frame(data, this.block_size);
    if (parsed === null || !parsed.crc_ok) {
      t.push([BL_NAK]);
      return;
    }
    this.block_sends.push(parsed.index);

    const scripted = this.replies[parsed.index]?.shift();
    if (scripted === 'timeout') return;
    if (scripted === 'nak') {
      t.push([BL_NAK]);
      return;
    }
    if (scripted === 'garbage') {
      t.push([0x3f]);
      return;
    }
    this.image.set(parsed.data, parsed.index * this.block_size);
    t.push([BL_ACK]);
  }
}
