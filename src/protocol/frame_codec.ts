/**
 * Frame codec for the CloudWatcher command protocol.
 *
 * Host to device: ASCII token, optional zero-padded decimal argument, "!".
 *
 * Device to host: N data blocks of 15 bytes, each starting with a field
 * prefix such as "!V" or "!hh", closed by the fixed 15-byte handshake block.
 * The protocol carries no checksum; a frame is accepted only when its length,
 * terminator position, block starts and every declared prefix agree.
 *
 * Decoding never throws. Every rejection is a {@link Malformed} value.
 *
 * @module protocol/frame_codec
 */

import type { DeviceProfile } from '../config/device_profile';
import {
  BLOCK_SIZE,
  BLOCK_START,
  BLOCK_PAD,
  COMMAND_TERMINATOR,
  HANDSHAKE_BLOCK
} from './constants';
import type {
  Command,
  DecodeResult,
  Frame,
  FrameBlock,
  Malformed,
  MalformedReason,
  ProtocolError
} from './types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function ascii_bytes(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    out[i] = text.charCodeAt(i) & 0xff;
  }
  return out;
}

function ascii_text(bytes: Uint8Array): string {
  let text = '';
  for (const b of bytes) {
    text += String.fromCharCode(b);
  }
  return text;
}

function starts_with(bytes: Uint8Array, offset: number, pattern: Uint8Array): boolean {
  if (offset + pattern.length > bytes.length) return false;
  for (let i = 0; i < pattern.length; i++) {
    if (bytes[offset + i] !== pattern[i]) return false;
  }
  return true;
}

/** True when the block at `offset` is the handshake block. */
export function is_handshake_at(raw: Uint8Array, offset: number): boolean {
  return starts_with(raw, offset, HANDSHAKE_BLOCK);
}

/**
 * Index of the first block boundary holding the handshake block, or -1.
 */
export function find_terminator_block(raw: Uint8Array): number {
  const blocks = Math.floor(raw.length / BLOCK_SIZE);
  for (let i = 0; i < blocks; i++) {
    if (is_handshake_at(raw, i * BLOCK_SIZE)) return i;
  }
  return -1;
}

/** Total response length in bytes for a command, terminator included. */
export function expected_response_length(command: Command): number {
  return (command.response.blocks.length + 1) * BLOCK_SIZE;
}

function malformed(
  reason: MalformedReason,
  detail: string,
  raw: Uint8Array,
  resync_offset?: number
): { ok: false; error: Malformed } {
  const error: Malformed =
    resync_offset === undefined
      ? { kind: 'malformed', reason, detail, raw }
      : { kind: 'malformed', reason, detail, raw, resync_offset };
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export type BindResult =
  | { ok: true; command: Command }
  | { ok: false; error: ProtocolError };

/**
 * Look up a command in a profile and attach its argument.
 *
 * The argument is range-checked here so that encoding stays total.
 */
export function bind_command(profile: DeviceProfile, name: string, argument?: number): BindResult {
  const def = Object.prototype.hasOwnProperty.call(profile.commands, name)
    ? profile.commands[name]
    : undefined;
  if (def === undefined) {
    return { ok: false, error: { kind: 'unknown_command', name } };
  }

  let arg_bytes: Uint8Array = new Uint8Array(0);
  if (def.argument !== undefined) {
    const arg_spec = def.argument;
    if (argument === undefined) {
      return { ok: false, error: { kind: 'invalid_argument', name, message: 'argument required' } };
    }
    if (!Number.isInteger(argument) || argument < arg_spec.min || argument > arg_spec.max) {
      return {
        ok: false,
        error: {
          kind: 'invalid_argument',
          name,
          message: `${argument} outside ${arg_spec.min}..${arg_spec.max}`
        }
      };
    }
    arg_bytes = ascii_bytes(String(argument).padStart(arg_spec.width, '0'));
  } else if (argument !== undefined) {
    return { ok: false, error: { kind: 'invalid_argument', name, message: 'takes no argument' } };
  }

  const command: Command = {
    name,
    token: def.token,
    argument: arg_bytes,
    response: def.response,
    timeout_ms: def.timeout_ms
  };
  return { ok: true, command: Object.freeze(command) };
}

/**
 * Encode a command for the wire: token, argument, "!".
 */
export function encode_command(command: Command): Uint8Array {
  const token = ascii_bytes(command.token);
  const out = new Uint8Array(token.length + command.argument.length + 1);
  out.set(token, 0);
  out.set(command.argument, token.length);
  out[out.length - 1] = COMMAND_TERMINATOR;
  return out;
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

/** One data block as the device writes it. */
export interface ResponseBlock {
  prefix: string;
  /** ASCII text, or raw bytes for binary fields. Truncated to fit the block. */
  body: string | Uint8Array;
}

/**
 * Device-side encoder: pad each block to 15 bytes and append the handshake.
 */
export function encode_response(blocks: readonly ResponseBlock[]): Uint8Array {
  const out = new Uint8Array((blocks.length + 1) * BLOCK_SIZE).fill(BLOCK_PAD);
  blocks.forEach((block, i) => {
    const offset = i * BLOCK_SIZE;
    const prefix = ascii_bytes(block.prefix).subarray(0, BLOCK_SIZE);
    out.set(prefix, offset);
    const body = typeof block.body === 'string' ? ascii_bytes(block.body) : block.body;
    out.set(body.subarray(0, BLOCK_SIZE - prefix.length), offset + prefix.length);
  });
  out.set(HANDSHAKE_BLOCK, blocks.length * BLOCK_SIZE);
  return out;
}

function match_prefix(raw: Uint8Array, offset: number, allowed: readonly string[]): string | null {
  const by_length = [...allowed].sort((a, b) => b.length - a.length);
  for (const prefix of by_length) {
    if (starts_with(raw, offset, ascii_bytes(prefix))) return prefix;
  }
  return null;
}

/**
 * Validate a raw response against the shape the command declares.
 *
 * @param raw - Bytes read for this command, terminator included.
 * @param command - The command the response answers.
 */
export function decode_frame(raw: Uint8Array, command: Command): DecodeResult {
  const declared = command.response.blocks;
  const expected = expected_response_length(command);

  if (raw.length !== expected) {
    const ends_with_terminator =
      raw.length >= BLOCK_SIZE && is_handshake_at(raw, raw.length - BLOCK_SIZE);
    const early = find_terminator_block(raw);
    const resync =
      early >= 0 ? (early + 1) * BLOCK_SIZE : ends_with_terminator ? raw.length : undefined;
    return malformed(
      'length_mismatch',
      `expected ${expected} bytes, got ${raw.length}`,
      raw,
      resync
    );
  }

  const early = find_terminator_block(raw);
  if (early >= 0 && early < declared.length) {
    return malformed(
      'length_mismatch',
      `terminator after ${early} blocks, expected ${declared.length}`,
      raw,
      (early + 1) * BLOCK_SIZE
    );
  }
  if (early !== declared.length) {
    return malformed('missing_terminator', 'last block is not the handshake block', raw);
  }

  const blocks: FrameBlock[] = [];
  for (let i = 0; i < declared.length; i++) {
    const offset = i * BLOCK_SIZE;
    if (raw[offset] !== BLOCK_START) {
      return malformed('bad_block_start', `block ${i} starts with 0x${raw[offset].toString(16)}`, raw);
    }
    const prefix = match_prefix(raw, offset, declared[i]);
    if (prefix === null) {
      const seen = ascii_text(raw.subarray(offset, offset + 3));
      return malformed(
        'unexpected_prefix',
        `block ${i} "${seen}" does not match ${declared[i].join('|')}`,
        raw
      );
    }
    const body = raw.slice(offset + prefix.length, offset + BLOCK_SIZE);
    blocks.push(Object.freeze({ prefix, body, text: ascii_text(body).trim() }));
  }

  const frame: Frame = { command: command.name, raw: raw.slice(), blocks };
  return { ok: true, frame: Object.freeze(frame) };
}

/**
 * Find the block carrying `prefix` in a validated frame.
 */
export function find_block(frame: Frame, prefix: string): FrameBlock | undefined {
  return frame.blocks.find((b) => b.prefix === prefix);
}
