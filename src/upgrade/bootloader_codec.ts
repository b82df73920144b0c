/**
 * Bootloader wire format.
 *
 * Image header (11 bytes):
 *   'H' | length u32 BE | block count u16 BE | block size u16 BE | CRC16 u16 BE
 *
 * Block frame (block size + 6 bytes):
 *   STX | index u16 BE | data length u8 | data padded to block size | CRC16 u16 BE
 *
 * Both CRCs are CRC16-XMODEM over every byte between the marker and the CRC.
 * The device answers each with a single ACK or NAK byte.
 *
 * Checksum report (5 bytes), sent by the device after ENQ:
 *   'R' | CRC-32 u32 BE of the received image
 *
 * @module upgrade/bootloader_codec
 */

import {
  BL_ACK,
  BL_CHECKSUM_REPORT,
  BL_HEADER,
  BL_NAK,
  BL_PAD_BYTE,
  BL_STX
} from '../protocol/constants';
import { crc16_xmodem } from './crc16_xmodem';

/** Largest block the one-byte length field can describe. */
export const MAX_BLOCK_SIZE = 255;

export const HEADER_LENGTH = 11;
export const CHECKSUM_REPORT_LENGTH = 5;

/** One transfer unit with its offset in the image. */
export interface ImageBlock {
  index: number;
  offset: number;
  data: Uint8Array;
}

/**
 * Split an image into transfer blocks. The last block keeps its real length;
 * padding happens when the frame is built.
 */
export function split_image(image: Uint8Array, block_size: number): ImageBlock[] {
  const blocks: ImageBlock[] = [];
  for (let offset = 0, index = 0; offset < image.length; offset += block_size, index++) {
    blocks.push({ index, offset, data: image.slice(offset, offset + block_size) });
  }
  return blocks;
}

function put_u16(out: Uint8Array, offset: number, value: number): void {
  out[offset] = (value >> 8) & 0xff;
  out[offset + 1] = value & 0xff;
}

export function build_header(image_length: number, block_count: number, block_size: number): Uint8Array {
  const out = new Uint8Array(HEADER_LENGTH);
  out[0] = BL_HEADER;
  out[1] = (image_length >>> 24) & 0xff;
  out[2] = (image_length >>> 16) & 0xff;
  out[3] = (image_length >>> 8) & 0xff;
  out[4] = image_length & 0xff;
  put_u16(out, 5, block_count);
  put_u16(out, 7, block_size);
  put_u16(out, 9, crc16_xmodem(out.subarray(1, 9)));
  return out;
}

export function build_block_frame(block: ImageBlock, block_size: number): Uint8Array {
  const out = new Uint8Array(block_size + 6);
  out[0] = BL_STX;
  put_u16(out, 1, block.index);
  out[3] = block.data.length;
  out.fill(BL_PAD_BYTE, 4, 4 + block_size);
  out.set(block.data, 4);
  put_u16(out, 4 + block_size, crc16_xmodem(out.subarray(1, 4 + block_size)));
  return out;
}

export interface ParsedBlockFrame {
  index: number;
  data: Uint8Array;
  crc_ok: boolean;
}

/**
 * Device-side parse of a block frame.
 *
 * @returns null when the bytes are not a block frame of `block_size`.
 */
export function parse_block_frame(frame: Uint8Array, block_size: number): ParsedBlockFrame | null {
  if (frame.length !== block_size + 6 || frame[0] !== BL_STX) return null;
  const length = frame[3];
  if (length > block_size) return null;
  const index = (frame[1] << 8) | frame[2];
  const crc = (frame[4 + block_size] << 8) | frame[5 + block_size];
  return {
    index,
    data: frame.slice(4, 4 + length),
    crc_ok: crc === crc16_xmodem(frame.subarray(1, 4 + block_size))
  };
}

export type BlockReply = 'ack' | 'nak' | 'unknown';

export function parse_reply(byte: number): BlockReply {
  if (byte === BL_ACK) return 'ack';
  if (byte === BL_NAK) return 'nak';
  return 'unknown';
}

export function build_checksum_report(crc: number): Uint8Array {
  return Uint8Array.from([
    BL_CHECKSUM_REPORT,
    (crc >>> 24) & 0xff,
    (crc >>> 16) & 0xff,
    (crc >>> 8) & 0xff,
    crc & 0xff
  ]);
}

/**
 * @returns the reported CRC-32, or null if the bytes are not a checksum report.
 */
export function parse_checksum_report(bytes: Uint8Array): number | null {
  if (bytes.length !== CHECKSUM_REPORT_LENGTH || bytes[0] !== BL_CHECKSUM_REPORT) return null;
  return ((bytes[1] << 24) | (bytes[2] << 16) | (bytes[3] << 8) | bytes[4]) >>> 0;
}
