/**
 * CRC-16/XMODEM over bootloader header and block frames.
 *
 *   - Polynomial: 0x1021, processed MSB first
 *   - Initial value: 0x0000
 *   - No final XOR
 *
 * @module upgrade/crc16_xmodem
 */

const CRC16_POLY = 0x1021;

const TABLE: Uint16Array = (() => {
  const table = new Uint16Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n << 8;
    for (let k = 0; k < 8; k++) {
      c = c & 0x8000 ? (c << 1) ^ CRC16_POLY : c << 1;
    }
    table[n] = c & 0xffff;
  }
  return table;
})();

/** @returns 16-bit CRC value. */
export function crc16_xmodem(data: Uint8Array): number {
  let crc = 0;
  for (const byte of data) {
    crc = ((crc << 8) ^ TABLE[((crc >>> 8) ^ byte) & 0xff]) & 0xffff;
  }
  return crc;
}
