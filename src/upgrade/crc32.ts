/**
 * CRC-32 (IEEE 802.3) over a firmware image.
 *
 *   - Polynomial: 0x04C11DB7, processed reflected (0xEDB88320)
 *   - Initial value: 0xFFFFFFFF
 *   - Final XOR: 0xFFFFFFFF
 *
 * The bootloader reports this value over the bytes it has written so the
 * host can compare it before committing.
 *
 * @module upgrade/crc32
 */

const CRC32_POLY_REFLECTED = 0xedb88320;

const TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? CRC32_POLY_REFLECTED ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

/**
 * @param data - Image bytes.
 * @returns 32-bit CRC value (unsigned).
 */
export function crc32_compute(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}
