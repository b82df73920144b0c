/**
 * Wire constants of the CloudWatcher command protocol and its bootloader.
 *
 * @module protocol/constants
 */

// ---------------------------------------------------------------------------
// Command protocol
// ---------------------------------------------------------------------------

/** Every response block, data or handshake, is exactly this many bytes. */
export const BLOCK_SIZE = 15;

/** Terminates every command sent to the device. */
export const COMMAND_TERMINATOR = 0x21; // '!'

/** First byte of every response block. */
export const BLOCK_START = 0x21; // '!'

/** Padding used inside ASCII response blocks. */
export const BLOCK_PAD = 0x20;

/**
 * Handshake block closing every response: "!" XON, twelve spaces, "0".
 */
export const HANDSHAKE_BLOCK: Uint8Array = Uint8Array.from([
  0x21, 0x11, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x30
]);

// ---------------------------------------------------------------------------
// Bootloader
// ---------------------------------------------------------------------------

/** Commands that make the application firmware jump to its bootloader. */
export const REBOOT_SEQUENCE: readonly string[] = ['B', 'O', 'O', 'T'];

/** Gap between the reboot commands in ms. */
export const REBOOT_GAP_MS = 200;

/** Prompt the bootloader repeats until the host answers. */
export const BL_PROMPT = 0x63; // 'c'

/** Host answer to the prompt. */
export const BL_PROMPT_REPLY = 0x64; // 'd'

/** Image header marker. */
export const BL_HEADER = 0x48; // 'H'

export const BL_STX = 0x02;
export const BL_EOT = 0x04;
export const BL_ENQ = 0x05;
export const BL_ACK = 0x06;
export const BL_NAK = 0x15;
export const BL_CAN = 0x18;

/** Marker in front of the device's image checksum report. */
export const BL_CHECKSUM_REPORT = 0x52; // 'R'

/** Data bytes per transfer block. */
export const BL_DEFAULT_BLOCK_SIZE = 128;

/** Fill value for the unused tail of the last block (erased flash). */
export const BL_PAD_BYTE = 0xff;
