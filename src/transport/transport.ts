/**
 * Byte transport between the host and the device.
 *
 * Every read takes a deadline. Implementations reject with
 * {@link TimeoutError} when it expires and with {@link IoError} when the link
 * fails; bytes that arrive beyond what a read asked for stay buffered for the
 * next read.
 *
 * @module transport/transport
 */

export interface Transport {
  open(): Promise<void>;
  close(): Promise<void>;
  is_open(): boolean;

  /** Resolves once the bytes have been handed to the OS and drained. */
  write(data: Uint8Array): Promise<void>;

  /** Exactly `length` bytes. */
  read_exact(length: number, timeout_ms: number): Promise<Uint8Array>;

  /** Bytes up to and including the first occurrence of `delimiter`. */
  read_until(delimiter: Uint8Array, timeout_ms: number): Promise<Uint8Array>;

  /** Drop everything received but not yet read. */
  discard_input(): void;

  set_baud_rate(baud: number): Promise<void>;
  get_baud_rate(): number;
}

/**
 * Index just past the first occurrence of `pattern` in `bytes`, or -1.
 */
export function index_after(bytes: Uint8Array, pattern: Uint8Array): number {
  if (pattern.length === 0) return 0;
  outer: for (let i = 0; i + pattern.length <= bytes.length; i++) {
    for (let j = 0; j < pattern.length; j++) {
      if (bytes[i + j] !== pattern[j]) continue outer;
    }
    return i + pattern.length;
  }
  return -1;
}
