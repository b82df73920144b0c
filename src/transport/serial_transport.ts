/**
 * Serial transport over the `serialport` package.
 *
 * Incoming bytes are appended to a receive buffer as they arrive. Reads are
 * pull-style: a read resolves as soon as the buffer can satisfy it, or rejects
 * when its deadline expires. Only one read may be pending at a time.
 *
 * A port path can be held by one transport per process; the OS lock
 * (`lock: true`) covers other processes.
 */

import { SerialPort } from 'serialport';
import { IoError, PortInUseError, TimeoutError, get_error_message } from '../utils/errors';
import { create_logger } from '../utils/logger';
import { index_after, type Transport } from './transport';

const log = create_logger('SerialTransport');

/** Unread bytes kept before the receive buffer is reset. */
const MAX_RX_BUFFER_SIZE = 65536;

/** Paths currently held by a transport in this process. */
const held_paths = new Set<string>();

export interface SerialTransportOptions {
  path: string;
  baud_rate: number;
  /** Deadline for a write to drain, in ms. */
  write_timeout_ms: number;
}

interface PendingRead {
  /** Try to satisfy the read from the buffer; true when it resolved. */
  try_take: () => boolean;
  fail: (err: Error) => void;
}

export class SerialTransport implements Transport {
  private port: SerialPort | null = null;
  private baud_rate: number;
  private rx: Uint8Array = new Uint8Array(0);
  private pending: PendingRead | null = null;

  /** Saved references for listener cleanup on close. */
  private _on_data: ((buf: Buffer) => void) | null = null;
  private _on_error: ((err: Error) => void) | null = null;
  private _on_close: (() => void) | null = null;

  constructor(private readonly options: SerialTransportOptions) {
    this.baud_rate = options.baud_rate;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Open the port at 8N1 with the configured baud rate.
   *
   * @throws {PortInUseError} if this process already holds the path.
   * @throws {IoError} if the OS refuses the port.
   */
  async open(): Promise<void> {
    const { path } = this.options;
    if (this.port !== null) {
      throw new IoError(`SerialTransport: ${path} is already open`);
    }
    if (held_paths.has(path)) {
      throw new PortInUseError(path);
    }
    held_paths.add(path);

    const port = new SerialPort({
      path,
      baudRate: this.baud_rate,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      lock: true,
      autoOpen: false
    });

    try {
      await new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      held_paths.delete(path);
      throw new IoError(`SerialTransport: failed to open ${path}: ${get_error_message(err)}`, err);
    }

    this.port = port;
    this.rx = new Uint8Array(0);

    this._on_data = (buf: Buffer) => this.handle_data(buf);
    this._on_error = (err: Error) => {
      log.error(`port error on ${path}: ${err.message}`);
      this.fail_pending(new IoError(`SerialTransport: ${err.message}`, err));
    };
    this._on_close = () => {
      log.warn(`${path} closed unexpectedly`);
      this.release();
      this.fail_pending(new IoError(`SerialTransport: ${path} closed`));
    };

    port.on('data', this._on_data);
    port.on('error', this._on_error);
    port.on('close', this._on_close);
    log.debug(`opened ${path} at ${this.baud_rate} baud`);
  }

  /**
   * Close the port. The path is released even when the OS close fails.
   */
  async close(): Promise<void> {
    const port = this.port;
    if (port === null) return;

    this.detach(port);
    this.fail_pending(new IoError('SerialTransport: closed'));
    try {
      if (port.isOpen) {
        await new Promise<void>((resolve, reject) => {
          port.close((err) => (err ? reject(err) : resolve()));
        });
      }
    } catch (err) {
      throw new IoError(`SerialTransport: close failed: ${get_error_message(err)}`, err);
    } finally {
      this.release();
    }
  }

  is_open(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  // -------------------------------------------------------------------------
  // I/O
  // -------------------------------------------------------------------------

  write(data: Uint8Array): Promise<void> {
    const port = this.port;
    if (port === null || !port.isOpen) {
      return Promise.reject(new IoError('SerialTransport: port not open'));
    }
    const timeout_ms = this.options.write_timeout_ms;

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;
      const finish = (err?: Error | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          reject(err instanceof IoError ? err : new IoError(`SerialTransport: write failed: ${err.message}`, err));
        } else {
          resolve();
        }
      };
      timer = setTimeout(
        () => finish(new IoError(`SerialTransport: write did not drain within ${timeout_ms} ms`)),
        timeout_ms
      );

      port.write(Buffer.from(data), (err) => {
        if (err) {
          finish(err);
          return;
        }
        port.drain((drain_err) => finish(drain_err));
      });
    });
  }

  read_exact(length: number, timeout_ms: number): Promise<Uint8Array> {
    return this.wait_for(
      () => (this.rx.length >= length ? this.take(length) : null),
      timeout_ms,
      `${length} bytes`
    );
  }

  read_until(delimiter: Uint8Array, timeout_ms: number): Promise<Uint8Array> {
    return this.wait_for(
      () => {
        const end = index_after(this.rx, delimiter);
        return end < 0 ? null : this.take(end);
      },
      timeout_ms,
      'delimiter'
    );
  }

  discard_input(): void {
    if (this.rx.length > 0) {
      log.debug(`discarding ${this.rx.length} buffered bytes`);
    }
    this.rx = new Uint8Array(0);
  }

  async set_baud_rate(baud: number): Promise<void> {
    const port = this.port;
    if (port === null || !port.isOpen) {
      throw new IoError('SerialTransport: port not open');
    }
    if (baud === this.baud_rate) return;
    try {
      await new Promise<void>((resolve, reject) => {
        port.update({ baudRate: baud }, (err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      throw new IoError(`SerialTransport: cannot switch to ${baud} baud: ${get_error_message(err)}`, err);
    }
    log.info(`${this.options.path} now at ${baud} baud`);
    this.baud_rate = baud;
  }

  get_baud_rate(): number {
    return this.baud_rate;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private handle_data(buf: Buffer): void {
    if (this.rx.length + buf.length > MAX_RX_BUFFER_SIZE) {
      log.warn(`receive buffer overflow (${this.rx.length + buf.length} bytes), resetting`);
      this.rx = new Uint8Array(0);
      return;
    }
    const merged = new Uint8Array(this.rx.length + buf.length);
    merged.set(this.rx, 0);
    merged.set(buf, this.rx.length);
    this.rx = merged;
    if (this.pending !== null) {
      this.pending.try_take();
    }
  }

  private take(length: number): Uint8Array {
    const out = this.rx.slice(0, length);
    this.rx = this.rx.slice(length);
    return out;
  }

  private wait_for(
    extract: () => Uint8Array | null,
    timeout_ms: number,
    what: string
  ): Promise<Uint8Array> {
    if (this.port === null || !this.port.isOpen) {
      return Promise.reject(new IoError('SerialTransport: port not open'));
    }
    if (this.pending !== null) {
      return Promise.reject(new IoError('SerialTransport: a read is already pending'));
    }
    const ready = extract();
    if (ready !== null) {
      return Promise.resolve(ready);
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new TimeoutError(`SerialTransport: no ${what} within ${timeout_ms} ms`));
      }, timeout_ms);

      this.pending = {
        try_take: () => {
          const out = extract();
          if (out === null) return false;
          clearTimeout(timer);
          this.pending = null;
          resolve(out);
          return true;
        },
        fail: (err: Error) => {
          clearTimeout(timer);
          this.pending = null;
          reject(err);
        }
      };
    });
  }

  private fail_pending(err: Error): void {
    if (this.pending !== null) {
      this.pending.fail(err);
    }
  }

  private detach(port: SerialPort): void {
    if (this._on_data) port.removeListener('data', this._on_data);
    if (this._on_error) port.removeListener('error', this._on_error);
    if (this._on_close) port.removeListener('close', this._on_close);
    this._on_data = null;
    this._on_error = null;
    this._on_close = null;
  }

  private release(): void {
    if (this.port !== null) {
      this.detach(this.port);
    }
    this.port = null;
    this.rx = new Uint8Array(0);
    held_paths.delete(this.options.path);
  }
}
