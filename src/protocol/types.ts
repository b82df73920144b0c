/**
 * Types shared by the frame codec and the protocol engine.
 *
 * @module protocol/types
 */

import type { ResponseShape } from '../config/device_profile';

/**
 * A fully bound, immutable request. `argument` holds the already formatted
 * argument characters (empty for most commands).
 */
export interface Command {
  readonly name: string;
  readonly token: string;
  readonly argument: Uint8Array;
  readonly response: ResponseShape;
  /** Response deadline in ms; falls back to the session read timeout. */
  readonly timeout_ms?: number;
}

/** One data block of a validated response. */
export interface FrameBlock {
  /** Prefix that matched, e.g. "!hh". */
  readonly prefix: string;
  /** Bytes after the prefix, padding included. */
  readonly body: Uint8Array;
  /** Body as ASCII with the space padding trimmed. */
  readonly text: string;
}

/** A response that passed validation. */
export interface Frame {
  readonly command: string;
  readonly raw: Uint8Array;
  readonly blocks: readonly FrameBlock[];
}

export type MalformedReason =
  | 'length_mismatch'
  | 'missing_terminator'
  | 'bad_block_start'
  | 'unexpected_prefix';

export interface Malformed {
  readonly kind: 'malformed';
  readonly reason: MalformedReason;
  readonly detail: string;
  readonly raw: Uint8Array;
  /**
   * Byte offset where a stale frame in front of the expected one ends. Bytes
   * from here on may be the start of the current response.
   */
  readonly resync_offset?: number;
}

export type DecodeResult =
  | { ok: true; frame: Frame }
  | { ok: false; error: Malformed };

// ---------------------------------------------------------------------------
// Engine results
// ---------------------------------------------------------------------------

export type ProtocolError =
  | { kind: 'busy' }
  | { kind: 'io'; message: string }
  | { kind: 'device_unresponsive'; attempts: number }
  | { kind: 'protocol_failure'; reason: MalformedReason; attempts: number }
  | { kind: 'unknown_command'; name: string }
  | { kind: 'invalid_argument'; name: string; message: string }
  | { kind: 'invalid_payload'; command: string; message: string }
  | { kind: 'upgrade_active' }
  | { kind: 'closed' };

export type ExecuteResult =
  | { ok: true; frame: Frame; attempts: number }
  | { ok: false; error: ProtocolError };

export type EnginePhase = 'idle' | 'awaiting_response' | 'decoding' | 'retrying';

/** Cumulative counters of one engine. */
export interface EngineCounters {
  commands: number;
  retries: number;
  timeouts: number;
  malformed: number;
  stale_frames: number;
  io_errors: number;
}

/** Human-readable form of a {@link ProtocolError}. */
export function describe_protocol_error(error: ProtocolError): string {
  switch (error.kind) {
    case 'busy':
      return 'Another command is in flight';
    case 'io':
      return `I/O error: ${error.message}`;
    case 'device_unresponsive':
      return `Device did not respond after ${error.attempts} attempts`;
    case 'protocol_failure':
      return `Malformed response (${error.reason}) after ${error.attempts} attempts`;
    case 'unknown_command':
      return `Unknown command "${error.name}"`;
    case 'invalid_argument':
      return `Invalid argument for "${error.name}": ${error.message}`;
    case 'invalid_payload':
      return `Unexpected payload from "${error.command}": ${error.message}`;
    case 'upgrade_active':
      return 'A firmware upgrade is in progress';
    case 'closed':
      return 'Session is closed';
  }
}
