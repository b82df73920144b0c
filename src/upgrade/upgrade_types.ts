/**
 * Firmware upgrade state machine types.
 *
 * @module upgrade/upgrade_types
 */

// ---------------------------------------------------------------------------
// Phase enum
// ---------------------------------------------------------------------------

/** Current phase of the upgrade. */
export type UpgradePhase =
  | 'idle'
  | 'handshake_sent'
  | 'bootloader_confirmed'
  | 'transferring'
  | 'verifying'
  | 'committing'
  | 'done'
  | 'aborted';

/** Phases from which no further step is possible. */
export function is_terminal(phase: UpgradePhase): boolean {
  return phase === 'done' || phase === 'aborted';
}

// ---------------------------------------------------------------------------
// Transfer bookkeeping
// ---------------------------------------------------------------------------

/** Acknowledgement state of one block. */
export type BlockAckState = 'pending' | 'acked' | 'nacked' | 'timed_out';

/** Why an upgrade ended in `aborted`, and in which phase. */
export interface UpgradeAborted {
  phase: UpgradePhase;
  cause: string;
}

// ---------------------------------------------------------------------------
// Status snapshot
// ---------------------------------------------------------------------------

/** Read-only progress snapshot for callers and progress reporters. */
export interface UpgradeStatus {
  phase: UpgradePhase;
  /** Index of the block being sent, or the block count once all are acked. */
  block_index: number;
  block_count: number;
  /** Image bytes acknowledged by the bootloader. */
  bytes_acked: number;
  image_length: number;
  /** Sends of the current block so far, the first one included. */
  block_attempts: number;
  /** Resends across the whole transfer. */
  total_retries: number;
  /** Bytes received while waiting for the prompt that were not the prompt. */
  unknown_bytes: number;
  aborted: UpgradeAborted | null;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface UpgradeOptions {
  /** Bootloader line rate. */
  upgrade_baud: number;
  /** Line rate restored when the upgrade ends. */
  telemetry_baud: number;
  /** Data bytes per block (1..255). */
  block_size: number;
  /** Resends of one block after NAK or timeout before aborting. */
  block_retries: number;
  /** Deadline for each block's ACK/NAK in ms. */
  block_timeout_ms: number;
  /** Deadline for the bootloader prompt in ms. */
  handshake_timeout_ms: number;
  /** Deadline for the header ACK, checksum report and commit ACK in ms. */
  reply_timeout_ms: number;
  /** Gap between the reboot commands in ms. */
  reboot_gap_ms: number;
}

/** Handle returned by `begin()`. */
export interface UpgradeHandle {
  /** Perform one exchange with the device and return the new status. */
  step(): Promise<UpgradeStatus>;
  /** Stop at the next checkpoint. No-op once done or aborted. */
  abort(cause?: string): Promise<UpgradeStatus>;
  get_status(): UpgradeStatus;
  /** Step until done or aborted. */
  run(on_progress?: (status: UpgradeStatus) => void): Promise<UpgradeStatus>;
}
