/**
 * Serial port discovery.
 *
 * Lists the ports the OS reports and flags the USB-serial bridges the
 * CloudWatcher ships with, so a caller can pick a default port.
 */

import { SerialPort } from 'serialport';
import { get_error_message } from '../utils/errors';
import { create_logger } from '../utils/logger';

const log = create_logger('PortScanner');

/** USB vendor IDs of the serial bridges found in CloudWatcher units (FTDI, Prolific). */
const KNOWN_BRIDGE_VIDS: ReadonlySet<string> = new Set(['0403', '067b']);

/** Metadata for a single serial port. */
export interface PortInfo {
  /** OS device path (e.g., COM3 on Windows, /dev/ttyUSB0 on Linux). */
  path: string;
  vid?: string;
  pid?: string;
  manufacturer?: string;
  serial_number?: string;
  /** True when the port sits behind a known USB-serial bridge. */
  known_bridge: boolean;
  /** Manufacturer and path, for display. */
  label: string;
}

/**
 * List available serial ports, known bridges first.
 *
 * Enumeration failures are logged and yield an empty list.
 */
export async function scan_ports(): Promise<PortInfo[]> {
  let raw_ports: Awaited<ReturnType<typeof SerialPort.list>>;
  try {
    raw_ports = await SerialPort.list();
  } catch (err) {
    log.warn(`port enumeration failed: ${get_error_message(err)}`);
    return [];
  }

  const ports = raw_ports.map((p): PortInfo => {
    const vid = p.vendorId?.toLowerCase();
    const manufacturer = p.manufacturer ?? undefined;
    return {
      path: p.path,
      vid,
      pid: p.productId?.toLowerCase(),
      manufacturer,
      serial_number: p.serialNumber ?? undefined,
      known_bridge: vid !== undefined && KNOWN_BRIDGE_VIDS.has(vid),
      label: manufacturer ? `${manufacturer} - ${p.path}` : p.path
    };
  });

  return ports.sort((a, b) => Number(b.known_bridge) - Number(a.known_bridge));
}
