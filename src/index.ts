/**
 * CloudWatcher serial driver.
 *
 * ```ts
 * await with_session({ port: '/dev/ttyUSB0' }, async (session) => {
 *   const cw = new CloudWatcher(session);
 *   const snapshot = await cw.read_telemetry();
 * });
 * ```
 */

export { DeviceSession, with_session } from './session/device_session';
export type {
  BeginUpgradeResult,
  SessionMode,
  SessionOptions,
  SnapshotResult
} from './session/device_session';
export { CloudWatcher } from './device/cloudwatcher';
export type { AnalogValues, DeviceResult, InternalErrors, SwitchStatus } from './device/cloudwatcher';

export {
  DEFAULT_PROFILE,
  DeviceProfileSchema,
  find_sensor,
  load_device_profile,
  parse_device_profile
} from './config/device_profile';
export type { Calibration, CommandDef, DeviceProfile, SensorSpec } from './config/device_profile';
export { DriverConfigSchema, config_from_env, resolve_config } from './config/driver_config';
export type { DriverConfig, DriverConfigInput } from './config/driver_config';

export { ProtocolEngine } from './engine/protocol_engine';
export type { EngineOptions } from './engine/protocol_engine';
export { bind_command, decode_frame, encode_command, encode_response } from './protocol/frame_codec';
export type { ResponseBlock } from './protocol/frame_codec';
export { describe_protocol_error } from './protocol/types';
export type {
  Command,
  DecodeResult,
  EngineCounters,
  EnginePhase,
  ExecuteResult,
  Frame,
  FrameBlock,
  Malformed,
  MalformedReason,
  ProtocolError
} from './protocol/types';

export { decode_reading, decode_snapshot } from './telemetry/decoder';
export {
  DEFAULT_ELECTRICAL_CONSTANTS,
  parse_electrical_constants
} from './telemetry/electrical_constants';
export type {
  ElectricalConstants,
  TelemetryReading,
  TelemetrySnapshot,
  Validity
} from './telemetry/telemetry_types';

export { SerialTransport } from './transport/serial_transport';
export type { SerialTransportOptions } from './transport/serial_transport';
export type { Transport } from './transport/transport';
export { scan_ports } from './transport/port_scanner';
export type { PortInfo } from './transport/port_scanner';

export { DEFAULT_UPGRADE_OPTIONS, UpgradeMachine, begin } from './upgrade/upgrade_machine';
export type {
  BlockAckState,
  UpgradeAborted,
  UpgradeHandle,
  UpgradeOptions,
  UpgradePhase,
  UpgradeStatus
} from './upgrade/upgrade_types';

export {
  ConfigError,
  DriverError,
  IoError,
  PortInUseError,
  TimeoutError,
  get_error_message
} from './utils/errors';
export { configure_logging } from './utils/logger';
export type { LogLevel } from './utils/logger';
