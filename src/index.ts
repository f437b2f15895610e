export { HealthMonitor, type MonitorOptions, type MonitorStatus } from './monitor.js';
export { HealthSession, type SessionInfo, type SessionOptions, type CapabilityResult } from './session.js';
export { SessionState, StateMachine } from './state-machine.js';
export { DeviceScanner, matchesHealthKeyword } from './scanner.js';
export { NotificationDispatcher } from './dispatcher.js';
export { VitalsStore, type VitalsListener } from './vitals-store.js';
export { NotificationLog, type NotificationLogEntry, type ServiceStats } from './notification-log.js';
export {
  VITAL_DECODERS,
  decodeHeartRate,
  decodeTemperature,
  decodeBloodPressure,
  decodeOxygenSaturation,
  decodeBatteryLevel,
  unpackFloat,
  unpackSfloat,
  type DecodeResult,
  type BloodPressureReading
} from './decoders.js';
export type { BleAdapter, BleLink, Unsubscribe } from './adapter.js';
export { MockBleAdapter, createDemoDevice, type MockDevice, type MockFaults } from './mock-adapter.js';
export {
  VitalsError,
  ScanTimeoutError,
  ConnectionError,
  ServiceUnavailableError,
  DecodeError,
  LinkLostError,
  DisconnectedError,
  OperationInProgressError,
  translateBluetoothError,
  type ConnectionErrorCode,
  type VitalsErrorCode
} from './errors.js';
export { SERVICE_TABLE, SERVICE_KINDS, DEFAULT_SCAN_KEYWORDS, type ServiceDefinition } from './constants.js';
export { ServiceKind, type DeviceAdvertisement, type VitalsSnapshot, type RawNotification } from './types.js';
export { loadConfig, type MonitorConfig } from './config.js';
export { ObservabilityServer } from './observability-server.js';
export { VitalsFeed, type FeedMessage } from './vitals-feed.js';
export { registerMcpTools } from './mcp-tools.js';
export { McpSessionRegistry, createMcpRouter, type McpServerFactory } from './mcp-http-transport.js';
export { Logger } from './logger.js';
export { formatHex, normalizeLogLevel, type LogLevel } from './utils.js';
