import { ServiceKind } from './types.js';

export interface ServiceDefinition {
  kind: ServiceKind;
  label: string;
  serviceUuid: string;
  characteristicUuid: string;
  // Also read once when discovery finds it (characteristic supports READ)
  readOnDiscovery: boolean;
}

/**
 * Health services this monitor understands, keyed by kind.
 * UUIDs are the 16-bit Bluetooth SIG assigned numbers.
 */
export const SERVICE_TABLE: Readonly<Record<ServiceKind, ServiceDefinition>> = {
  [ServiceKind.HEART_RATE]: {
    kind: ServiceKind.HEART_RATE,
    label: 'Heart Rate',
    serviceUuid: '180d',
    characteristicUuid: '2a37',
    readOnDiscovery: false
  },
  [ServiceKind.TEMPERATURE]: {
    kind: ServiceKind.TEMPERATURE,
    label: 'Health Thermometer',
    serviceUuid: '1809',
    characteristicUuid: '2a1c',
    readOnDiscovery: false
  },
  [ServiceKind.BLOOD_PRESSURE]: {
    kind: ServiceKind.BLOOD_PRESSURE,
    label: 'Blood Pressure',
    serviceUuid: '1810',
    characteristicUuid: '2a35',
    readOnDiscovery: false
  },
  [ServiceKind.OXYGEN_SATURATION]: {
    kind: ServiceKind.OXYGEN_SATURATION,
    label: 'Pulse Oximeter',
    serviceUuid: '1822',
    characteristicUuid: '2a5f',
    readOnDiscovery: false
  },
  [ServiceKind.BATTERY]: {
    kind: ServiceKind.BATTERY,
    label: 'Battery',
    serviceUuid: '180f',
    characteristicUuid: '2a19',
    readOnDiscovery: true
  }
};

export const SERVICE_KINDS: readonly ServiceKind[] = Object.values(ServiceKind);

export const GENERIC_ACCESS_SERVICE_UUID = '1800';
export const DEVICE_NAME_CHARACTERISTIC_UUID = '2a00';
export const UNKNOWN_DEVICE_NAME = 'Unknown';

export const DEFAULT_SCAN_KEYWORDS: readonly string[] = [
  'health', 'heart', 'fitbit', 'garmin', 'polar', 'watch', 'band', 'mi', 'huawei'
];

export const DEFAULT_SCAN_TIMEOUT_SEC = 10;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const DEFAULT_SUBSCRIBE_TIMEOUT_MS = 5000;
export const DEFAULT_DISCONNECT_TIMEOUT_MS = 10000;
export const UNSUBSCRIBE_TIMEOUT_MS = 1000;
