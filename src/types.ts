export enum ServiceKind {
  HEART_RATE = 'HEART_RATE',
  TEMPERATURE = 'TEMPERATURE',
  BLOOD_PRESSURE = 'BLOOD_PRESSURE',
  OXYGEN_SATURATION = 'OXYGEN_SATURATION',
  BATTERY = 'BATTERY'
}

export interface DeviceAdvertisement {
  address: string;
  name?: string;
  signalStrength: number;  // RSSI, dBm
}

/**
 * Latest decoded value per vital. A key is absent until its service has
 * reported at least once, so "never read" and a zero reading differ.
 */
export interface VitalsSnapshot {
  heartRateBpm?: number;
  temperatureF?: number;
  bloodPressureSystolic?: number;
  bloodPressureDiastolic?: number;
  oxygenSaturationPct?: number;
  batteryPct?: number;
}

export type VitalField = keyof VitalsSnapshot;

export interface RawNotification {
  characteristicId: ServiceKind;
  payload: Uint8Array;
  receivedAt: Date;
}

export const VITAL_FIELDS: readonly VitalField[] = [
  'heartRateBpm',
  'temperatureF',
  'bloodPressureSystolic',
  'bloodPressureDiastolic',
  'oxygenSaturationPct',
  'batteryPct'
];
