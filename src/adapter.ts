import type { DeviceAdvertisement } from './types.js';

/**
 * Host BLE capability the monitor runs on. `NobleAdapter` drives a real
 * radio; `MockBleAdapter` simulates peripherals in process.
 */
export interface BleAdapter {
  /** Resolves once the radio is usable; rejects if it cannot become so in time. */
  ensurePoweredOn(timeoutMs: number): Promise<void>;

  /**
   * Listen for advertisements for `durationMs`, then stop the radio.
   * Resolves when the window closes; may reject with ScanTimeoutError.
   */
  scan(durationMs: number, onAdvertisement: (advertisement: DeviceAdvertisement) => void): Promise<void>;

  connect(address: string, timeoutMs: number): Promise<BleLink>;
}

export type Unsubscribe = () => Promise<void>;

/** One GATT connection to a peripheral. */
export interface BleLink {
  readonly address: string;

  /** UUIDs of every primary service the peripheral advertises over GATT. */
  discoverServices(): Promise<string[]>;

  readCharacteristic(serviceUuid: string, characteristicUuid: string): Promise<Uint8Array>;

  /**
   * Enable notifications; `onValue` runs once per notification, in arrival
   * order. The returned function disables them again.
   */
  subscribe(
    serviceUuid: string,
    characteristicUuid: string,
    onValue: (payload: Uint8Array) => void
  ): Promise<Unsubscribe>;

  disconnect(): Promise<void>;

  /** Called when the link drops without `disconnect()`; returns a remover. */
  onDisconnect(listener: () => void): () => void;
}
