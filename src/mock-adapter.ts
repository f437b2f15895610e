import { EventEmitter } from 'events';
import type { BleAdapter, BleLink, Unsubscribe } from './adapter.js';
import {
  DEVICE_NAME_CHARACTERISTIC_UUID,
  GENERIC_ACCESS_SERVICE_UUID,
  SERVICE_KINDS,
  SERVICE_TABLE
} from './constants.js';
import { ConnectionError } from './errors.js';
import { Logger } from './logger.js';
import { ServiceKind, type DeviceAdvertisement } from './types.js';
import { expandUuidVariants, formatHex, sleep, uuidMatches } from './utils.js';

/** Failure modes a simulated peripheral can be told to show. */
export interface MockFaults {
  connect?: 'timeout' | 'refused';
  connectDelayMs?: number;
  discoveryFails?: boolean;
  nameReadFails?: boolean;
  refuseSubscribe?: ServiceKind[];
  // Subscribe never settles; exercises the dispatcher's subscribe timeout
  hangSubscribe?: ServiceKind[];
  disconnectFails?: boolean;
}

export interface MockDevice {
  address: string;
  name?: string;
  rssi: number;
  services: ServiceKind[];
  values?: Partial<Record<ServiceKind, Uint8Array>>;
  faults?: MockFaults;
}

export const DEMO_DEVICE_ADDRESS = 'aa:bb:cc:dd:ee:01';

/** Canned payloads, one per service, that decode to ordinary resting vitals. */
export const DEMO_PAYLOADS: Readonly<Record<ServiceKind, Uint8Array>> = {
  [ServiceKind.HEART_RATE]: new Uint8Array([0x00, 72]),
  [ServiceKind.TEMPERATURE]: new Uint8Array([0x00, 0x6E, 0x01, 0x00, 0xFF]),  // 36.6 °C
  [ServiceKind.BLOOD_PRESSURE]: new Uint8Array([0x00, 0x78, 0x00, 0x50, 0x00]),  // 120/80
  [ServiceKind.OXYGEN_SATURATION]: new Uint8Array([0x00, 98]),
  [ServiceKind.BATTERY]: new Uint8Array([85])
};

export function createDemoDevice(overrides: Partial<MockDevice> = {}): MockDevice {
  return {
    address: DEMO_DEVICE_ADDRESS,
    name: 'Demo Health Band',
    rssi: -48,
    services: [...SERVICE_KINDS],
    values: { ...DEMO_PAYLOADS },
    ...overrides
  };
}

function hciError(message: string, code: number): Error {
  return Object.assign(new Error(message), { code });
}

function kindFor(serviceUuid: string, characteristicUuid: string): ServiceKind | undefined {
  return SERVICE_KINDS.find(kind =>
    uuidMatches(serviceUuid, SERVICE_TABLE[kind].serviceUuid) &&
    uuidMatches(characteristicUuid, SERVICE_TABLE[kind].characteristicUuid)
  );
}

/**
 * In-process BLE host with simulated peripherals. Drives the whole stack in
 * tests and behind `VITALS_ADAPTER=mock`.
 *
 * Events:
 * - 'connect': (address: string)
 * - 'disconnect': (address: string)
 */
export class MockBleAdapter extends EventEmitter implements BleAdapter {
  private devices = new Map<string, MockDevice>();
  private links = new Map<string, MockLink>();
  private lastLinks = new Map<string, MockLink>();
  private poweredOn: boolean;
  private logger = new Logger('MockAdapter');
  scanCount = 0;
  connectCount = 0;

  constructor(devices: MockDevice[] = [], options: { poweredOn?: boolean } = {}) {
    super();
    this.poweredOn = options.poweredOn ?? true;
    for (const device of devices) {
      this.addDevice(device);
    }
  }

  addDevice(device: MockDevice): void {
    this.devices.set(device.address.toLowerCase(), device);
  }

  removeDevice(address: string): void {
    this.devices.delete(address.toLowerCase());
  }

  getDevice(address: string): MockDevice | undefined {
    return this.devices.get(address.toLowerCase());
  }

  setPoweredOn(poweredOn: boolean): void {
    this.poweredOn = poweredOn;
    this.emit('powerChange', poweredOn);
  }

  async ensurePoweredOn(timeoutMs: number): Promise<void> {
    if (this.poweredOn) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const onPowerChange = (poweredOn: boolean) => {
        if (poweredOn) {
          clearTimeout(timer);
          this.removeListener('powerChange', onPowerChange);
          resolve();
        }
      };
      const timer = setTimeout(() => {
        this.removeListener('powerChange', onPowerChange);
        reject(new ConnectionError('ADAPTER_UNAVAILABLE', 'Bluetooth adapter is poweredOff'));
      }, timeoutMs);
      this.on('powerChange', onPowerChange);
    });
  }

  async scan(durationMs: number, onAdvertisement: (advertisement: DeviceAdvertisement) => void): Promise<void> {
    this.scanCount++;
    for (const device of this.devices.values()) {
      onAdvertisement({
        address: device.address,
        ...(device.name !== undefined ? { name: device.name } : {}),
        signalStrength: device.rssi
      });
    }
    await sleep(durationMs);
  }

  async connect(address: string, timeoutMs: number): Promise<BleLink> {
    this.connectCount++;
    const device = this.getDevice(address);
    const faults = device?.faults ?? {};

    if (faults.connectDelayMs) {
      await sleep(faults.connectDelayMs);
    }

    if (!device || faults.connect === 'timeout') {
      throw hciError(`No response from ${address} within ${timeoutMs}ms`, 0x08);
    }
    if (faults.connect === 'refused') {
      throw hciError(`${address} rejected the connection`, 0x0D);
    }

    const key = device.address.toLowerCase();
    const link: MockLink = new MockLink(device, this.logger, () => {
      if (this.links.get(key) === link) {
        this.links.delete(key);
      }
      this.emit('disconnect', device.address);
    });
    this.links.set(key, link);
    this.lastLinks.set(key, link);
    this.emit('connect', device.address);
    return link;
  }

  isConnected(address: string): boolean {
    return this.links.has(address.toLowerCase());
  }

  /** Service kinds that currently have notifications enabled on `address`. */
  getActiveSubscriptions(address: string): ServiceKind[] {
    return this.links.get(address.toLowerCase())?.getActiveSubscriptions() ?? [];
  }

  /** Unsubscribe calls made on the most recent link to `address`, open or closed. */
  getUnsubscribeCount(address: string): number {
    return this.lastLinks.get(address.toLowerCase())?.unsubscribeCount ?? 0;
  }

  /**
   * Push a notification as if the peripheral sent it. Returns false when
   * nothing is subscribed to that characteristic.
   */
  simulateNotification(address: string, kind: ServiceKind, payload: Uint8Array): boolean {
    const link = this.links.get(address.toLowerCase());
    return link ? link.notify(kind, payload) : false;
  }

  /** Drop the link from the peripheral side, without a local disconnect(). */
  dropLink(address: string): void {
    const link = this.links.get(address.toLowerCase());
    if (!link) {
      throw new Error(`No link to ${address}`);
    }
    link.drop();
  }

  /**
   * Replay the device's stored values as notifications every `intervalMs`,
   * with a little movement in heart rate. Returns a stop function.
   */
  startStreaming(address: string, intervalMs: number): () => void {
    let tick = 0;
    const timer = setInterval(() => {
      const device = this.getDevice(address);
      if (!device || !this.isConnected(address)) return;
      tick++;
      for (const kind of device.services) {
        const stored = device.values?.[kind];
        if (!stored) continue;
        const payload = kind === ServiceKind.HEART_RATE
          ? new Uint8Array([0x00, 68 + (tick % 9)])
          : stored;
        this.simulateNotification(address, kind, payload);
      }
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}

class MockLink implements BleLink {
  readonly address: string;
  private handlers = new Map<ServiceKind, Set<(payload: Uint8Array) => void>>();
  private disconnectListeners = new Set<() => void>();
  private open = true;
  unsubscribeCount = 0;

  constructor(
    private readonly device: MockDevice,
    private readonly logger: Logger,
    private readonly onClosed: () => void
  ) {
    this.address = device.address;
  }

  async discoverServices(): Promise<string[]> {
    this.assertOpen();
    if (this.device.faults?.discoveryFails) {
      throw new Error('GATT service discovery failed');
    }
    // Full 128-bit form, the way most stacks report them
    const uuids = [GENERIC_ACCESS_SERVICE_UUID, ...this.device.services.map(kind => SERVICE_TABLE[kind].serviceUuid)];
    return uuids.map(uuid => expandUuidVariants(uuid)[2] ?? uuid);
  }

  async readCharacteristic(serviceUuid: string, characteristicUuid: string): Promise<Uint8Array> {
    this.assertOpen();

    if (uuidMatches(serviceUuid, GENERIC_ACCESS_SERVICE_UUID) &&
        uuidMatches(characteristicUuid, DEVICE_NAME_CHARACTERISTIC_UUID)) {
      if (this.device.faults?.nameReadFails) {
        throw new Error('Read not permitted');
      }
      return new TextEncoder().encode(this.device.name ?? '');
    }

    const kind = this.supportedKind(serviceUuid, characteristicUuid);
    const value = this.device.values?.[kind];
    if (!value) {
      throw new Error(`Characteristic ${characteristicUuid} is not readable`);
    }
    return new Uint8Array(value);
  }

  async subscribe(
    serviceUuid: string,
    characteristicUuid: string,
    onValue: (payload: Uint8Array) => void
  ): Promise<Unsubscribe> {
    this.assertOpen();
    const kind = this.supportedKind(serviceUuid, characteristicUuid);

    if (this.device.faults?.refuseSubscribe?.includes(kind)) {
      throw new Error(`Notify not permitted on ${characteristicUuid}`);
    }
    if (this.device.faults?.hangSubscribe?.includes(kind)) {
      return new Promise<Unsubscribe>(() => undefined);
    }

    const handlers = this.handlers.get(kind) ?? new Set();
    handlers.add(onValue);
    this.handlers.set(kind, handlers);

    return async () => {
      this.unsubscribeCount++;
      handlers.delete(onValue);
      if (handlers.size === 0) {
        this.handlers.delete(kind);
      }
    };
  }

  async disconnect(): Promise<void> {
    if (!this.open) {
      return;
    }
    this.close();
    if (this.device.faults?.disconnectFails) {
      throw new Error('Connection Terminated By Local Host');
    }
  }

  onDisconnect(listener: () => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  notify(kind: ServiceKind, payload: Uint8Array): boolean {
    const handlers = this.handlers.get(kind);
    if (!this.open || !handlers || handlers.size === 0) {
      return false;
    }
    this.logger.debug(`${this.address} ${SERVICE_TABLE[kind].label} <- [${formatHex(payload)}]`);
    for (const handler of [...handlers]) {
      handler(new Uint8Array(payload));
    }
    return true;
  }

  getActiveSubscriptions(): ServiceKind[] {
    return [...this.handlers.keys()];
  }

  drop(): void {
    if (!this.open) {
      return;
    }
    this.close();
    for (const listener of [...this.disconnectListeners]) {
      listener();
    }
  }

  private close(): void {
    this.open = false;
    this.handlers.clear();
    this.onClosed();
  }

  private supportedKind(serviceUuid: string, characteristicUuid: string): ServiceKind {
    const kind = kindFor(serviceUuid, characteristicUuid);
    if (!kind || !this.device.services.includes(kind)) {
      throw new Error(`Characteristic ${characteristicUuid} not found in service ${serviceUuid}`);
    }
    return kind;
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new Error(`Not connected to ${this.address}`);
    }
  }
}
