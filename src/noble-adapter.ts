import noble from '@stoprocent/noble';
import type { Characteristic, Peripheral } from '@stoprocent/noble';
import type { BleAdapter, BleLink, Unsubscribe } from './adapter.js';
import { UNSUBSCRIBE_TIMEOUT_MS } from './constants.js';
import { ConnectionError, ScanTimeoutError, translateBluetoothError } from './errors.js';
import { Logger } from './logger.js';
import type { DeviceAdvertisement } from './types.js';
import { uuidMatches, withTimeout } from './utils.js';

/**
 * Noble BLE Adapter
 *
 * Pure radio operations on top of @stoprocent/noble; no session state.
 * Peripherals seen while scanning are remembered by address so connect()
 * can reach them without a second discovery pass.
 */
export class NobleAdapter implements BleAdapter {
  private logger = new Logger('Noble');
  private peripherals = new Map<string, Peripheral>();

  constructor(
    private readonly disconnectTimeoutMs = 10000,
    private readonly findTimeoutMs = 15000
  ) {}

  async ensurePoweredOn(timeoutMs: number): Promise<void> {
    if (noble.state === 'poweredOn') {
      return;
    }

    this.logger.info(`State: ${noble.state}, waiting for power on...`);
    await new Promise<void>((resolve, reject) => {
      const onStateChange = (state: string) => {
        this.logger.debug(`Adapter state: ${state}`);
        if (state === 'poweredOn') {
          clearTimeout(timer);
          noble.removeListener('stateChange', onStateChange);
          resolve();
        }
      };
      const timer = setTimeout(() => {
        noble.removeListener('stateChange', onStateChange);
        reject(new ConnectionError(
          'ADAPTER_UNAVAILABLE',
          `Bluetooth adapter is ${noble.state} - check if Bluetooth is enabled`
        ));
      }, timeoutMs);
      noble.on('stateChange', onStateChange);
    });
  }

  async scan(durationMs: number, onAdvertisement: (advertisement: DeviceAdvertisement) => void): Promise<void> {
    const onDiscover = (peripheral: Peripheral) => {
      const address = addressOf(peripheral);
      this.peripherals.set(address, peripheral);
      onAdvertisement({
        address,
        ...(peripheral.advertisement.localName ? { name: peripheral.advertisement.localName } : {}),
        signalStrength: peripheral.rssi
      });
    };

    noble.on('discover', onDiscover);
    try {
      // Duplicates allowed so RSSI stays fresh for devices already seen
      await noble.startScanningAsync([], true);
      await new Promise(resolve => setTimeout(resolve, durationMs));
    } finally {
      noble.removeListener('discover', onDiscover);
      await this.stopScanning();
    }
  }

  async connect(address: string, timeoutMs: number): Promise<BleLink> {
    const peripheral = this.peripherals.get(normalizeAddress(address)) ?? (await this.findDevice(address));

    this.logger.info(`Connecting to ${peripheral.advertisement.localName || address}...`);
    try {
      await withTimeout(
        peripheral.connectAsync(),
        timeoutMs,
        () => new ConnectionError('TIMEOUT', `Connection to ${address} timed out after ${timeoutMs}ms`)
      );
    } catch (error) {
      // A half-open attempt leaves the controller busy; close it before giving up
      await this.closePeripheral(peripheral).catch(closeError =>
        this.logger.debug(`Cleanup after failed connect: ${translateBluetoothError(closeError)}`)
      );
      throw error;
    }

    return new NobleLink(peripheral, normalizeAddress(address), this.disconnectTimeoutMs, this.logger);
  }

  private async findDevice(address: string): Promise<Peripheral> {
    const wanted = normalizeAddress(address);
    this.logger.info(`${address} not seen yet, scanning for it...`);

    let onDiscover: ((peripheral: Peripheral) => void) | null = null;
    const found = new Promise<Peripheral>(resolve => {
      onDiscover = (peripheral: Peripheral) => {
        const candidate = addressOf(peripheral);
        this.peripherals.set(candidate, peripheral);
        if (candidate === wanted) {
          resolve(peripheral);
        }
      };
      noble.on('discover', onDiscover);
    });

    try {
      await noble.startScanningAsync([], true);
      return await withTimeout(
        found,
        this.findTimeoutMs,
        () => new ScanTimeoutError(`Device ${address} not found within ${this.findTimeoutMs}ms`)
      );
    } catch (error) {
      throw error instanceof ScanTimeoutError
        ? new ConnectionError('TIMEOUT', error.message)
        : error;
    } finally {
      if (onDiscover) {
        noble.removeListener('discover', onDiscover);
      }
      await this.stopScanning();
    }
  }

  private async stopScanning(): Promise<void> {
    try {
      await noble.stopScanningAsync();
    } catch (error) {
      this.logger.debug(`stopScanning: ${translateBluetoothError(error)}`);
    }
  }

  private async closePeripheral(peripheral: Peripheral): Promise<void> {
    if (peripheral.state === 'connected' || peripheral.state === 'connecting') {
      await withTimeout(
        peripheral.disconnectAsync(),
        this.disconnectTimeoutMs,
        () => new Error(`Disconnect timed out after ${this.disconnectTimeoutMs}ms`)
      );
    }
  }
}

class NobleLink implements BleLink {
  private characteristics = new Map<string, Characteristic>();
  private disconnectListeners = new Set<() => void>();
  private closing = false;

  constructor(
    private readonly peripheral: Peripheral,
    readonly address: string,
    private readonly disconnectTimeoutMs: number,
    private readonly logger: Logger
  ) {
    peripheral.once('disconnect', () => {
      if (this.closing) return;
      this.logger.warn(`Device ${address} disconnected`);
      for (const listener of [...this.disconnectListeners]) {
        listener();
      }
    });
  }

  async discoverServices(): Promise<string[]> {
    const services = await this.peripheral.discoverServicesAsync([]);
    return services.map(service => service.uuid);
  }

  async readCharacteristic(serviceUuid: string, characteristicUuid: string): Promise<Uint8Array> {
    const characteristic = await this.findCharacteristic(serviceUuid, characteristicUuid);
    const data = await characteristic.readAsync();
    return new Uint8Array(data);
  }

  async subscribe(
    serviceUuid: string,
    characteristicUuid: string,
    onValue: (payload: Uint8Array) => void
  ): Promise<Unsubscribe> {
    const characteristic = await this.findCharacteristic(serviceUuid, characteristicUuid);
    const onData = (data: Buffer) => onValue(new Uint8Array(data));

    characteristic.on('data', onData);
    try {
      await characteristic.subscribeAsync();
    } catch (error) {
      characteristic.removeListener('data', onData);
      throw error;
    }

    return async () => {
      characteristic.removeListener('data', onData);
      await withTimeout(
        characteristic.unsubscribeAsync(),
        UNSUBSCRIBE_TIMEOUT_MS,
        () => new Error(`Unsubscribe from ${characteristicUuid} timed out`)
      );
    };
  }

  async disconnect(): Promise<void> {
    this.closing = true;
    const started = Date.now();
    await withTimeout(
      this.peripheral.disconnectAsync(),
      this.disconnectTimeoutMs,
      () => new Error(`Disconnect timed out after ${this.disconnectTimeoutMs}ms`)
    );
    this.logger.info(`Disconnected from ${this.address} in ${Date.now() - started}ms`);
  }

  onDisconnect(listener: () => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  private async findCharacteristic(serviceUuid: string, characteristicUuid: string): Promise<Characteristic> {
    const key = `${serviceUuid}/${characteristicUuid}`;
    const cached = this.characteristics.get(key);
    if (cached) {
      return cached;
    }

    const services = await this.peripheral.discoverServicesAsync([]);
    const service = services.find(candidate => uuidMatches(candidate.uuid, serviceUuid));
    if (!service) {
      throw new Error(`Service ${serviceUuid} not found`);
    }

    const characteristics = await service.discoverCharacteristicsAsync([]);
    const characteristic = characteristics.find(candidate => uuidMatches(candidate.uuid, characteristicUuid));
    if (!characteristic) {
      throw new Error(`Characteristic ${characteristicUuid} not found in service ${serviceUuid}`);
    }

    this.characteristics.set(key, characteristic);
    return characteristic;
  }
}

function normalizeAddress(address: string): string {
  return address.toLowerCase();
}

// macOS hides MAC addresses; noble falls back to a per-host id there
function addressOf(peripheral: Peripheral): string {
  return normalizeAddress(peripheral.address || peripheral.id);
}
