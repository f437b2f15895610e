import type { BleAdapter } from './adapter.js';
import { DEFAULT_SCAN_KEYWORDS } from './constants.js';
import { ConnectionError, ScanTimeoutError, VitalsError, translateBluetoothError } from './errors.js';
import { Logger } from './logger.js';
import type { DeviceAdvertisement } from './types.js';

export function matchesHealthKeyword(name: string | undefined, keywords: readonly string[]): boolean {
  if (!name) {
    return false;
  }
  const lowered = name.toLowerCase();
  return keywords.some(keyword => lowered.includes(keyword.toLowerCase()));
}

/**
 * One bounded discovery pass, filtered to names that look like health
 * wearables. Seeing nothing is a normal outcome and yields [].
 */
export class DeviceScanner {
  private logger = new Logger('Scanner');
  private readonly keywords: readonly string[];

  constructor(
    private readonly adapter: BleAdapter,
    keywords: readonly string[] = DEFAULT_SCAN_KEYWORDS,
    private readonly powerOnTimeoutMs = 5000
  ) {
    this.keywords = keywords.map(keyword => keyword.toLowerCase()).filter(keyword => keyword.length > 0);
  }

  async scan(timeoutSeconds: number): Promise<DeviceAdvertisement[]> {
    const durationMs = Math.max(0, Math.round(timeoutSeconds * 1000));

    try {
      await this.adapter.ensurePoweredOn(this.powerOnTimeoutMs);
    } catch (error) {
      throw new ConnectionError('ADAPTER_UNAVAILABLE', `Cannot scan: ${translateBluetoothError(error)}`);
    }

    const found = new Map<string, DeviceAdvertisement>();
    let seen = 0;

    this.logger.info(`Scanning for health devices for ${timeoutSeconds}s...`);
    try {
      await this.adapter.scan(durationMs, advertisement => {
        seen++;
        if (!matchesHealthKeyword(advertisement.name, this.keywords)) {
          return;
        }
        if (!found.has(advertisement.address)) {
          this.logger.debug(`Candidate: ${advertisement.name} [${advertisement.address}] rssi=${advertisement.signalStrength}`);
        }
        // Latest advertisement wins so signalStrength stays current
        found.set(advertisement.address, { ...advertisement });
      });
    } catch (error) {
      if (!(error instanceof ScanTimeoutError)) {
        throw error instanceof VitalsError
          ? error
          : new ConnectionError('ADAPTER_UNAVAILABLE', `Scan failed: ${translateBluetoothError(error)}`);
      }
      this.logger.debug(`Scan window closed by adapter: ${error.message}`);
    }

    const devices = [...found.values()];
    this.logger.info(`Scan complete: ${devices.length} health device(s) out of ${seen} advertisement(s)`);
    return devices;
  }
}
