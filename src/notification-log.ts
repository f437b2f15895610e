import { formatHex } from './utils.js';
import { Logger } from './logger.js';
import { ServiceKind, type RawNotification } from './types.js';

export interface NotificationLogEntry {
  id: number;              // Global sequence number
  timestamp: string;       // ISO timestamp of arrival
  service: ServiceKind;
  hex: string;             // Raw payload (uppercase, space-separated)
  size: number;            // Byte count
  decoded: boolean;
  error?: string;
}

export interface ServiceStats {
  received: number;
  failed: number;
}

const MIN_SIZE = 100;
const MAX_SIZE = 1000000;

/**
 * Bounded history of every characteristic notification and whether it
 * decoded. Oldest entries fall off once the buffer is full.
 */
export class NotificationLog {
  private buffer: NotificationLogEntry[] = [];
  private maxSize: number;
  private logger: Logger;
  private sequenceCounter = 0;
  private stats = new Map<ServiceKind, ServiceStats>();

  constructor(maxSize?: number) {
    // Default 10k, configurable via env var or constructor
    const requested = maxSize || parseInt(process.env.VITALS_NOTIFICATION_LOG_SIZE || '10000', 10);
    this.maxSize = Math.min(MAX_SIZE, Math.max(MIN_SIZE, Number.isNaN(requested) ? 10000 : requested));
    this.logger = new Logger('NotificationLog');
    this.logger.debug(`Initialized with max size: ${this.maxSize} entries`);
  }

  record(notification: RawNotification, error?: Error): NotificationLogEntry {
    const entry: NotificationLogEntry = {
      id: this.sequenceCounter++,
      timestamp: notification.receivedAt.toISOString(),
      service: notification.characteristicId,
      hex: formatHex(notification.payload),
      size: notification.payload.length,
      decoded: !error,
      ...(error ? { error: error.message } : {})
    };

    this.buffer.push(entry);
    while (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }

    const stats = this.stats.get(entry.service) ?? { received: 0, failed: 0 };
    stats.received++;
    if (error) stats.failed++;
    this.stats.set(entry.service, stats);

    return entry;
  }

  getEntriesSince(since: string, limit: number): NotificationLogEntry[] {
    const startIdx = this.parseSince(since);
    return this.buffer.slice(startIdx, startIdx + limit);
  }

  searchPayloads(hexPattern: string, limit: number): NotificationLogEntry[] {
    const cleanPattern = hexPattern.replace(/\s+/g, '').toUpperCase();
    const matches: NotificationLogEntry[] = [];

    // Newest first, then hand back in chronological order
    for (let i = this.buffer.length - 1; i >= 0 && matches.length < limit; i--) {
      const entry = this.buffer[i];
      if (entry.hex.replace(/\s+/g, '').includes(cleanPattern)) {
        matches.push(entry);
      }
    }

    return matches.reverse();
  }

  getStats(): Record<ServiceKind, ServiceStats> {
    const copy = (kind: ServiceKind): ServiceStats => ({ ...(this.stats.get(kind) ?? { received: 0, failed: 0 }) });
    return {
      [ServiceKind.HEART_RATE]: copy(ServiceKind.HEART_RATE),
      [ServiceKind.TEMPERATURE]: copy(ServiceKind.TEMPERATURE),
      [ServiceKind.BLOOD_PRESSURE]: copy(ServiceKind.BLOOD_PRESSURE),
      [ServiceKind.OXYGEN_SATURATION]: copy(ServiceKind.OXYGEN_SATURATION),
      [ServiceKind.BATTERY]: copy(ServiceKind.BATTERY)
    };
  }

  getBufferSize(): number {
    return this.buffer.length;
  }

  getMaxSize(): number {
    return this.maxSize;
  }

  private parseSince(since: string): number {
    if (since === '0' || since === '') {
      return 0;
    }

    // Duration strings: '30s', '5m', '1h'
    const durationMatch = since.match(/^(\d+)([smh])$/);
    if (durationMatch) {
      const [, num, unit] = durationMatch;
      const multipliers: Record<string, number> = { s: 1000, m: 60000, h: 3600000 };
      const cutoffTime = Date.now() - parseInt(num, 10) * multipliers[unit];
      return this.firstIndexAfter(cutoffTime);
    }

    const cutoffTime = new Date(since).getTime();
    if (Number.isNaN(cutoffTime)) {
      return 0;
    }
    return this.firstIndexAfter(cutoffTime);
  }

  private firstIndexAfter(cutoffTime: number): number {
    const idx = this.buffer.findIndex(e => new Date(e.timestamp).getTime() > cutoffTime);
    return idx === -1 ? this.buffer.length : idx;
  }
}
