import { EventEmitter } from 'events';
import type { BleAdapter } from './adapter.js';
import { DEFAULT_SCAN_KEYWORDS, DEFAULT_SCAN_TIMEOUT_SEC } from './constants.js';
import type { DecodeResult } from './decoders.js';
import { ConnectionError, DisconnectedError, type LinkLostError } from './errors.js';
import { Logger } from './logger.js';
import { NotificationLog } from './notification-log.js';
import { OperationLock } from './operation-lock.js';
import { DeviceScanner } from './scanner.js';
import { HealthSession, type SessionInfo } from './session.js';
import { SessionState } from './state-machine.js';
import type { DeviceAdvertisement, ServiceKind, VitalsSnapshot } from './types.js';
import { VitalsStore, type VitalsListener } from './vitals-store.js';

export interface MonitorOptions {
  scanKeywords?: readonly string[];
  connectTimeoutMs?: number;
  subscribeTimeoutMs?: number;
  powerOnTimeoutMs?: number;
  notificationLogSize?: number;
}

export interface MonitorStatus {
  busy: string | null;
  state: SessionState;
  address: string | null;
  subscribers: number;
  lastScanAt: string | null;
  lastScanCount: number;
}

/**
 * HealthMonitor - the library's front door
 *
 * Owns the store, the notification log and at most one session. Scan and
 * connect share the radio and never overlap; disconnect is never blocked
 * and cancels a connect that is still in progress.
 *
 * Events:
 * - 'stateChange': (from: SessionState, to: SessionState, info: SessionInfo)
 * - 'linkLost': (error: LinkLostError)
 */
export class HealthMonitor extends EventEmitter {
  readonly store = new VitalsStore();
  readonly notificationLog: NotificationLog;
  private scanner: DeviceScanner;
  private lock = new OperationLock();
  private session: HealthSession | null = null;
  private detachSession: (() => void) | null = null;
  private lastScan: DeviceAdvertisement[] = [];
  private lastScanAt: Date | null = null;
  private logger = new Logger('Monitor');

  constructor(private readonly adapter: BleAdapter, private readonly options: MonitorOptions = {}) {
    super();
    this.notificationLog = new NotificationLog(options.notificationLogSize);
    this.scanner = new DeviceScanner(
      adapter,
      options.scanKeywords ?? DEFAULT_SCAN_KEYWORDS,
      options.powerOnTimeoutMs
    );
  }

  async scan(timeoutSeconds = DEFAULT_SCAN_TIMEOUT_SEC): Promise<DeviceAdvertisement[]> {
    return this.lock.run('scan', async () => {
      const devices = await this.scanner.scan(timeoutSeconds);
      this.lastScan = devices;
      this.lastScanAt = new Date();
      return devices;
    });
  }

  /**
   * Open a fresh session to `address`. Every connect starts from an empty
   * snapshot; readings from an earlier device are not carried over.
   */
  async connect(address: string): Promise<SessionInfo> {
    return this.lock.run(`connect ${address}`, async () => {
      if (this.session?.isActive()) {
        const info = this.session.getInfo();
        throw new ConnectionError(
          'SESSION_ACTIVE',
          `Session already ${info.state} with ${info.address}; disconnect before connecting to ${address}`
        );
      }

      this.detachSession?.();
      this.store.clear();

      const session = new HealthSession(this.adapter, this.store, {
        connectTimeoutMs: this.options.connectTimeoutMs,
        subscribeTimeoutMs: this.options.subscribeTimeoutMs,
        notificationLog: this.notificationLog
      });
      this.attach(session);

      await session.connect(address);
      return session.getInfo();
    });
  }

  async disconnect(): Promise<void> {
    if (!this.session) {
      this.logger.debug('disconnect() with no session - nothing to do');
      return;
    }
    await this.session.disconnect();
  }

  /** Read one service now instead of waiting for its next notification. */
  async refresh(kind: ServiceKind): Promise<DecodeResult<Partial<VitalsSnapshot>>> {
    if (!this.session) {
      throw new DisconnectedError('No session; connect first');
    }
    return this.session.refresh(kind);
  }

  getSnapshot(): Readonly<VitalsSnapshot> {
    return this.store.getSnapshot();
  }

  subscribe(callback: VitalsListener): () => void {
    return this.store.subscribe(callback);
  }

  getSessionInfo(): SessionInfo | null {
    return this.session ? this.session.getInfo() : null;
  }

  getLastScan(): DeviceAdvertisement[] {
    return [...this.lastScan];
  }

  getStatus(): MonitorStatus {
    const info = this.getSessionInfo();
    return {
      busy: this.lock.getActiveOperation(),
      state: info?.state ?? SessionState.IDLE,
      address: info?.address ?? null,
      subscribers: this.store.getSubscriberCount(),
      lastScanAt: this.lastScanAt ? this.lastScanAt.toISOString() : null,
      lastScanCount: this.lastScan.length
    };
  }

  private attach(session: HealthSession): void {
    const onStateChange = (from: SessionState, to: SessionState) => {
      this.emit('stateChange', from, to, session.getInfo());
    };
    const onLinkLost = (error: LinkLostError) => {
      this.logger.warn(`${error.message}; call connect() to resume monitoring`);
      this.emit('linkLost', error);
    };

    session.on('stateChange', onStateChange);
    session.on('linkLost', onLinkLost);
    this.session = session;
    this.detachSession = () => {
      session.removeListener('stateChange', onStateChange);
      session.removeListener('linkLost', onLinkLost);
    };
  }
}
