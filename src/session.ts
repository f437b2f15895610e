import { EventEmitter } from 'events';
import type { BleAdapter, BleLink } from './adapter.js';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_SUBSCRIBE_TIMEOUT_MS,
  DEVICE_NAME_CHARACTERISTIC_UUID,
  GENERIC_ACCESS_SERVICE_UUID,
  SERVICE_KINDS,
  SERVICE_TABLE,
  UNKNOWN_DEVICE_NAME
} from './constants.js';
import type { DecodeResult } from './decoders.js';
import { NotificationDispatcher } from './dispatcher.js';
import {
  ConnectionError,
  DisconnectedError,
  LinkLostError,
  ServiceUnavailableError,
  VitalsError,
  classifyConnectError,
  translateBluetoothError
} from './errors.js';
import { Logger } from './logger.js';
import type { NotificationLog } from './notification-log.js';
import { SessionState, StateMachine } from './state-machine.js';
import type { ServiceKind, VitalsSnapshot } from './types.js';
import { uuidMatches } from './utils.js';
import type { VitalsStore } from './vitals-store.js';

export interface SessionOptions {
  connectTimeoutMs?: number;
  subscribeTimeoutMs?: number;
  notificationLog?: NotificationLog | null;
}

export type CapabilityResult =
  | { supported: true }
  | { supported: false; error: ServiceUnavailableError };

export interface SessionInfo {
  address: string;
  name?: string;
  state: SessionState;
  supportedServices: ServiceKind[];
  unsupportedServices: Array<{ service: ServiceKind; reason: string }>;
  connectedAt?: string;
}

/**
 * HealthSession - one peripheral connection and its subscriptions
 *
 * IDLE -> CONNECTING -> DISCOVERING -> MONITORING -> DISCONNECTED, with
 * FAILED for a connect that did not make it. Partial capability is normal:
 * a service that refuses notifications is recorded as unsupported and the
 * session carries on with the rest.
 *
 * Events:
 * - 'stateChange': (from: SessionState, to: SessionState) - every transition
 * - 'linkLost': (error: LinkLostError) - link dropped while MONITORING
 */
export class HealthSession extends EventEmitter {
  private machine: StateMachine;
  private logger = new Logger('Session');
  private address = '';
  private name: string | undefined;
  private link: BleLink | null = null;
  private dispatcher: NotificationDispatcher | null = null;
  private removeDisconnectListener: (() => void) | null = null;
  private setupAbort: AbortController | null = null;
  private teardownInProgress: { attempt: number; done: Promise<void> } | null = null;
  private capabilities = new Map<ServiceKind, CapabilityResult>();
  private supportedServices: ReadonlySet<ServiceKind> = new Set();
  private connectedAt: Date | null = null;
  private attempt = 0;

  private readonly connectTimeoutMs: number;
  private readonly subscribeTimeoutMs: number;
  private readonly notificationLog: NotificationLog | null;

  constructor(
    private readonly adapter: BleAdapter,
    private readonly store: VitalsStore,
    options: SessionOptions = {}
  ) {
    super();
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.subscribeTimeoutMs = options.subscribeTimeoutMs ?? DEFAULT_SUBSCRIBE_TIMEOUT_MS;
    this.notificationLog = options.notificationLog ?? null;
    this.machine = new StateMachine('SessionState', (from, to) => this.emit('stateChange', from, to));
  }

  getState(): SessionState {
    return this.machine.getState();
  }

  /** True while a link exists or is being set up. */
  isActive(): boolean {
    return this.machine.is(SessionState.CONNECTING, SessionState.DISCOVERING, SessionState.MONITORING);
  }

  getSupportedServices(): ReadonlySet<ServiceKind> {
    return this.supportedServices;
  }

  getCapabilities(): ReadonlyMap<ServiceKind, CapabilityResult> {
    return new Map(this.capabilities);
  }

  getInfo(): SessionInfo {
    const unsupportedServices: SessionInfo['unsupportedServices'] = [];
    for (const [service, result] of this.capabilities) {
      if (!result.supported) {
        unsupportedServices.push({ service, reason: result.error.message });
      }
    }

    return {
      address: this.address,
      ...(this.name !== undefined ? { name: this.name } : {}),
      state: this.machine.getState(),
      supportedServices: [...this.supportedServices],
      unsupportedServices,
      ...(this.connectedAt ? { connectedAt: this.connectedAt.toISOString() } : {})
    };
  }

  /**
   * Connect, discover and subscribe. Resolves once MONITORING.
   *
   * Rejects with ConnectionError (session FAILED) when the adapter times out,
   * refuses, loses the link or cannot enumerate services; with
   * ConnectionError('SESSION_ACTIVE') and no state change when a link is
   * already up or being set up; with DisconnectedError when disconnect()
   * cancels it.
   */
  async connect(address: string): Promise<void> {
    if (this.isActive()) {
      throw new ConnectionError(
        'SESSION_ACTIVE',
        `Session already ${this.machine.getState()} with ${this.address}; disconnect before connecting to ${address}`
      );
    }

    this.address = address;
    this.logger = new Logger(`Session:${address}`);
    this.name = undefined;
    this.connectedAt = null;
    this.capabilities = new Map();
    this.supportedServices = new Set();
    const attempt = ++this.attempt;
    const abort = new AbortController();
    this.setupAbort = abort;

    this.machine.transition(SessionState.CONNECTING, address);

    let pendingLink: Promise<BleLink> | null = null;
    try {
      // A link lost earlier may still be unsubscribing
      const previous = this.teardownInProgress;
      if (previous) {
        await this.guard(abort, previous.done);
      }

      try {
        await this.guard(abort, this.adapter.ensurePoweredOn(this.connectTimeoutMs));
      } catch (error) {
        throw error instanceof VitalsError
          ? error
          : new ConnectionError('ADAPTER_UNAVAILABLE', `Bluetooth adapter unavailable: ${translateBluetoothError(error)}`);
      }

      pendingLink = this.adapter.connect(address, this.connectTimeoutMs);
      let link: BleLink;
      try {
        link = await this.guard(abort, pendingLink);
      } catch (error) {
        throw error instanceof VitalsError ? error : classifyConnectError(address, error);
      }

      this.link = link;
      this.removeDisconnectListener = link.onDisconnect(() => this.handleLinkLoss(attempt));
      this.dispatcher = new NotificationDispatcher(link, this.store, this.notificationLog, this.subscribeTimeoutMs);
      this.machine.transition(SessionState.DISCOVERING, 'link established');

      this.name = await this.readDeviceName(abort, link);

      let serviceUuids: string[];
      try {
        serviceUuids = await this.guard(abort, link.discoverServices());
      } catch (error) {
        throw error instanceof VitalsError
          ? error
          : new ConnectionError('DISCOVERY_FAILED', `Service discovery failed: ${translateBluetoothError(error)}`);
      }
      this.logger.debug(`Advertised services: [${serviceUuids.join(', ')}]`);

      const capabilities = await this.negotiateCapabilities(abort, serviceUuids);
      this.capabilities = capabilities;
      this.supportedServices = new Set(
        [...capabilities].filter(([, result]) => result.supported).map(([kind]) => kind)
      );

      this.connectedAt = new Date();
      this.setupAbort = null;
      this.machine.transition(
        SessionState.MONITORING,
        `${this.supportedServices.size}/${SERVICE_KINDS.length} services`
      );
      this.logger.info(`Monitoring ${this.name} with [${[...this.supportedServices].join(', ')}]`);
    } catch (error) {
      if (this.setupAbort === abort) {
        this.setupAbort = null;
      }
      const failure = error instanceof VitalsError ? error : classifyConnectError(address, error);

      if (abort.signal.aborted && !this.link && pendingLink) {
        // The adapter may still hand over a link after we stopped waiting
        const late = pendingLink;
        late
          .then(orphan => orphan.disconnect())
          .catch(lateError => this.logger.debug(`Abandoned connect settled: ${translateBluetoothError(lateError)}`));
      }

      if (attempt === this.attempt && this.machine.is(SessionState.CONNECTING, SessionState.DISCOVERING)) {
        this.logger.error(`Connect failed: ${failure.message}`);
        this.machine.transition(SessionState.FAILED, failure.code);
        await this.teardown(true);
      }
      throw failure;
    }
  }

  /**
   * Unsubscribe everything, then close the link. A no-op unless a link is up
   * or being set up; concurrent callers share the current attempt's teardown.
   */
  async disconnect(): Promise<void> {
    if (!this.isActive()) {
      const pending = this.teardownInProgress;
      if (pending && pending.attempt === this.attempt) {
        await pending.done;
        return;
      }
      this.logger.debug(`disconnect() in state ${this.machine.getState()} - nothing to do`);
      return;
    }

    this.setupAbort?.abort(new DisconnectedError(`Connect to ${this.address} cancelled by disconnect()`));
    this.setupAbort = null;
    this.machine.transition(SessionState.DISCONNECTED, 'disconnect requested');
    await this.teardown(true);
  }

  /**
   * Read a service's characteristic now and route it like a notification.
   * Mostly useful for battery level, which many devices never notify.
   */
  async refresh(kind: ServiceKind): Promise<DecodeResult<Partial<VitalsSnapshot>>> {
    const { label, serviceUuid, characteristicUuid } = SERVICE_TABLE[kind];
    const link = this.link;
    const dispatcher = this.dispatcher;

    if (!this.isActive() || !link || !dispatcher) {
      throw new DisconnectedError(`Cannot read ${label}: session is ${this.machine.getState()}`);
    }
    if (this.machine.is(SessionState.MONITORING) && !this.supportedServices.has(kind)) {
      throw new ServiceUnavailableError(kind, `${label} is not supported by ${this.name ?? this.address}`);
    }

    let payload: Uint8Array;
    try {
      payload = await link.readCharacteristic(serviceUuid, characteristicUuid);
    } catch (error) {
      throw new ServiceUnavailableError(kind, `${label} read failed: ${translateBluetoothError(error)}`);
    }
    return dispatcher.dispatch({ characteristicId: kind, payload, receivedAt: new Date() });
  }

  /**
   * One result per known service: not advertised, subscription refused, or
   * supported. Never throws for a single service.
   */
  private async negotiateCapabilities(
    abort: AbortController,
    serviceUuids: string[]
  ): Promise<Map<ServiceKind, CapabilityResult>> {
    const results = new Map<ServiceKind, CapabilityResult>();
    const dispatcher = this.dispatcher;
    const link = this.link;
    if (!dispatcher || !link) {
      throw new DisconnectedError('Link closed during discovery');
    }

    for (const kind of SERVICE_KINDS) {
      const definition = SERVICE_TABLE[kind];

      if (!serviceUuids.some(uuid => uuidMatches(uuid, definition.serviceUuid))) {
        this.logger.debug(`${definition.label} service not advertised`);
        results.set(kind, {
          supported: false,
          error: new ServiceUnavailableError(kind, `${definition.label} service not advertised`)
        });
        continue;
      }

      if (definition.readOnDiscovery) {
        await this.initialRead(abort, link, dispatcher, kind);
      }

      try {
        await this.guard(abort, dispatcher.subscribe(kind));
        results.set(kind, { supported: true });
      } catch (error) {
        if (!(error instanceof ServiceUnavailableError)) {
          throw error;
        }
        this.logger.warn(`${definition.label} unsupported: ${error.message}`);
        results.set(kind, { supported: false, error });
      }
    }

    return results;
  }

  private async initialRead(
    abort: AbortController,
    link: BleLink,
    dispatcher: NotificationDispatcher,
    kind: ServiceKind
  ): Promise<void> {
    const { label, serviceUuid, characteristicUuid } = SERVICE_TABLE[kind];
    try {
      const payload = await this.guard(abort, link.readCharacteristic(serviceUuid, characteristicUuid));
      dispatcher.dispatch({ characteristicId: kind, payload, receivedAt: new Date() });
    } catch (error) {
      if (abort.signal.aborted) {
        throw error;
      }
      this.logger.debug(`Initial ${label} read failed: ${translateBluetoothError(error)}`);
    }
  }

  private async readDeviceName(abort: AbortController, link: BleLink): Promise<string> {
    try {
      const bytes = await this.guard(
        abort,
        link.readCharacteristic(GENERIC_ACCESS_SERVICE_UUID, DEVICE_NAME_CHARACTERISTIC_UUID)
      );
      const name = Buffer.from(bytes).toString('utf-8').replace(/\0+$/, '').trim();
      return name || UNKNOWN_DEVICE_NAME;
    } catch (error) {
      if (abort.signal.aborted) {
        throw error;
      }
      this.logger.debug(`Device name unavailable: ${translateBluetoothError(error)}`);
      return UNKNOWN_DEVICE_NAME;
    }
  }

  private handleLinkLoss(attempt: number): void {
    if (attempt !== this.attempt) {
      return;
    }

    if (this.machine.is(SessionState.CONNECTING, SessionState.DISCOVERING)) {
      this.logger.warn('Link dropped during setup');
      this.setupAbort?.abort(new ConnectionError('LINK_LOST', `Link to ${this.address} dropped during setup`));
      return;
    }

    if (!this.machine.is(SessionState.MONITORING)) {
      return;
    }

    const error = new LinkLostError(this.address);
    this.logger.warn(`${error.message} - no automatic reconnect`);
    this.machine.transition(SessionState.DISCONNECTED, 'link lost');
    this.teardown(false)
      .then(() => this.emit('linkLost', error))
      .catch(emitError => this.logger.error('linkLost listener failed:', emitError));
  }

  /** Release the current attempt's link. Earlier attempts' teardowns are never reused. */
  private teardown(closeLink: boolean): Promise<void> {
    const attempt = this.attempt;
    const pending = this.teardownInProgress;
    if (pending && pending.attempt === attempt) {
      return pending.done;
    }

    const link = this.link;
    const dispatcher = this.dispatcher;
    const removeListener = this.removeDisconnectListener;
    this.link = null;
    this.dispatcher = null;
    this.removeDisconnectListener = null;

    const run = async (): Promise<void> => {
      removeListener?.();
      if (dispatcher) {
        await dispatcher.unsubscribeAll();
      }
      if (link && closeLink) {
        try {
          await link.disconnect();
        } catch (error) {
          this.logger.warn(`Link close failed: ${translateBluetoothError(error)}`);
        }
      }
    };

    const done: Promise<void> = run().finally(() => {
      if (this.teardownInProgress?.done === done) {
        this.teardownInProgress = null;
      }
    });
    this.teardownInProgress = { attempt, done };
    return done;
  }

  /** Reject as soon as setup is aborted, whatever `operation` is doing. */
  private guard<T>(abort: AbortController, operation: Promise<T>): Promise<T> {
    const { signal } = abort;
    return new Promise<T>((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
      operation.then(
        value => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        error => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}
