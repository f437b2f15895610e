import type { BleLink, Unsubscribe } from './adapter.js';
import { SERVICE_TABLE } from './constants.js';
import { VITAL_DECODERS, type DecodeResult } from './decoders.js';
import { ServiceUnavailableError, translateBluetoothError } from './errors.js';
import { Logger } from './logger.js';
import type { NotificationLog } from './notification-log.js';
import type { RawNotification, ServiceKind, VitalsSnapshot } from './types.js';
import { formatHex, withTimeout } from './utils.js';
import type { VitalsStore } from './vitals-store.js';

interface ActiveSubscription {
  id: number;
  unsubscribe: Unsubscribe;
}

/**
 * Routes characteristic notifications of one session to their decoder and
 * on to the store. Holds at most one subscription per service kind.
 */
export class NotificationDispatcher {
  private subscriptions = new Map<ServiceKind, ActiveSubscription>();
  private currentIds = new Map<ServiceKind, number>();
  private nextSubscriptionId = 1;
  private logger: Logger;

  constructor(
    private readonly link: BleLink,
    private readonly store: VitalsStore,
    private readonly notificationLog: NotificationLog | null = null,
    private readonly subscribeTimeoutMs = 5000
  ) {
    this.logger = new Logger(`Dispatcher:${link.address}`);
  }

  /**
   * Enable notifications for `kind`, replacing any earlier subscription for
   * it. Rejects with ServiceUnavailableError when the peripheral refuses.
   */
  async subscribe(kind: ServiceKind): Promise<void> {
    const { serviceUuid, characteristicUuid, label } = SERVICE_TABLE[kind];

    const previous = this.subscriptions.get(kind);
    if (previous) {
      this.logger.debug(`Replacing existing ${label} subscription #${previous.id}`);
      this.subscriptions.delete(kind);
      this.currentIds.delete(kind);
      await this.release(kind, previous);
    }

    const id = this.nextSubscriptionId++;
    // Claimed before the adapter call so values arriving mid-subscribe are kept
    this.currentIds.set(kind, id);

    const pending = this.link.subscribe(serviceUuid, characteristicUuid, payload => {
      // Drop stragglers from a subscription that has since been replaced
      if (this.currentIds.get(kind) !== id) return;
      this.dispatch({ characteristicId: kind, payload, receivedAt: new Date() });
    });

    let unsubscribe: Unsubscribe;
    try {
      unsubscribe = await withTimeout(
        pending,
        this.subscribeTimeoutMs,
        () => new Error(`${label} subscription timed out after ${this.subscribeTimeoutMs}ms`)
      );
    } catch (error) {
      if (this.currentIds.get(kind) === id) {
        this.currentIds.delete(kind);
      }
      // A subscription that completes after we gave up must not stay open
      pending
        .then(late => this.release(kind, { id, unsubscribe: late }))
        .catch(lateError => this.logger.debug(`${label} subscribe settled with: ${translateBluetoothError(lateError)}`));
      throw new ServiceUnavailableError(
        kind,
        `${label} notifications unavailable: ${translateBluetoothError(error)}`
      );
    }

    if (this.currentIds.get(kind) !== id) {
      // unsubscribeAll() ran while we were waiting
      await this.release(kind, { id, unsubscribe });
      throw new ServiceUnavailableError(kind, `${label} subscription cancelled`);
    }

    this.subscriptions.set(kind, { id, unsubscribe });
    this.logger.info(`${label} notifications enabled (#${id})`);
  }

  /**
   * Decode one notification and, on success, apply it to the store in a
   * single update. Failures are logged and leave the store untouched.
   */
  dispatch(notification: RawNotification): DecodeResult<Partial<VitalsSnapshot>> {
    const kind = notification.characteristicId;
    const result = VITAL_DECODERS[kind](notification.payload);

    if (!result.ok) {
      this.notificationLog?.record(notification, result.error);
      this.logger.warn(
        `Dropped ${SERVICE_TABLE[kind].label} notification [${formatHex(notification.payload)}]: ${result.error.message}`
      );
      return result;
    }

    this.notificationLog?.record(notification);
    this.logger.debug(`${SERVICE_TABLE[kind].label}: ${JSON.stringify(result.value)}`);
    this.store.updateMany(result.value, notification.receivedAt);
    return result;
  }

  isSubscribed(kind: ServiceKind): boolean {
    return this.subscriptions.has(kind);
  }

  getActiveSubscriptions(): ServiceKind[] {
    return [...this.subscriptions.keys()];
  }

  /** Tear down every subscription. Safe to call any number of times. */
  async unsubscribeAll(): Promise<void> {
    this.currentIds.clear();
    if (this.subscriptions.size === 0) {
      return;
    }

    const active = [...this.subscriptions.entries()];
    this.subscriptions.clear();

    await Promise.all(active.map(([kind, subscription]) => this.release(kind, subscription)));
    this.logger.debug(`Released ${active.length} subscription(s)`);
  }

  private async release(kind: ServiceKind, subscription: ActiveSubscription): Promise<void> {
    try {
      await subscription.unsubscribe();
    } catch (error) {
      // Link is usually already gone at this point; the handler is detached either way
      this.logger.warn(
        `Unsubscribe of ${SERVICE_TABLE[kind].label} #${subscription.id} failed: ${translateBluetoothError(error)}`
      );
    }
  }
}
