import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import WebSocket from 'ws';
import { MockBleAdapter, createDemoDevice, DEMO_DEVICE_ADDRESS } from '../../src/mock-adapter.js';
import { HealthMonitor } from '../../src/monitor.js';
import { ServiceKind } from '../../src/types.js';
import { VitalsFeed, type FeedMessage } from '../../src/vitals-feed.js';

/** Collects every message a client receives, parsed. */
class FeedClient {
  readonly messages: FeedMessage[] = [];
  private waiters: Array<{ count: number; resolve: () => void }> = [];

  constructor(readonly ws: WebSocket) {
    ws.on('message', data => {
      this.messages.push(JSON.parse(data.toString()));
      this.waiters = this.waiters.filter(waiter => {
        if (this.messages.length >= waiter.count) {
          waiter.resolve();
          return false;
        }
        return true;
      });
    });
  }

  static async connect(port: number): Promise<FeedClient> {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    const client = new FeedClient(ws);
    await new Promise<void>((resolve, reject) => {
      ws.once('open', () => resolve());
      ws.once('error', reject);
    });
    return client;
  }

  waitFor(count: number, timeoutMs = 2000): Promise<FeedMessage[]> {
    if (this.messages.length >= count) {
      return Promise.resolve(this.messages.slice(0, count));
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error(`Timeout waiting for ${count} messages`)), timeoutMs);
      this.waiters.push({
        count,
        resolve: () => {
          clearTimeout(timer);
          resolve(this.messages.slice(0, count));
        }
      });
    });
  }

  close(): void {
    this.ws.close();
  }
}

describe('VitalsFeed', () => {
  let adapter: MockBleAdapter;
  let monitor: HealthMonitor;
  let feed: VitalsFeed;
  let port: number;
  let clients: FeedClient[];

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    adapter = new MockBleAdapter([createDemoDevice()]);
    monitor = new HealthMonitor(adapter, { connectTimeoutMs: 100, subscribeTimeoutMs: 100 });
    feed = new VitalsFeed(monitor);
    port = await feed.start(0, '127.0.0.1');
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) {
      client.close();
    }
    await monitor.disconnect();
    await feed.stop();
    vi.restoreAllMocks();
  });

  async function connectClient(): Promise<FeedClient> {
    const client = await FeedClient.connect(port);
    clients.push(client);
    return client;
  }

  it('should send the current snapshot to a new client', async () => {
    const client = await connectClient();

    const [first] = await client.waitFor(1);

    expect(first).toMatchObject({ type: 'snapshot', snapshot: {} });
    expect(feed.getClientCount()).toBe(1);
  });

  it('should send the session as well when one exists', async () => {
    await monitor.connect(DEMO_DEVICE_ADDRESS);

    const client = await connectClient();
    const [snapshot, session] = await client.waitFor(2);

    expect(snapshot).toMatchObject({ type: 'snapshot', snapshot: { batteryPct: 85 } });
    expect(session).toMatchObject({ type: 'session', session: { address: DEMO_DEVICE_ADDRESS, state: 'MONITORING' } });
  });

  it('should broadcast state changes and store updates', async () => {
    const client = await connectClient();
    await client.waitFor(1);

    await monitor.connect(DEMO_DEVICE_ADDRESS);
    adapter.simulateNotification(DEMO_DEVICE_ADDRESS, ServiceKind.HEART_RATE, new Uint8Array([0x00, 77]));

    // snapshot on connect, CONNECTING, DISCOVERING, battery read, MONITORING, heart rate
    const messages = await client.waitFor(6);
    expect(messages.map(message => message.type)).toEqual([
      'snapshot', 'session', 'session', 'snapshot', 'session', 'snapshot'
    ]);
    expect(messages[5]).toMatchObject({ snapshot: { heartRateBpm: 77, batteryPct: 85 } });
  });

  it('should tell clients when the link is lost', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await monitor.connect(DEMO_DEVICE_ADDRESS);
    const client = await connectClient();
    await client.waitFor(2);

    adapter.dropLink(DEMO_DEVICE_ADDRESS);

    const messages = await client.waitFor(4);
    expect(messages[2]).toMatchObject({ type: 'session', session: { state: 'DISCONNECTED' } });
    expect(messages[3]).toEqual({
      type: 'link_lost',
      address: DEMO_DEVICE_ADDRESS,
      message: `Link to ${DEMO_DEVICE_ADDRESS} lost`
    });
  });

  it('should stop broadcasting after stop()', async () => {
    await connectClient();
    await feed.stop();

    expect(feed.getClientCount()).toBe(0);
    expect(monitor.store.getSubscriberCount()).toBe(0);
    expect(monitor.listenerCount('stateChange')).toBe(0);
  });
});
