import { WebSocket, WebSocketServer } from 'ws';
import type { LinkLostError } from './errors.js';
import { Logger } from './logger.js';
import type { HealthMonitor } from './monitor.js';
import type { SessionInfo } from './session.js';
import type { VitalsSnapshot } from './types.js';

export type FeedMessage =
  | { type: 'snapshot'; snapshot: Readonly<VitalsSnapshot>; timestamp: string }
  | { type: 'session'; session: SessionInfo }
  | { type: 'link_lost'; address: string; message: string };

/**
 * VitalsFeed - read-only WebSocket push of the monitor's state
 *
 * Each client gets the current snapshot (and session, if any) on connect,
 * then every store update, state change and link loss as JSON messages.
 * Anything a client sends is ignored.
 */
export class VitalsFeed {
  private wss: WebSocketServer | null = null;
  private detach: Array<() => void> = [];
  private logger = new Logger('VitalsFeed');

  constructor(private readonly monitor: HealthMonitor) {}

  async start(port: number, host = '0.0.0.0'): Promise<number> {
    const wss = new WebSocketServer({ port, host });
    this.wss = wss;

    await new Promise<void>((resolve, reject) => {
      wss.once('listening', () => resolve());
      wss.once('error', reject);
    });

    wss.on('connection', (ws, req) => {
      this.logger.info(`Client connected from ${req.socket.remoteAddress} (${wss.clients.size} total)`);
      this.send(ws, this.snapshotMessage(new Date()));
      const session = this.monitor.getSessionInfo();
      if (session) {
        this.send(ws, { type: 'session', session });
      }
      ws.on('close', () => this.logger.debug(`Client left (${wss.clients.size} remaining)`));
      ws.on('error', error => this.logger.warn(`Client socket error: ${error.message}`));
    });

    const onStateChange = (_from: unknown, _to: unknown, session: SessionInfo) => {
      this.broadcast({ type: 'session', session });
    };
    const onLinkLost = (error: LinkLostError) => {
      this.broadcast({ type: 'link_lost', address: error.address, message: error.message });
    };

    this.detach.push(this.monitor.subscribe((_snapshot, timestamp) => this.broadcast(this.snapshotMessage(timestamp))));
    this.monitor.on('stateChange', onStateChange);
    this.monitor.on('linkLost', onLinkLost);
    this.detach.push(() => {
      this.monitor.removeListener('stateChange', onStateChange);
      this.monitor.removeListener('linkLost', onLinkLost);
    });

    const address = wss.address();
    const actualPort = address && typeof address !== 'string' ? address.port : port;
    this.logger.info(`Vitals feed listening on ${host}:${actualPort}`);
    return actualPort;
  }

  getClientCount(): number {
    return this.wss ? this.wss.clients.size : 0;
  }

  async stop(): Promise<void> {
    for (const detach of this.detach.splice(0)) {
      detach();
    }

    const wss = this.wss;
    this.wss = null;
    if (!wss) {
      return;
    }

    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close(error => (error ? reject(error) : resolve()));
    });
    this.logger.info('Vitals feed stopped');
  }

  private snapshotMessage(timestamp: Date): FeedMessage {
    return { type: 'snapshot', snapshot: this.monitor.getSnapshot(), timestamp: timestamp.toISOString() };
  }

  private broadcast(message: FeedMessage): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) {
      this.send(client, message);
    }
  }

  private send(ws: WebSocket, message: FeedMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }
}
