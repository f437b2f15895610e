#!/usr/bin/env node

import * as dotenv from 'dotenv';
import * as path from 'path';
import type { BleAdapter } from './adapter.js';
import { loadConfig, type MonitorConfig } from './config.js';
import { Logger } from './logger.js';
import { DEMO_DEVICE_ADDRESS, MockBleAdapter, createDemoDevice } from './mock-adapter.js';
import { HealthMonitor } from './monitor.js';
import { ObservabilityServer } from './observability-server.js';
import { getPackageMetadata } from './utils.js';
import { VitalsFeed } from './vitals-feed.js';

// Load .env.local if it exists
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

const logger = new Logger('Main');

async function createAdapter(config: MonitorConfig): Promise<{ adapter: BleAdapter; stop: () => void }> {
  if (config.adapter === 'mock') {
    const mock = new MockBleAdapter([createDemoDevice()]);
    return { adapter: mock, stop: mock.startStreaming(DEMO_DEVICE_ADDRESS, 2000) };
  }

  // Loaded lazily so the mock build never touches the HCI socket
  const { NobleAdapter } = await import('./noble-adapter.js');
  return { adapter: new NobleAdapter(config.disconnectTimeoutMs), stop: () => undefined };
}

async function autoConnect(monitor: HealthMonitor, config: MonitorConfig): Promise<void> {
  const devices = await monitor.scan(config.scanTimeoutSec);
  if (devices.length === 0) {
    logger.warn('No health devices found; use the connect_device MCP tool once one is in range');
    return;
  }

  const strongest = devices.reduce((best, device) => (device.signalStrength > best.signalStrength ? device : best));
  logger.info(`Connecting to strongest match: ${strongest.name ?? 'Unknown'} [${strongest.address}]`);
  const session = await monitor.connect(strongest.address);
  logger.info(`Supported services: ${session.supportedServices.join(', ') || 'none'}`);
}

async function main() {
  const config = loadConfig();
  const metadata = getPackageMetadata();

  logger.info(`Starting ${metadata.name} v${metadata.version}`);
  logger.info(`   Adapter: ${config.adapter}`);
  logger.info(`   Scan keywords: ${config.scanKeywords.join(', ')}`);

  const { adapter, stop: stopAdapter } = await createAdapter(config);
  const monitor = new HealthMonitor(adapter, {
    scanKeywords: config.scanKeywords,
    connectTimeoutMs: config.connectTimeoutMs,
    subscribeTimeoutMs: config.subscribeTimeoutMs,
    notificationLogSize: config.notificationLogSize
  });

  monitor.subscribe(snapshot => logger.debug('Vitals:', JSON.stringify(snapshot)));
  monitor.on('linkLost', () => logger.warn('Device link lost - reconnect with the connect_device MCP tool'));

  const observability = new ObservabilityServer(monitor, config.httpToken);
  await observability.startHttp(config.httpPort);

  const feed = new VitalsFeed(monitor);
  await feed.start(config.wsPort);

  logger.info('Press Ctrl+C to stop');

  if (config.autoConnect) {
    autoConnect(monitor, config).catch(error => {
      logger.error('Auto-connect failed:', error instanceof Error ? error.message : String(error));
    });
  }

  // Keep running on stray errors; a single bad device must not take the monitor down
  process.on('uncaughtException', error => {
    logger.error('[CRITICAL] Uncaught exception:', error);
  });

  process.on('unhandledRejection', reason => {
    logger.error('[CRITICAL] Unhandled promise rejection:', reason);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down...`);
    stopAdapter();
    await monitor.disconnect();
    await feed.stop();
    await observability.stop();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Shutdown failed:', error);
          process.exit(1);
        });
    });
  }
}

main().catch(error => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
