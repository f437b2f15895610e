import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  connectDevice,
  disconnectDevice,
  getNotifications,
  getSession,
  getStatus,
  getVitals,
  registerMcpTools,
  scanDevices,
  toolRegistry
} from '../../src/mcp-tools.js';
import { MockBleAdapter, createDemoDevice, DEMO_DEVICE_ADDRESS } from '../../src/mock-adapter.js';
import { HealthMonitor } from '../../src/monitor.js';
import { ServiceKind } from '../../src/types.js';
import { getPackageMetadata } from '../../src/utils.js';

function parse(result: CallToolResult) {
  const first = result.content[0];
  if (!first || first.type !== 'text') {
    throw new Error('expected a text result');
  }
  return JSON.parse(first.text);
}

describe('MCP Tools Integration Tests', () => {
  let adapter: MockBleAdapter;
  let monitor: HealthMonitor;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    adapter = new MockBleAdapter([createDemoDevice()]);
    monitor = new HealthMonitor(adapter, { connectTimeoutMs: 100, subscribeTimeoutMs: 100 });
  });

  afterEach(async () => {
    await monitor.disconnect();
    vi.restoreAllMocks();
  });

  it('should register all 7 tools once, however many servers register them', () => {
    registerMcpTools(new McpServer({ name: 'test', version: '0.0.0' }), monitor);
    registerMcpTools(new McpServer({ name: 'test', version: '0.0.0' }), monitor);

    expect(toolRegistry.map(tool => tool.name)).toEqual([
      'scan_devices',
      'connect_device',
      'disconnect_device',
      'get_vitals',
      'get_session',
      'get_notifications',
      'status'
    ]);
  });

  it('should execute scan_devices', async () => {
    const body = parse(await scanDevices(monitor, { timeout_seconds: 0.01 }));

    expect(body).toEqual({
      devices: [{ address: DEMO_DEVICE_ADDRESS, name: 'Demo Health Band', signalStrength: -48 }],
      count: 1
    });
  });

  it('should execute connect_device and get_session', async () => {
    const connected = parse(await connectDevice(monitor, { address: DEMO_DEVICE_ADDRESS }));
    expect(connected.session).toMatchObject({
      address: DEMO_DEVICE_ADDRESS,
      name: 'Demo Health Band',
      state: 'MONITORING',
      unsupportedServices: []
    });
    expect(connected.session.supportedServices).toHaveLength(5);

    const session = parse(await getSession(monitor));
    expect(session.session.state).toBe('MONITORING');
  });

  it('should let connect_device errors reach the caller', async () => {
    await expect(connectDevice(monitor, { address: '11:22:33:44:55:66' })).rejects.toMatchObject({ reason: 'TIMEOUT' });
  });

  it('should execute get_vitals with absent fields left out', async () => {
    await connectDevice(monitor, { address: DEMO_DEVICE_ADDRESS });
    adapter.simulateNotification(DEMO_DEVICE_ADDRESS, ServiceKind.HEART_RATE, new Uint8Array([0x00, 64]));

    const body = parse(await getVitals(monitor));

    expect(body.snapshot).toEqual({ heartRateBpm: 64, batteryPct: 85 });
    expect(typeof body.timestamp).toBe('string');
  });

  it('should execute disconnect_device', async () => {
    await connectDevice(monitor, { address: DEMO_DEVICE_ADDRESS });

    const body = parse(await disconnectDevice(monitor));

    expect(body.session.state).toBe('DISCONNECTED');
    expect(adapter.isConnected(DEMO_DEVICE_ADDRESS)).toBe(false);
  });

  it('should execute get_notifications with limit and truncation', async () => {
    await connectDevice(monitor, { address: DEMO_DEVICE_ADDRESS });
    for (const bpm of [60, 61, 62]) {
      adapter.simulateNotification(DEMO_DEVICE_ADDRESS, ServiceKind.HEART_RATE, new Uint8Array([0x00, bpm]));
    }

    const body = parse(await getNotifications(monitor, { since: '0', limit: 2 }));

    // Battery read first, then three heart rate values
    expect(body.count).toBe(2);
    expect(body.truncated).toBe(true);
    expect(body.notifications.map((entry: { hex: string }) => entry.hex)).toEqual(['55', '00 3C']);
    expect(body.stats[ServiceKind.HEART_RATE]).toEqual({ received: 3, failed: 0 });
  });

  it('should search notification payloads by hex', async () => {
    await connectDevice(monitor, { address: DEMO_DEVICE_ADDRESS });
    adapter.simulateNotification(DEMO_DEVICE_ADDRESS, ServiceKind.HEART_RATE, new Uint8Array([0x00, 0x3C]));
    adapter.simulateNotification(DEMO_DEVICE_ADDRESS, ServiceKind.HEART_RATE, new Uint8Array([0x00, 0x3D]));

    const body = parse(await getNotifications(monitor, { since: '0', hex_pattern: '3d', limit: 10 }));

    expect(body.count).toBe(1);
    expect(body.truncated).toBe(false);
    expect(body.notifications[0].hex).toBe('00 3D');
  });

  it('should execute status', async () => {
    const body = parse(await getStatus(monitor));

    expect(body).toMatchObject({
      version: getPackageMetadata().version,
      busy: null,
      state: 'IDLE',
      address: null,
      subscribers: 0,
      notificationLogSize: 0,
      notificationLogCapacity: 10000
    });
    expect(body.uptime).toBeGreaterThan(0);
  });
});
