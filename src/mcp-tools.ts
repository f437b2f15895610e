import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { DEFAULT_SCAN_TIMEOUT_SEC } from './constants.js';
import { Logger } from './logger.js';
import type { HealthMonitor } from './monitor.js';
import type { NotificationLogEntry, ServiceStats } from './notification-log.js';
import type { ServiceKind } from './types.js';
import { getPackageMetadata } from './utils.js';

// Tool registry for dynamic tool listing
export const toolRegistry: Array<{ name: string; description: string }> = [];

const logger = new Logger('MCP Tool');

// Response interfaces
interface NotificationsResponse {
  notifications: NotificationLogEntry[];
  count: number;
  truncated: boolean;
  stats: Record<ServiceKind, ServiceStats>;
}

interface MonitorServerStatus {
  version: string;
  uptime: number;
  busy: string | null;
  state: string;
  address: string | null;
  subscribers: number;
  notificationLogSize: number;
  notificationLogCapacity: number;
  logLevel: string;
}

function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(value, null, 2)
    }]
  };
}

async function logged(name: string, args: unknown, handler: () => Promise<CallToolResult>): Promise<CallToolResult> {
  logger.info(`Executing '${name}' with args:`, JSON.stringify(args));
  try {
    const result = await handler();
    logger.info(`'${name}' completed successfully`);
    return result;
  } catch (error) {
    logger.error(`'${name}' failed:`, error instanceof Error ? error.message : String(error));
    throw error;
  }
}

function track(name: string, description: string): { description: string } {
  if (!toolRegistry.some(tool => tool.name === name)) {
    toolRegistry.push({ name, description });
  }
  return { description };
}

// Handlers take already-validated arguments so tests can call them directly

export async function scanDevices(monitor: HealthMonitor, args: { timeout_seconds: number }): Promise<CallToolResult> {
  const devices = await monitor.scan(args.timeout_seconds);
  return jsonResult({ devices, count: devices.length });
}

export async function connectDevice(monitor: HealthMonitor, args: { address: string }): Promise<CallToolResult> {
  const session = await monitor.connect(args.address);
  return jsonResult({ session });
}

export async function disconnectDevice(monitor: HealthMonitor): Promise<CallToolResult> {
  await monitor.disconnect();
  return jsonResult({ session: monitor.getSessionInfo() });
}

export async function getVitals(monitor: HealthMonitor): Promise<CallToolResult> {
  return jsonResult({ snapshot: monitor.getSnapshot(), timestamp: new Date().toISOString() });
}

export async function getSession(monitor: HealthMonitor): Promise<CallToolResult> {
  return jsonResult({ session: monitor.getSessionInfo() });
}

export async function getNotifications(
  monitor: HealthMonitor,
  args: { since: string; hex_pattern?: string; limit: number }
): Promise<CallToolResult> {
  const log = monitor.notificationLog;
  // One extra entry tells us whether the result was cut short
  const entries = args.hex_pattern
    ? log.searchPayloads(args.hex_pattern, args.limit + 1)
    : log.getEntriesSince(args.since, args.limit + 1);

  const response: NotificationsResponse = {
    notifications: entries.slice(0, args.limit),
    count: Math.min(entries.length, args.limit),
    truncated: entries.length > args.limit,
    stats: log.getStats()
  };
  return jsonResult(response);
}

export async function getStatus(monitor: HealthMonitor): Promise<CallToolResult> {
  const status = monitor.getStatus();
  const response: MonitorServerStatus = {
    version: getPackageMetadata().version,
    uptime: process.uptime(),
    busy: status.busy,
    state: status.state,
    address: status.address,
    subscribers: status.subscribers,
    notificationLogSize: monitor.notificationLog.getBufferSize(),
    notificationLogCapacity: monitor.notificationLog.getMaxSize(),
    logLevel: process.env.VITALS_LOG_LEVEL || 'debug'
  };
  return jsonResult(response);
}

export function registerMcpTools(server: McpServer, monitor: HealthMonitor): void {
  server.registerTool(
    'scan_devices',
    {
      title: 'Scan for Health Devices',
      ...track('scan_devices', 'Scan for nearby BLE health wearables (name filtered by keyword)'),
      inputSchema: {
        timeout_seconds: z.number().min(1).max(60).default(DEFAULT_SCAN_TIMEOUT_SEC).describe('Scan window in seconds')
      }
    },
    args => logged('scan_devices', args, () => scanDevices(monitor, args))
  );

  server.registerTool(
    'connect_device',
    {
      title: 'Connect to Device',
      ...track('connect_device', 'Open a monitoring session with a device and subscribe to its health services'),
      inputSchema: {
        address: z.string().min(1).describe('Device address as returned by scan_devices')
      }
    },
    args => logged('connect_device', args, () => connectDevice(monitor, args))
  );

  server.registerTool(
    'disconnect_device',
    {
      title: 'Disconnect Device',
      ...track('disconnect_device', 'Unsubscribe everything and close the current session'),
      inputSchema: {}
    },
    args => logged('disconnect_device', args, () => disconnectDevice(monitor))
  );

  server.registerTool(
    'get_vitals',
    {
      title: 'Get Vitals',
      ...track('get_vitals', 'Latest decoded vitals; fields never reported are absent'),
      inputSchema: {}
    },
    args => logged('get_vitals', args, () => getVitals(monitor))
  );

  server.registerTool(
    'get_session',
    {
      title: 'Get Session',
      ...track('get_session', 'Current session state and which services the device supports'),
      inputSchema: {}
    },
    args => logged('get_session', args, () => getSession(monitor))
  );

  server.registerTool(
    'get_notifications',
    {
      title: 'Get Notification Log',
      ...track('get_notifications', 'Recent raw characteristic notifications and whether each decoded'),
      inputSchema: {
        since: z.string().default('0').describe("Time filter: duration (30s, 5m, 1h), ISO timestamp, or '0' for all"),
        hex_pattern: z.string().optional().describe('Only payloads containing this hex (case insensitive, spaces optional)'),
        limit: z.number().int().min(1).max(1000).default(100).describe('Maximum entries to return')
      }
    },
    args => logged('get_notifications', args, () => getNotifications(monitor, args))
  );

  server.registerTool(
    'status',
    {
      title: 'Get Monitor Status',
      ...track('status', 'Monitor version, uptime, busy operation and session summary'),
      inputSchema: {}
    },
    args => logged('status', args, () => getStatus(monitor))
  );
}
