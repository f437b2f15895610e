import { z } from 'zod';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_DISCONNECT_TIMEOUT_MS,
  DEFAULT_SCAN_KEYWORDS,
  DEFAULT_SCAN_TIMEOUT_SEC,
  DEFAULT_SUBSCRIBE_TIMEOUT_MS
} from './constants.js';
import { normalizeLogLevel, type LogLevel } from './utils.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const port = z.coerce.number().int().min(0).max(65535);
const positiveMs = z.coerce.number().int().positive();

const envSchema = z.object({
  VITALS_LOG_LEVEL: z.string().optional(),
  VITALS_LOG_TIMESTAMPS: booleanFlag.default('true'),
  VITALS_ADAPTER: z.enum(['noble', 'mock']).default('noble'),
  VITALS_SCAN_TIMEOUT_SEC: z.coerce.number().positive().max(300).default(DEFAULT_SCAN_TIMEOUT_SEC),
  VITALS_SCAN_KEYWORDS: z.string().optional(),
  VITALS_CONNECT_TIMEOUT_MS: positiveMs.default(DEFAULT_CONNECT_TIMEOUT_MS),
  VITALS_SUBSCRIBE_TIMEOUT_MS: positiveMs.default(DEFAULT_SUBSCRIBE_TIMEOUT_MS),
  VITALS_DISCONNECT_TIMEOUT_MS: positiveMs.default(DEFAULT_DISCONNECT_TIMEOUT_MS),
  VITALS_NOTIFICATION_LOG_SIZE: z.coerce.number().int().min(100).max(1000000).default(10000),
  VITALS_HTTP_PORT: port.default(8081),
  VITALS_HTTP_TOKEN: z.string().min(1).optional(),
  VITALS_WS_PORT: port.default(8082),
  VITALS_AUTO_CONNECT: booleanFlag.default('false')
});

export interface MonitorConfig {
  logLevel: LogLevel;
  logTimestamps: boolean;
  adapter: 'noble' | 'mock';
  scanTimeoutSec: number;
  scanKeywords: string[];
  connectTimeoutMs: number;
  subscribeTimeoutMs: number;
  disconnectTimeoutMs: number;
  notificationLogSize: number;
  httpPort: number;
  httpToken?: string;
  wsPort: number;
  autoConnect: boolean;
}

function parseKeywords(raw: string | undefined): string[] {
  if (raw === undefined) {
    return [...DEFAULT_SCAN_KEYWORDS];
  }
  const keywords = raw.split(',').map(keyword => keyword.trim().toLowerCase()).filter(Boolean);
  return keywords.length > 0 ? keywords : [...DEFAULT_SCAN_KEYWORDS];
}

/**
 * Read VITALS_* settings. Empty strings count as unset; anything else that
 * does not parse throws a ZodError naming every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('VITALS_') && value !== undefined && value !== '')
  );
  const parsed = envSchema.parse(present);

  return {
    logLevel: normalizeLogLevel(parsed.VITALS_LOG_LEVEL),
    logTimestamps: parsed.VITALS_LOG_TIMESTAMPS,
    adapter: parsed.VITALS_ADAPTER,
    scanTimeoutSec: parsed.VITALS_SCAN_TIMEOUT_SEC,
    scanKeywords: parseKeywords(parsed.VITALS_SCAN_KEYWORDS),
    connectTimeoutMs: parsed.VITALS_CONNECT_TIMEOUT_MS,
    subscribeTimeoutMs: parsed.VITALS_SUBSCRIBE_TIMEOUT_MS,
    disconnectTimeoutMs: parsed.VITALS_DISCONNECT_TIMEOUT_MS,
    notificationLogSize: parsed.VITALS_NOTIFICATION_LOG_SIZE,
    httpPort: parsed.VITALS_HTTP_PORT,
    ...(parsed.VITALS_HTTP_TOKEN ? { httpToken: parsed.VITALS_HTTP_TOKEN } : {}),
    wsPort: parsed.VITALS_WS_PORT,
    autoConnect: parsed.VITALS_AUTO_CONNECT
  };
}
