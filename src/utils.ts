import { readFileSync } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export function formatHex(data: Uint8Array): string {
  return Buffer.from(data).toString('hex').toUpperCase().match(/.{2}/g)?.join(' ') || '';
}

export function normalizeLogLevel(level: string | undefined): LogLevel {
  const normalized = (level || 'debug').toLowerCase();

  switch (normalized) {
    case 'debug':
    case 'verbose':
    case 'trace':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      console.warn(`[Config] Unknown log level '${level}', defaulting to debug`);
      return 'debug';
  }
}

export interface PackageMetadata {
  name: string;
  version: string;
  description: string;
}

let cachedMetadata: PackageMetadata | null = null;

export function getPackageMetadata(): PackageMetadata {
  if (!cachedMetadata) {
    // Same relative hop from src/ (tests) and dist/ (built CLI)
    const packageJsonPath = new URL('../package.json', import.meta.url);
    const pkg: Partial<PackageMetadata> = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    cachedMetadata = {
      name: pkg.name ?? 'ble-vitals-monitor',
      version: pkg.version ?? '0.0.0',
      description: pkg.description ?? ''
    };
  }
  return cachedMetadata;
}

const SIG_BASE_SUFFIX = '00001000800000805f9b34fb';

/**
 * Every spelling a platform may use for the same UUID: 16-bit short form,
 * 128-bit without dashes and 128-bit with dashes, all lower case.
 */
export function expandUuidVariants(uuid: string): string[] {
  const clean = uuid.toLowerCase().replace(/-/g, '');
  const variants: string[] = [];

  if (clean.length === 4) {
    const fullUuid = `0000${clean}${SIG_BASE_SUFFIX}`;
    variants.push(clean, fullUuid, dashed(fullUuid));
  } else if (clean.length === 32) {
    if (clean.startsWith('0000') && clean.endsWith(SIG_BASE_SUFFIX)) {
      variants.push(clean.substring(4, 8));
    }
    variants.push(clean, dashed(clean));
  } else {
    variants.push(clean);
  }

  return [...new Set(variants)];
}

export function uuidMatches(candidate: string, expected: string): boolean {
  const cleaned = candidate.toLowerCase().replace(/-/g, '');
  return expandUuidVariants(expected).some(variant => variant.replace(/-/g, '') === cleaned);
}

function dashed(full: string): string {
  return `${full.substring(0, 8)}-${full.substring(8, 12)}-${full.substring(12, 16)}-${full.substring(16, 20)}-${full.substring(20)}`;
}

/**
 * Race a promise against a timer. The timer is cleared either way so nothing
 * keeps the event loop alive after the race settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  createError: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(createError()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
