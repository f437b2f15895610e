import type { ServiceKind } from './types.js';

export type ConnectionErrorCode =
  | 'TIMEOUT'
  | 'REFUSED'
  | 'LINK_LOST'
  | 'DISCOVERY_FAILED'
  | 'ADAPTER_UNAVAILABLE'
  | 'SESSION_ACTIVE';

export type VitalsErrorCode =
  | ConnectionErrorCode
  | 'SCAN_TIMEOUT'
  | 'SERVICE_UNAVAILABLE'
  | 'DECODE_ERROR'
  | 'DISCONNECTED'
  | 'OPERATION_IN_PROGRESS';

/**
 * Base for every error this package raises; `code` is stable and safe to
 * branch on, `message` is for humans.
 */
export class VitalsError extends Error {
  constructor(public readonly code: VitalsErrorCode, message: string) {
    super(message);
    this.name = 'VitalsError';
  }
}

export class ScanTimeoutError extends VitalsError {
  constructor(message = 'Scan window elapsed') {
    super('SCAN_TIMEOUT', message);
    this.name = 'ScanTimeoutError';
  }
}

export class ConnectionError extends VitalsError {
  constructor(public readonly reason: ConnectionErrorCode, message: string) {
    super(reason, message);
    this.name = 'ConnectionError';
  }
}

export class ServiceUnavailableError extends VitalsError {
  constructor(public readonly service: ServiceKind, message: string) {
    super('SERVICE_UNAVAILABLE', message);
    this.name = 'ServiceUnavailableError';
  }
}

export class DecodeError extends VitalsError {
  constructor(message: string) {
    super('DECODE_ERROR', message);
    this.name = 'DecodeError';
  }
}

export class LinkLostError extends VitalsError {
  constructor(public readonly address: string, message = `Link to ${address} lost`) {
    super('LINK_LOST', message);
    this.name = 'LinkLostError';
  }
}

export class DisconnectedError extends VitalsError {
  constructor(message: string) {
    super('DISCONNECTED', message);
    this.name = 'DisconnectedError';
  }
}

export class OperationInProgressError extends VitalsError {
  constructor(public readonly activeOperation: string) {
    super('OPERATION_IN_PROGRESS', `Another operation is in progress: ${activeOperation}`);
    this.name = 'OperationInProgressError';
  }
}

// Bluetooth HCI status codes seen on connect/disconnect paths
const HCI_ERROR_CODES: Record<number, string> = {
  0x02: 'Unknown Connection Identifier',
  0x04: 'Page Timeout',
  0x05: 'Authentication Failure',
  0x08: 'Connection Timeout',
  0x09: 'Connection Limit Exceeded',
  0x0B: 'ACL Connection Already Exists',
  0x0C: 'Command Disallowed',
  0x0D: 'Connection Rejected due to Limited Resources',
  0x0E: 'Connection Rejected Due To Security Reasons',
  0x0F: 'Connection Rejected due to Unacceptable BD_ADDR',
  0x10: 'Connection Accept Timeout Exceeded',
  0x13: 'Remote User Terminated Connection',
  0x14: 'Remote Device Terminated Connection due to Low Resources',
  0x15: 'Remote Device Terminated Connection due to Power Off',
  0x16: 'Connection Terminated By Local Host',
  0x22: 'LMP Response Timeout / LL Response Timeout',
  0x3B: 'Unacceptable Connection Parameters',
  0x3E: 'Connection Failed to be Established',
  // errno values some Linux stacks report instead
  111: 'Connection refused (ECONNREFUSED)',
  113: 'No route to host (EHOSTUNREACH)'
};

const TIMEOUT_CODES = new Set([0x04, 0x08, 0x10, 0x22, 0x3E]);

function errorCode(error: unknown): number | undefined {
  if (typeof error === 'number') return error;
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

export function translateBluetoothError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }

  const code = errorCode(error);
  if (code !== undefined) {
    return HCI_ERROR_CODES[code] || `Unknown Bluetooth error code: ${code}`;
  }

  if (error instanceof Error && error.message) {
    return error.message;
  }

  const errorStr = String(error ?? '');
  const codeMatch = errorStr.match(/\b(\d+)\b/);
  if (codeMatch) {
    const parsed = parseInt(codeMatch[1], 10);
    if (HCI_ERROR_CODES[parsed]) {
      return HCI_ERROR_CODES[parsed];
    }
  }

  return errorStr || 'Unknown error';
}

/**
 * Map whatever the host adapter threw during connect onto TIMEOUT or REFUSED.
 */
export function classifyConnectError(address: string, error: unknown): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }

  const code = errorCode(error);
  const text = translateBluetoothError(error);
  const isTimeout = (code !== undefined && TIMEOUT_CODES.has(code)) || /time(d)?\s?out/i.test(text);

  return isTimeout
    ? new ConnectionError('TIMEOUT', `Connection to ${address} timed out: ${text}`)
    : new ConnectionError('REFUSED', `Connection to ${address} refused: ${text}`);
}
