import { describe, it, expect } from 'vitest';
import {
  ConnectionError,
  LinkLostError,
  OperationInProgressError,
  VitalsError,
  classifyConnectError,
  translateBluetoothError
} from '../../src/errors.js';

describe('translateBluetoothError', () => {
  it('should name known HCI status codes', () => {
    expect(translateBluetoothError(0x3E)).toBe('Connection Failed to be Established');
    expect(translateBluetoothError({ code: 0x08 })).toBe('Connection Timeout');
  });

  it('should report codes it does not know', () => {
    expect(translateBluetoothError(0x7F)).toBe('Unknown Bluetooth error code: 127');
  });

  it('should pass strings and error messages through', () => {
    expect(translateBluetoothError('adapter reset')).toBe('adapter reset');
    expect(translateBluetoothError(new Error('Read not permitted'))).toBe('Read not permitted');
  });

  it('should prefer the code over the message of an error that carries one', () => {
    const error = Object.assign(new Error('hci status'), { code: 0x13 });
    expect(translateBluetoothError(error)).toBe('Remote User Terminated Connection');
  });

  it('should find a known code inside other values', () => {
    expect(translateBluetoothError({ toString: () => 'status 19' })).toBe('Remote User Terminated Connection');
  });

  it('should fall back to a generic message', () => {
    expect(translateBluetoothError(null)).toBe('Unknown error');
    expect(translateBluetoothError(undefined)).toBe('Unknown error');
  });
});

describe('classifyConnectError', () => {
  it('should map timeout status codes to TIMEOUT', () => {
    const error = classifyConnectError('aa:bb', { code: 0x04 });
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error.reason).toBe('TIMEOUT');
    expect(error.message).toBe('Connection to aa:bb timed out: Page Timeout');
  });

  it('should map timeout wording to TIMEOUT', () => {
    expect(classifyConnectError('aa:bb', new Error('Connect timed out')).reason).toBe('TIMEOUT');
    expect(classifyConnectError('aa:bb', new Error('operation timeout')).reason).toBe('TIMEOUT');
  });

  it('should map everything else to REFUSED', () => {
    const error = classifyConnectError('aa:bb', { code: 111 });
    expect(error.reason).toBe('REFUSED');
    expect(error.message).toBe('Connection to aa:bb refused: Connection refused (ECONNREFUSED)');
  });

  it('should return a ConnectionError unchanged', () => {
    const original = new ConnectionError('LINK_LOST', 'Link to aa:bb dropped during setup');
    expect(classifyConnectError('aa:bb', original)).toBe(original);
  });
});

describe('error classes', () => {
  it('should carry a stable code on every error', () => {
    expect(new LinkLostError('aa:bb').code).toBe('LINK_LOST');
    expect(new LinkLostError('aa:bb').message).toBe('Link to aa:bb lost');
    expect(new OperationInProgressError('scan').code).toBe('OPERATION_IN_PROGRESS');
    expect(new ConnectionError('REFUSED', 'no').code).toBe('REFUSED');
  });

  it('should share the VitalsError base', () => {
    expect(new ConnectionError('TIMEOUT', 'slow')).toBeInstanceOf(VitalsError);
    expect(new ConnectionError('TIMEOUT', 'slow')).toBeInstanceOf(Error);
    expect(new ConnectionError('TIMEOUT', 'slow').name).toBe('ConnectionError');
  });
});
