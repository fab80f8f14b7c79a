/**
 * Unit tests for the error hierarchy.
 */
import { describe, it, expect } from 'vitest';
import {
  ClientError,
  RemoteOperationError,
  TransportError,
  ValidationError,
  isClientError,
} from '../../src/errors.js';

describe('isClientError', () => {
  it('should recognise every client error kind', () => {
    expect(isClientError(new RemoteOperationError('Server is not offline'))).toBe(true);
    expect(isClientError(TransportError.http(502, 'GET', 'servers'))).toBe(true);
    expect(isClientError(new ValidationError('Account', [{ path: 'name', code: 'invalid_type', message: 'Expected string' }]))).toBe(true);
  });

  it('should reject plain errors and non-errors', () => {
    expect(isClientError(new Error('boom'))).toBe(false);
    expect(isClientError('boom')).toBe(false);
    expect(isClientError(null)).toBe(false);
  });

  it('should narrow to ClientError', () => {
    const err: unknown = TransportError.timeout('GET', 'account', 5);

    expect(isClientError(err) && err.code).toBe('TIMEOUT');
    expect(err).toBeInstanceOf(ClientError);
  });
});
