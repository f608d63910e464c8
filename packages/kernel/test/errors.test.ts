/**
 * xferctl Kernel — Error Taxonomy Tests
 *
 * ERR-U1: every kind maps to its documented exit code
 * ERR-U2: anything that is not an XferError exits with 1
 * ERR-U3: RemoteError keeps status and body and prefixes the context
 */

import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  ErrorKind,
  IngestionFailedError,
  InsecureConfigurationError,
  InvalidArgumentError,
  LocalStoreError,
  NotAuthenticatedError,
  ProtocolError,
  RemoteError,
  TimeoutError,
  TokenExpiredError,
  TransportError,
  XferError,
  exitCodeFor,
  isNodeError,
  isXferError,
} from '../src/errors/errors.js';

describe('ERR-U1: exit codes per kind', () => {
  it.each([
    [new InvalidArgumentError('x'), ErrorKind.InvalidArgument, 2],
    [new NotAuthenticatedError('x'), ErrorKind.NotAuthenticated, 3],
    [new TokenExpiredError('x'), ErrorKind.TokenExpired, 4],
    [new InsecureConfigurationError('x'), ErrorKind.InsecureConfiguration, 5],
    [new TransportError('x'), ErrorKind.TransportError, 6],
    [new RemoteError(500, 'x'), ErrorKind.RemoteError, 7],
    [new ProtocolError('x'), ErrorKind.ProtocolError, 8],
    [new LocalStoreError('x'), ErrorKind.LocalStoreError, 9],
    [new IngestionFailedError('x', 3), ErrorKind.IngestionFailed, 10],
    [new TimeoutError('x'), ErrorKind.Timeout, 11],
    [new CancelledError('x'), ErrorKind.Cancelled, 12],
  ])('%s', (err: XferError, kind: ErrorKind, code: number) => {
    expect(err.kind).toBe(kind);
    expect(err.exitCode).toBe(code);
    expect(exitCodeFor(err)).toBe(code);
    expect(isXferError(err)).toBe(true);
    expect(err).toBeInstanceOf(Error);
  });

  it('names each error after its class', () => {
    expect(new TransportError('x').name).toBe('TransportError');
    expect(new TokenExpiredError('x').name).toBe('TokenExpiredError');
  });
});

describe('ERR-U2: unknown failures', () => {
  it.each([new Error('boom'), 'string', null, undefined, 42])('exitCodeFor(%s) = 1', (value) => {
    expect(exitCodeFor(value)).toBe(1);
    expect(isXferError(value)).toBe(false);
  });
});

describe('ERR-U3: RemoteError', () => {
  it('formats with a context prefix', () => {
    const err = new RemoteError(401, 'denied', 'GET roles');
    expect(err.message).toBe('GET roles: HTTP 401: denied');
    expect(err.status).toBe(401);
    expect(err.body).toBe('denied');
    expect(err.kind).toBe(ErrorKind.RemoteError);
  });

  it('formats without a context', () => {
    expect(new RemoteError(503, 'unavailable').message).toBe('HTTP 503: unavailable');
  });
});

describe('IngestionFailedError', () => {
  it('records the failing row index and cause', () => {
    const cause = new Error('constraint');
    const err = new IngestionFailedError('row failed', 4, { cause });
    expect(err.rowIndex).toBe(4);
    expect(err.cause).toBe(cause);
  });
});

describe('isNodeError', () => {
  it('matches on the errno code', () => {
    const err = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isNodeError(err, 'ENOENT')).toBe(true);
    expect(isNodeError(err, 'EACCES')).toBe(false);
    expect(isNodeError(new Error('plain'), 'ENOENT')).toBe(false);
    expect(isNodeError(null, 'ENOENT')).toBe(false);
  });
});
