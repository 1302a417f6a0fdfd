import { describe, it, expect } from 'vitest';
import { ConnectionPool } from '../../src/utils/connection-pool';
import { CircuitOpenError, ForbiddenError, InvalidUrlError, UnauthorizedError, errorMessage } from '../../src/utils/errors';
import { constantTimeCompare, sanitizeError } from '../../src/utils/security';
import { joinUrl } from '../../src/utils/url';

describe('joinUrl', () => {
  it('should append the path and query to the origin', () => {
    expect(joinUrl(new URL('http://a.internal:3001'), '/api/users?page=2')).toBe('http://a.internal:3001/api/users?page=2');
  });

  it('should keep the base path the server was registered with', () => {
    expect(joinUrl(new URL('http://a.internal/base/'), '/health')).toBe('http://a.internal/base/health');
    expect(joinUrl(new URL('http://a.internal/base'), 'health')).toBe('http://a.internal/base/health');
  });
});

describe('security helpers', () => {
  it('should compare strings exactly', () => {
    expect(constantTimeCompare('test-secret', 'test-secret')).toBe(true);
    expect(constantTimeCompare('test-secret', 'test-secreT')).toBe(false);
    expect(constantTimeCompare('test-secret', 'test')).toBe(false);
  });

  it('should hide error details in production', () => {
    expect(sanitizeError(new Error('db password rejected'), true)).toEqual({
      message: 'An error occurred. Please try again later.'
    });
    expect(sanitizeError(new Error('db password rejected'))).toEqual({ message: 'db password rejected' });
    expect(sanitizeError('')).toEqual({ message: 'An error occurred' });
  });
});

describe('errors', () => {
  it('should carry the offending values', () => {
    const invalidUrl = new InvalidUrlError('nope', 'malformed URL');
    expect(invalidUrl.message).toBe('Invalid server URL "nope": malformed URL');
    expect(invalidUrl.url).toBe('nope');

    expect(new CircuitOpenError('http://a.internal/').message).toBe('Circuit breaker is open for http://a.internal/');
    expect(new UnauthorizedError().status).toBe(401);
    expect(new ForbiddenError().status).toBe(403);
  });

  it('should describe unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('ConnectionPool', () => {
  it('should reuse one client per origin', () => {
    const pool = new ConnectionPool({ timeout: 1000 });

    const first = pool.getClient('http://a.internal:3001');
    expect(pool.getClient('http://a.internal:3001')).toBe(first);
    expect(pool.getClient('https://b.internal')).not.toBe(first);
    expect(pool.clientCount).toBe(2);
    expect(first.defaults.timeout).toBe(1000);
    expect(first.defaults.maxRedirects).toBe(0);

    pool.destroy();
    expect(pool.clientCount).toBe(0);
  });
});
