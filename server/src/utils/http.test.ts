import { describeFetchError, parseRetryAfter, truncate } from './http';

describe('describeFetchError', () => {
  it('should prefer the cause message', () => {
    const err = new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND hooks.example.com') });
    expect(describeFetchError(err)).toBe('getaddrinfo ENOTFOUND hooks.example.com');
  });

  it('should fall back to the error message', () => {
    expect(describeFetchError(new Error('boom'))).toBe('boom');
  });

  it('should stringify non-errors', () => {
    expect(describeFetchError('plain')).toBe('plain');
  });
});

describe('parseRetryAfter', () => {
  it('should read delta seconds', () => {
    expect(parseRetryAfter('30')).toBe(30_000);
  });

  it('should read an HTTP date relative to now', () => {
    const now = Date.parse('2026-01-01T00:00:00Z');
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:05 GMT', now)).toBe(5000);
  });

  it('should ignore missing or malformed values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('truncate', () => {
  it('should leave short text alone and cut long text', () => {
    expect(truncate('short')).toBe('short');
    expect(truncate('abcdef', 3)).toBe('abc...');
  });
});
