import { afterEach, describe, expect, it } from 'vitest';
import {
  classifyResponse,
  clearRateLimiters,
  getRateLimiter,
  isAuthIndicatingBody,
  isRetryable,
  retryAfterMs,
} from '../compliance';
import { cookieHeaderFromSetCookie } from '../lightFetcher';

describe('classifyResponse', () => {
  it.each([
    [200, '{}', true, 'success'],
    [200, '', false, 'bot-blocked'],
    [204, '', false, 'bot-blocked'],
    [401, '', false, 'auth-expired'],
    [403, '{"description":"Invalid Cookie"}', false, 'auth-expired'],
    [403, '<html>Access denied</html>', false, 'bot-blocked'],
    [429, 'Too Many Requests', false, 'rate-limited'],
    [500, '', false, 'transient-network'],
    [503, '', false, 'transient-network'],
    [0, '', false, 'transient-network'],
    [400, 'Bad Request', false, 'fatal-client'],
    [404, '', false, 'fatal-client'],
  ] as const)('HTTP %i %j (parsed=%s) → %s', (status, body, parsed, expected) => {
    expect(classifyResponse(status, body, parsed)).toBe(expected);
  });
});

describe('isAuthIndicatingBody', () => {
  it('recognises the crumb error payload', () => {
    expect(isAuthIndicatingBody('{"code":"Unauthorized","description":"Invalid Crumb"}')).toBe(true);
    expect(isAuthIndicatingBody('User is unable to access this feature')).toBe(true);
    expect(isAuthIndicatingBody('<html>Please verify you are human</html>')).toBe(false);
  });
});

describe('isRetryable', () => {
  it('retries only throttling, blocking and network failures', () => {
    expect(isRetryable('rate-limited')).toBe(true);
    expect(isRetryable('bot-blocked')).toBe(true);
    expect(isRetryable('transient-network')).toBe(true);
    expect(isRetryable('auth-expired')).toBe(false);
    expect(isRetryable('fatal-client')).toBe(false);
  });
});

describe('retryAfterMs', () => {
  it('reads delta-seconds', () => {
    expect(retryAfterMs('3')).toBe(3_000);
    expect(retryAfterMs(['7'])).toBe(7_000);
  });

  it('ignores HTTP dates and garbage', () => {
    expect(retryAfterMs('Wed, 21 Oct 2026 07:28:00 GMT')).toBeUndefined();
    expect(retryAfterMs('soon')).toBeUndefined();
    expect(retryAfterMs(undefined)).toBeUndefined();
  });
});

describe('getRateLimiter', () => {
  afterEach(async () => {
    await clearRateLimiters();
  });

  it('shares one limiter per host and spacing', () => {
    const a = getRateLimiter('query1.finance.yahoo.com', 250);
    expect(getRateLimiter('query1.finance.yahoo.com', 250)).toBe(a);
    expect(getRateLimiter('query2.finance.yahoo.com', 250)).not.toBe(a);
  });
});

describe('cookieHeaderFromSetCookie', () => {
  it('keeps name=value pairs and drops attributes', () => {
    expect(
      cookieHeaderFromSetCookie([
        'A3=d=AQABBK&S=AQAAA; Expires=Thu, 21 Oct 2027 07:28:00 GMT; Path=/; Domain=.yahoo.com',
        'A1=xyz; Path=/',
      ]),
    ).toBe('A3=d=AQABBK&S=AQAAA; A1=xyz');
  });

  it('lets a later cookie with the same name win', () => {
    expect(cookieHeaderFromSetCookie(['B=1; Path=/', 'B=2; Path=/'])).toBe('B=2');
  });

  it('returns an empty string when nothing was set', () => {
    expect(cookieHeaderFromSetCookie(undefined)).toBe('');
  });
});
