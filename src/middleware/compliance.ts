/**
 * compliance.ts — Response classification and per-host pacing.
 *
 * 1. **Classification** — Map an HTTP status + body onto the harvester's
 *    response classes (success, auth-expired, rate-limited, bot-blocked,
 *    transient-network, fatal-client).
 * 2. **Rate limiting** — Per-host Bottleneck instances so concurrent batch
 *    workers never hit the API faster than RATE_LIMIT_MS apart.
 */

import Bottleneck from 'bottleneck';
import type { ResponseClass } from '../core/types';

// ─── Status helpers ─────────────────────────────────────────

export function isAuthWallResponse(statusCode: number): boolean {
  return statusCode === 401 || statusCode === 403;
}

export function isRateLimitResponse(statusCode: number): boolean {
  return statusCode === 429;
}

/**
 * Does this body say the cookie/crumb pair was rejected?
 *
 * The API answers a stale crumb with
 *   {"finance":{"result":null,"error":{"code":"Unauthorized","description":"Invalid Crumb"}}}
 * whereas a bot-detection 403 is usually an HTML page or an empty body.
 */
export function isAuthIndicatingBody(body: string): boolean {
  return /invalid\s+crumb|invalid\s+cookie|unauthori[sz]ed|user\s+is\s+unable\s+to\s+access/i.test(
    body,
  );
}

/**
 * Classify a completed HTTP exchange.
 *
 * `parsed` is whether the body parsed into the expected payload; a 2xx whose
 * body did not parse is treated as a block page served with status 200.
 */
export function classifyResponse(
  statusCode: number,
  body: string,
  parsed: boolean,
): ResponseClass {
  if (statusCode >= 200 && statusCode < 300) {
    return parsed ? 'success' : 'bot-blocked';
  }
  if (isAuthWallResponse(statusCode)) {
    // A 403 without a crumb complaint is a block page, not a stale session.
    return statusCode === 401 || isAuthIndicatingBody(body) ? 'auth-expired' : 'bot-blocked';
  }
  if (isRateLimitResponse(statusCode)) return 'rate-limited';
  if (statusCode >= 500 || statusCode === 0) return 'transient-network';
  return 'fatal-client';
}

export function isRetryable(kind: ResponseClass): boolean {
  return kind === 'rate-limited' || kind === 'bot-blocked' || kind === 'transient-network';
}

/**
 * Parse a Retry-After header (delta-seconds form) into milliseconds.
 * HTTP-date values and garbage yield undefined.
 */
export function retryAfterMs(
  header: string | string[] | undefined,
): number | undefined {
  const raw = Array.isArray(header) ? header[0] : header;
  if (!raw || !/^\s*\d+\s*$/.test(raw)) return undefined;
  return parseInt(raw, 10) * 1_000;
}

// ─── Rate limiter (Bottleneck) ──────────────────────────────

const limiters = new Map<string, Bottleneck>();

/**
 * Create or retrieve the limiter for a host.  Every request to the same host
 * is spaced at least `minTimeMs` apart, regardless of how many batches are
 * in flight.
 */
export function getRateLimiter(hostname: string, minTimeMs: number): Bottleneck {
  const key = `${hostname}:${minTimeMs}`;
  const existing = limiters.get(key);
  if (existing) return existing;

  const limiter = new Bottleneck({
    minTime: minTimeMs,
  });

  limiters.set(key, limiter);
  return limiter;
}

/** Clear all rate limiters (between runs, and in tests). */
export async function clearRateLimiters(): Promise<void> {
  const pending = [...limiters.values()].map((limiter) => limiter.disconnect());
  limiters.clear();
  await Promise.all(pending);
}
