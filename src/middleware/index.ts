/**
 * middleware/index.ts — Barrel export for the request layer.
 */

// ── Transport ───────────────────────────────────────────────
export { lightFetch, cookieHeaderFromSetCookie } from './lightFetcher';

// ── Classification & pacing ─────────────────────────────────
export {
  classifyResponse,
  isAuthWallResponse,
  isRateLimitResponse,
  isRetryable,
  retryAfterMs,
  getRateLimiter,
  clearRateLimiters,
} from './compliance';

// ── Retry ───────────────────────────────────────────────────
export { RetryController, backoffDelay } from './retryController';
export type { RetryPolicy } from './retryController';
