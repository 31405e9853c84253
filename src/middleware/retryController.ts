/**
 * retryController.ts — The single place where outbound calls are retried.
 *
 *   success            → returned
 *   auth-expired       → invalidate session, one immediate retry with a fresh one
 *   rate-limited       ┐
 *   bot-blocked        ├ exponential backoff + jitter, up to maxAttempts sends
 *   transient-network  ┘
 *   fatal-client       → returned at once
 *
 * Failures come back as `RequestOutcome` values.  The only thing thrown is
 * AuthUnavailableError from the session store.
 */

import type Bottleneck from 'bottleneck';
import type { SessionStore } from '../agents/sessionStore';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  FailureKind,
  HttpResponse,
  OutboundRequest,
  RequestOutcome,
} from '../core/types';
import { classifyResponse, getRateLimiter, isRetryable, retryAfterMs } from './compliance';

const logger = new Logger('RetryController');

export const API_HOST = 'query1.finance.yahoo.com';

export interface RetryPolicy {
  /** Total sends allowed for backoff-retried failures. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface RetryControllerOptions extends RetryPolicy {
  store: Pick<SessionStore, 'getValidSession' | 'invalidate'>;
  /** Minimum spacing between sends to the API host. */
  rateLimitMs?: number;
  /** Overrides the shared per-host limiter. */
  limiter?: Bottleneck;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (0-based).  A Retry-After hint raises
 * the exponential delay but never past `maxDelayMs`.
 */
export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number,
  retryAfter?: number,
): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  const base =
    retryAfter !== undefined
      ? Math.min(Math.max(exponential, retryAfter), policy.maxDelayMs)
      : exponential;
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return base + jitter;
}

export class RetryController {
  private readonly policy: RetryPolicy;
  private readonly store: Pick<SessionStore, 'getValidSession' | 'invalidate'>;
  private readonly limiter: Bottleneck;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: RetryControllerOptions) {
    this.policy = {
      maxAttempts: Math.max(1, options.maxAttempts),
      baseDelayMs: options.baseDelayMs,
      maxDelayMs: options.maxDelayMs,
      jitterMs: options.jitterMs,
    };
    this.store = options.store;
    this.limiter = options.limiter ?? getRateLimiter(API_HOST, options.rateLimitMs ?? 0);
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async execute<T>(request: OutboundRequest<T>): Promise<RequestOutcome<T>> {
    let attempts = 0;
    let backoffSends = 0;
    let authRetried = false;

    for (;;) {
      // AuthUnavailableError propagates from here.
      const session = await this.store.getValidSession();
      attempts += 1;
      backoffSends += 1;

      let kind: FailureKind;
      let error: string;
      let retryAfter: number | undefined;

      let response: HttpResponse | null = null;
      let transportError = 'no response';
      try {
        response = await this.limiter.schedule(() => request.send(session));
      } catch (err) {
        transportError = errorMessage(err);
      }

      if (!response || response.statusCode === 0) {
        kind = 'transient-network';
        error = `${request.label}: ${transportError}`;
      } else {
        const ok = response.statusCode >= 200 && response.statusCode < 300;
        const value = ok ? safeParse(request, response.body) : undefined;
        const cls = classifyResponse(response.statusCode, response.body, value !== undefined);
        if (cls === 'success' && value !== undefined) {
          return { success: true, value, attempts };
        }
        kind = cls === 'success' ? 'bot-blocked' : cls;
        error = `${request.label}: HTTP ${response.statusCode} (${kind})`;
        retryAfter = retryAfterMs(response.headers['retry-after']);
      }

      if (kind === 'auth-expired') {
        if (authRetried) {
          logger.warn(`${error} — still rejected after re-acquisition`);
          return { success: false, kind, error, attempts };
        }
        authRetried = true;
        backoffSends -= 1;
        logger.warn(`${error} — invalidating session and retrying once`);
        this.store.invalidate(session);
        continue;
      }

      if (!isRetryable(kind)) {
        logger.warn(`${error} — not retried`);
        return { success: false, kind, error, attempts };
      }

      if (backoffSends >= this.policy.maxAttempts) {
        logger.warn(`${error} — giving up after ${attempts} attempt(s)`);
        return { success: false, kind, error, attempts };
      }

      const delay = backoffDelay(this.policy, backoffSends - 1, this.random, retryAfter);
      logger.info(`${error} — retry ${backoffSends}/${this.policy.maxAttempts - 1} in ${delay} ms`);
      await this.sleep(delay);
    }
  }
}

function safeParse<T>(request: OutboundRequest<T>, body: string): T | undefined {
  try {
    return request.parse(body);
  } catch (err) {
    logger.debug(`${request.label}: unparseable body (${errorMessage(err)})`);
    return undefined;
  }
}
