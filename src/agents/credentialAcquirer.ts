/**
 * credentialAcquirer.ts — Strategies for obtaining a cookie + crumb pair.
 *
 * Every strategy implements `CredentialAcquirer`; the SessionStore neither
 * knows nor cares which one produced the pair.
 *
 *   static   — a pair supplied through the environment
 *   light    — fc.yahoo.com cookie + getcrumb over the TLS-impersonating client
 *   browser  — headless Chrome (see browserCredentialAcquirer.ts)
 *   fallback — tries a chain of the above in order
 */

import { AcquisitionFailedError, errorMessage } from '../core/errors';
import { pickRandomProfile } from '../core/browserProfiles';
import { Logger } from '../core/logger';
import type { Credentials, HttpTransport } from '../core/types';
import { cookieHeaderFromSetCookie, lightFetch } from '../middleware/lightFetcher';

const logger = new Logger('CredentialAcquirer');

export const COOKIE_URL = 'https://fc.yahoo.com';
export const CRUMB_URL = 'https://query1.finance.yahoo.com/v1/test/getcrumb';

export interface CredentialAcquirer {
  readonly name: string;
  acquire(): Promise<Credentials>;
}

// ─── Static ─────────────────────────────────────────────────

/**
 * Hands out the configured pair once.  A re-acquisition means the API
 * rejected it, so later calls fail and a fallback chain moves on.
 */
export class StaticCredentialAcquirer implements CredentialAcquirer {
  readonly name = 'static';
  private used = false;

  constructor(
    private readonly cookie: string,
    private readonly crumb: string,
  ) {}

  async acquire(): Promise<Credentials> {
    if (this.used) {
      throw new AcquisitionFailedError(this.name, 'configured pair was already rejected');
    }
    this.used = true;
    return { cookie: this.cookie, crumb: this.crumb, source: this.name };
  }
}

// ─── Light (HTTP only) ──────────────────────────────────────

export interface LightAcquirerOptions {
  transport?: HttpTransport;
  userAgent?: string;
  timeoutMs?: number;
}

export class LightCredentialAcquirer implements CredentialAcquirer {
  readonly name = 'light';
  private readonly transport: HttpTransport;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(options: LightAcquirerOptions = {}) {
    this.transport = options.transport ?? lightFetch;
    this.userAgent = options.userAgent ?? pickRandomProfile().userAgent;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async acquire(): Promise<Credentials> {
    const headers = { 'user-agent': this.userAgent };

    // fc.yahoo.com answers with a redirect or an error page; only its
    // Set-Cookie headers matter.
    const cookieResponse = await this.transport(COOKIE_URL, {
      headers,
      followRedirect: false,
      timeout: this.timeoutMs,
    });
    const cookie = cookieHeaderFromSetCookie(cookieResponse.headers['set-cookie']);
    if (!cookie) {
      throw new AcquisitionFailedError(
        this.name,
        `no cookie issued by ${COOKIE_URL} (HTTP ${cookieResponse.statusCode})`,
      );
    }

    const crumbResponse = await this.transport(CRUMB_URL, {
      headers,
      cookieHeader: cookie,
      timeout: this.timeoutMs,
    });
    if (crumbResponse.statusCode !== 200) {
      throw new AcquisitionFailedError(
        this.name,
        `crumb endpoint answered HTTP ${crumbResponse.statusCode}`,
      );
    }

    const crumb = crumbResponse.body.trim();
    if (!crumb) {
      throw new AcquisitionFailedError(this.name, 'crumb endpoint returned an empty body');
    }

    logger.debug(`Light acquisition obtained cookie (${cookie.length} chars) and crumb`);
    return { cookie, crumb, userAgent: this.userAgent, source: this.name };
  }
}

// ─── Fallback chain ─────────────────────────────────────────

/**
 * Try each acquirer in turn and return the first pair obtained.
 * When every strategy fails, the error lists each failure.
 */
export class FallbackCredentialAcquirer implements CredentialAcquirer {
  readonly name: string;

  constructor(private readonly chain: CredentialAcquirer[]) {
    if (chain.length === 0) {
      throw new Error('FallbackCredentialAcquirer needs at least one acquirer');
    }
    this.name = chain.map((a) => a.name).join('>');
  }

  async acquire(): Promise<Credentials> {
    const failures: string[] = [];

    for (const acquirer of this.chain) {
      try {
        const credentials = await acquirer.acquire();
        return { ...credentials, source: credentials.source ?? acquirer.name };
      } catch (err) {
        const message = errorMessage(err);
        failures.push(`${acquirer.name}: ${message}`);
        logger.warn(`Acquirer "${acquirer.name}" failed: ${message}`);
      }
    }

    throw new AcquisitionFailedError(this.name, `all strategies failed (${failures.join('; ')})`);
  }
}
