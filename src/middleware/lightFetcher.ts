/**
 * lightFetcher.ts — TLS-impersonating HTTP transport for the finance API.
 *
 * got-scraping sends a Chrome-like TLS Client Hello and generates a matching
 * header set (Accept, sec-ch-ua, …).  Non-browser TLS handshakes are one of
 * the first signals the API uses to block clients, so every outbound call in
 * the harvester goes through here.
 *
 * HTTP error statuses are returned, not thrown: classifying them is the
 * retry controller's job.  Only transport failures (timeouts, resets, DNS)
 * reject.
 */

import { gotScraping } from 'got-scraping';
import { Logger } from '../core/logger';
import type { HttpRequestOptions, HttpResponse } from '../core/types';

const logger = new Logger('LightFetcher');

/**
 * Perform one HTTP exchange.
 *
 * An explicit `user-agent` header (e.g. the one a browser-acquired cookie was
 * issued to) overrides the generated one.
 */
export async function lightFetch(
  url: string,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const method = options?.method ?? 'GET';
  logger.debug(`${method} ${url}`);

  const headers: Record<string, string> = {
    ...options?.headers,
  };

  if (options?.cookieHeader) {
    headers['cookie'] = options.cookieHeader;
  }

  const response = await gotScraping({
    url,
    method,
    headers,
    body: options?.body,
    throwHttpErrors: false,
    followRedirect: options?.followRedirect ?? true,
    timeout: { request: options?.timeout ?? 30_000 },
    headerGeneratorOptions: {
      browsers: [{ name: 'chrome', minVersion: 120 }],
      devices: ['desktop'],
      operatingSystems: ['macos', 'windows'],
    },
  });

  const statusCode = response.statusCode ?? 0;
  logger.debug(`HTTP ${statusCode} for ${url}`);

  return {
    body: response.body,
    statusCode,
    headers: response.headers,
  };
}

/**
 * Collect every `name=value` pair from Set-Cookie headers into one Cookie
 * header string.  Attributes (Path, Expires, …) are dropped.
 */
export function cookieHeaderFromSetCookie(
  setCookie: string | string[] | undefined,
): string {
  if (!setCookie) return '';
  const lines = Array.isArray(setCookie) ? setCookie : [setCookie];

  const pairs = new Map<string, string>();
  for (const line of lines) {
    const [pair] = line.split(';');
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    pairs.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
  }

  return [...pairs].map(([name, value]) => `${name}=${value}`).join('; ');
}
