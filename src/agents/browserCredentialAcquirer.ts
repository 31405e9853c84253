/**
 * browserCredentialAcquirer.ts — Obtain a cookie + crumb by loading the
 * quote page in headless Chrome.
 *
 * The page's own scripts call the API with `?crumb=…`, so the crumb is read
 * off an outgoing request whenever one is seen.  When the page makes no such
 * call before it settles, the crumb endpoint is fetched from inside the page,
 * which sends the browser's cookies and TLS fingerprint.
 *
 * EU visitors are redirected to a consent wall first; it is accepted and the
 * quote page reloaded.
 */

import type { HTTPRequest, Page } from 'puppeteer-core';
import { BrowserManager } from '../core/browserManager';
import { AcquisitionFailedError, errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import type { Credentials } from '../core/types';
import type { CredentialAcquirer } from './credentialAcquirer';
import { CRUMB_URL } from './credentialAcquirer';

const logger = new Logger('BrowserAcquirer');

const START_URL = 'https://finance.yahoo.com/quote/AAPL/';
const COOKIE_URLS = [
  'https://finance.yahoo.com',
  'https://query1.finance.yahoo.com',
  'https://query2.finance.yahoo.com',
  'https://www.yahoo.com',
  'https://fc.yahoo.com',
];
const CONSENT_SELECTORS = [
  'button[name="agree"]',
  'button.accept-all',
  'button[type="submit"][value="agree"]',
];

/** Pull the `crumb` query parameter off an API call, if it carries one. */
export function crumbFromRequestUrl(url: string): string | null {
  if (!/^https:\/\/query\d\.finance\.yahoo\.com\//.test(url)) return null;
  try {
    const crumb = new URL(url).searchParams.get('crumb');
    return crumb && crumb.trim() ? crumb.trim() : null;
  } catch {
    return null;
  }
}

export interface BrowserAcquirerOptions {
  navigationTimeoutMs?: number;
}

export class BrowserCredentialAcquirer implements CredentialAcquirer {
  readonly name = 'browser';
  private readonly navigationTimeoutMs: number;

  constructor(
    private readonly browser: BrowserManager,
    options: BrowserAcquirerOptions = {},
  ) {
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 45_000;
  }

  async acquire(): Promise<Credentials> {
    return this.browser.withPage(async (page) => {
      // Set from the request listener; read after navigation settles.
      const captured: { crumb: string | null } = { crumb: null };
      const onRequest = (request: HTTPRequest): void => {
        if (captured.crumb) return;
        const crumb = crumbFromRequestUrl(request.url());
        if (crumb) {
          captured.crumb = crumb;
          logger.debug('Crumb observed on a page API request');
        }
      };
      page.on('request', onRequest);

      try {
        await this.navigate(page);

        if (await this.acceptConsent(page)) {
          await this.navigate(page);
        }

        const crumb = captured.crumb ?? (await this.fetchCrumbInPage(page));
        const cookie = await this.collectCookies(page);

        logger.info(
          `Browser acquisition complete (crumb via ` +
            `${captured.crumb ? 'page traffic' : 'getcrumb'})`,
        );
        return {
          cookie,
          crumb,
          userAgent: this.browser.profile.userAgent,
          source: this.name,
        };
      } finally {
        page.off('request', onRequest);
      }
    });
  }

  // ── Steps ──────────────────────────────────────────────

  private async navigate(page: Page): Promise<void> {
    try {
      await page.goto(START_URL, {
        waitUntil: 'networkidle2',
        timeout: this.navigationTimeoutMs,
      });
    } catch (err) {
      throw new AcquisitionFailedError(
        this.name,
        `navigation to ${START_URL} failed: ${errorMessage(err)}`,
      );
    }
  }

  /** @returns true when a consent button was found and clicked. */
  private async acceptConsent(page: Page): Promise<boolean> {
    if (!page.url().includes('consent.')) return false;

    for (const selector of CONSENT_SELECTORS) {
      const button = await page.$(selector);
      if (!button) continue;

      logger.info('Consent wall shown — accepting');
      await Promise.all([
        page
          .waitForNavigation({ waitUntil: 'networkidle2', timeout: this.navigationTimeoutMs })
          .catch((err: unknown) => {
            logger.warn(`No navigation after consent: ${errorMessage(err)}`);
          }),
        button.click(),
      ]);
      return true;
    }

    throw new AcquisitionFailedError(this.name, 'consent wall shown but no accept button found');
  }

  private async fetchCrumbInPage(page: Page): Promise<string> {
    const result = await page.evaluate(async (url: string) => {
      const response = await fetch(url, { credentials: 'include' });
      return { status: response.status, body: await response.text() };
    }, CRUMB_URL);

    const crumb = result.body.trim();
    if (result.status !== 200 || !crumb) {
      throw new AcquisitionFailedError(
        this.name,
        `in-page getcrumb answered HTTP ${result.status}`,
      );
    }
    return crumb;
  }

  private async collectCookies(page: Page): Promise<string> {
    const cookies = await page.cookies(...COOKIE_URLS);
    const pairs = new Map<string, string>();
    for (const cookie of cookies) {
      pairs.set(cookie.name, cookie.value);
    }
    if (pairs.size === 0) {
      throw new AcquisitionFailedError(this.name, 'page set no cookies');
    }
    return [...pairs].map(([name, value]) => `${name}=${value}`).join('; ');
  }
}
