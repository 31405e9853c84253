/**
 * browserManager.ts — Lazily launched headless Chrome for credential acquisition.
 *
 * Only the browser acquisition strategy needs a real browser, so nothing is
 * spawned until `withPage()` is first called.  Every page lives in its own
 * browser context, which `withPage()` disposes even when the callback throws.
 *
 * The browser binary is not bundled: set CHROME_EXECUTABLE_PATH, or an
 * installed stable Chrome is used.
 */

import puppeteerCore from 'puppeteer-core';
import type { Browser, BrowserContext, Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { errorMessage } from './errors';
import { pickRandomProfile, type BrowserProfile } from './browserProfiles';
import { Logger } from './logger';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

export interface BrowserManagerOptions {
  executablePath?: string;
  profile?: BrowserProfile;
}

export class BrowserManager {
  private browser: Browser | null = null;
  private readonly executablePath?: string;
  /** Identity used by every page of this manager. */
  readonly profile: BrowserProfile;

  constructor(options: BrowserManagerOptions = {}) {
    this.executablePath = options.executablePath;
    this.profile = options.profile ?? pickRandomProfile();

    logger.info(
      `Browser profile: ${this.profile.platform} / ` +
        `${this.profile.viewport.join('x')} / ` +
        `lang=${this.profile.acceptLanguage.split(',')[0]}`,
    );
  }

  // ── Core API ───────────────────────────────────────────

  /**
   * Run `fn` with a fresh page in its own context, then dispose the context.
   */
  async withPage<T>(fn: (page: Page) => Promise<T>): Promise<T> {
    const browser = await this.ensureBrowser();

    const context: BrowserContext = await browser.createBrowserContext();
    try {
      const page: Page = await context.newPage();

      await page.setViewport({
        width: Math.min(this.profile.viewport[0], 1920),
        height: Math.min(this.profile.viewport[1], 1080),
      });
      await page.setUserAgent(this.profile.userAgent);
      await page.setExtraHTTPHeaders({
        'accept-language': this.profile.acceptLanguage,
      });

      return await fn(page);
    } finally {
      await context.close().catch((err: unknown) => {
        logger.warn(`Failed to close browser context: ${errorMessage(err)}`);
      });
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const browser = this.browser;
    this.browser = null;
    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (err) {
      logger.warn(`Failed to close browser: ${errorMessage(err)}`);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser && this.browser.connected) {
      return this.browser;
    }

    const lang = this.profile.acceptLanguage.split(',')[0];
    const browser: Browser = await puppeteer.launch({
      headless: true,
      ...(this.executablePath
        ? { executablePath: this.executablePath }
        : { channel: 'chrome' as const }),
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        `--lang=${lang}`,
      ],
    });

    logger.info('Browser launched');
    this.browser = browser;
    return browser;
  }
}
