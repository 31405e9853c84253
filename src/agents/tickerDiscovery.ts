/**
 * tickerDiscovery.ts — Walk the screener page by page to build the ticker universe.
 *
 * Per region the paginator stops at the first of:
 *   • unique symbols seen ≥ the latest advertised total
 *   • a short (or empty) page
 *   • offset ≥ the latest advertised total
 *
 * The advertised total can move while we page (the universe is live).  The
 * latest value wins; a final mismatch is logged, never failed.
 */

import { Logger } from '../core/logger';
import {
  SCREENER_MAX_PAGE_SIZE,
  type DiscoveryError,
  type DiscoveryPage,
  type DiscoveryResult,
  type ScreenerProfile,
} from '../core/types';
import type { RetryController } from '../middleware/retryController';
import type { YahooFinanceApi } from '../services/yahooFinanceApi';

const logger = new Logger('TickerDiscovery');

/** Raised inside `pages()` when a page fails after retries. */
export class DiscoveryPageError extends Error {
  constructor(readonly detail: DiscoveryError) {
    super(detail.error);
    this.name = 'DiscoveryPageError';
  }
}

export interface TickerDiscoveryOptions {
  api: Pick<YahooFinanceApi, 'screener'>;
  retry: Pick<RetryController, 'execute'>;
  pageSize: number;
  /** Called after every successful page (progress reporting). */
  onPage?: (page: DiscoveryPage) => void;
}

export class TickerDiscovery {
  private readonly api: Pick<YahooFinanceApi, 'screener'>;
  private readonly retry: Pick<RetryController, 'execute'>;
  private readonly pageSize: number;
  private readonly onPage?: (page: DiscoveryPage) => void;

  constructor(options: TickerDiscoveryOptions) {
    this.api = options.api;
    this.retry = options.retry;
    this.pageSize = Math.min(Math.max(1, Math.floor(options.pageSize)), SCREENER_MAX_PAGE_SIZE);
    this.onPage = options.onPage;
  }

  /**
   * Lazily yield the pages of one region.  Restartable: a new call with
   * `startOffset` resumes from there.
   *
   * @throws DiscoveryPageError when a page fails after retries.
   * @throws AuthUnavailableError from the session store.
   */
  async *pages(region: string, startOffset = 0): AsyncGenerator<DiscoveryPage> {
    const seen = new Set<string>();
    let offset = startOffset;
    let total: number | undefined;

    for (;;) {
      if (total !== undefined && (seen.size >= total || offset >= total)) return;

      const outcome = await this.retry.execute(this.api.screener(region, offset, this.pageSize));
      if (!outcome.success) {
        throw new DiscoveryPageError({
          region,
          offset,
          kind: outcome.kind,
          error: outcome.error,
        });
      }

      const { value } = outcome;
      if (total !== undefined && value.total !== total) {
        logger.warn(`Region ${region}: advertised total moved ${total} → ${value.total}`);
      }
      total = value.total;

      const tickers = value.profiles.map((p) => p.ticker);
      for (const t of tickers) seen.add(t);

      const page: DiscoveryPage = {
        region,
        offset,
        pageSize: this.pageSize,
        totalAdvertised: value.total,
        tickersReturned: tickers,
        profiles: value.profiles,
      };
      yield page;

      if (tickers.length < this.pageSize) return;
      offset += this.pageSize;
    }
  }

  /**
   * Discover every region in turn.  A failed page ends its region only; the
   * failure is returned in `errors`.
   *
   * `onPage` sees each page as it arrives, so a caller still knows how far
   * discovery got when an AuthUnavailableError cuts it short.
   */
  async discover(
    regions: string[],
    onPage?: (page: DiscoveryPage) => void,
  ): Promise<DiscoveryResult> {
    const tickers: string[] = [];
    const profiles = new Map<string, ScreenerProfile>();
    const errors: DiscoveryError[] = [];
    let pageCount = 0;

    for (const region of regions) {
      const regionSeen = new Set<string>();
      let advertised = 0;

      try {
        for await (const page of this.pages(region)) {
          pageCount += 1;
          advertised = page.totalAdvertised;

          for (const profile of page.profiles) {
            regionSeen.add(profile.ticker);
            if (!profiles.has(profile.ticker)) {
              profiles.set(profile.ticker, { ...profile, region: profile.region ?? region });
              tickers.push(profile.ticker);
            }
          }

          logger.debug(
            `Region ${region} @${page.offset}: ${page.tickersReturned.length} symbols ` +
              `(${regionSeen.size}/${page.totalAdvertised})`,
          );
          this.onPage?.(page);
          onPage?.(page);
        }
      } catch (err) {
        if (!(err instanceof DiscoveryPageError)) throw err;
        errors.push(err.detail);
        logger.error(
          `Region ${region}: page @${err.detail.offset} failed (${err.detail.kind}) — ` +
            `keeping ${regionSeen.size} symbols found so far`,
        );
        continue;
      }

      if (regionSeen.size !== advertised) {
        logger.warn(
          `Region ${region}: ${regionSeen.size} unique symbols vs ${advertised} advertised`,
        );
      }
      logger.info(`Region ${region}: ${regionSeen.size} symbols discovered`);
    }

    return { tickers, profiles, pages: pageCount, errors };
  }
}
