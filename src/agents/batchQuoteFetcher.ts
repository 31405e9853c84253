/**
 * batchQuoteFetcher.ts — Request full quotes for the ticker universe in batches.
 *
 * Batches run through a Bottleneck scheduler (`maxConcurrent` = configured
 * concurrency, 1 by default).  Every symbol ends up reported exactly once:
 * either as a record via `onRecord`, or with a FailureKind via `onFailure`.
 */

import Bottleneck from 'bottleneck';
import { AuthUnavailableError, errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import {
  QUOTE_MAX_SYMBOLS,
  type FailureKind,
  type QuotePayload,
  type TickerBatch,
} from '../core/types';
import type { RetryController } from '../middleware/retryController';
import type { YahooFinanceApi } from '../services/yahooFinanceApi';

const logger = new Logger('BatchQuoteFetcher');

/**
 * Split `tickers` into ordered, disjoint batches.  Duplicates are dropped
 * first; `batchSize` is clamped to [1, QUOTE_MAX_SYMBOLS].
 */
export function partition(tickers: string[], batchSize: number): TickerBatch[] {
  const size = clampBatchSize(batchSize);
  const unique = [...new Set(tickers)];

  const batches: TickerBatch[] = [];
  for (let start = 0; start < unique.length; start += size) {
    batches.push({ index: batches.length, symbols: unique.slice(start, start + size) });
  }
  return batches;
}

export function clampBatchSize(batchSize: number): number {
  return Math.min(Math.max(1, Math.floor(batchSize) || 1), QUOTE_MAX_SYMBOLS);
}

export interface FetchHandlers {
  /** Called once, before any request, with the batch plan. */
  onPlan?: (batches: TickerBatch[]) => void;
  /** A symbol's payload arrived.  May be async (e.g. a writer). */
  onRecord: (payload: QuotePayload) => void | Promise<void>;
  onFailure: (symbol: string, kind: FailureKind, error: string) => void;
  /** A batch finished, successfully or not. */
  onBatchDone?: (batch: TickerBatch) => void;
  /** Checked before each batch starts. */
  shouldStop?: () => boolean;
}

export interface BatchQuoteFetcherOptions {
  api: Pick<YahooFinanceApi, 'quotes'>;
  retry: Pick<RetryController, 'execute'>;
  batchSize: number;
  concurrency?: number;
}

export class BatchQuoteFetcher {
  private readonly api: Pick<YahooFinanceApi, 'quotes'>;
  private readonly retry: Pick<RetryController, 'execute'>;
  private readonly batchSize: number;
  private readonly concurrency: number;

  constructor(options: BatchQuoteFetcherOptions) {
    this.api = options.api;
    this.retry = options.retry;
    this.batchSize = clampBatchSize(options.batchSize);
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  }

  /**
   * Fetch every ticker.
   *
   * @throws AuthUnavailableError after the affected batch and every batch
   *   not yet started have been reported as `auth-unavailable`.
   */
  async fetchAll(tickers: string[], handlers: FetchHandlers): Promise<void> {
    const batches = partition(tickers, this.batchSize);
    const scheduler = new Bottleneck({ maxConcurrent: this.concurrency });
    // Written from inside scheduled jobs.
    const abort: { error: AuthUnavailableError | null } = { error: null };

    logger.info(
      `${tickers.length} tickers → ${batches.length} batch(es) of ≤${this.batchSize}` +
        (this.concurrency > 1 ? `, ${this.concurrency} in flight` : ''),
    );
    handlers.onPlan?.(batches);

    const runBatch = async (batch: TickerBatch): Promise<void> => {
      if (abort.error) {
        this.failBatch(batch, 'auth-unavailable', abort.error.message, handlers);
        return;
      }
      if (handlers.shouldStop?.()) {
        this.failBatch(batch, 'cancelled', 'run stopped before this batch started', handlers);
        return;
      }

      try {
        await this.fetchBatch(batch, handlers);
        handlers.onBatchDone?.(batch);
        logger.info(`Batch ${batch.index + 1}/${batches.length} done`);
      } catch (err) {
        if (!(err instanceof AuthUnavailableError)) throw err;
        abort.error ??= err;
        this.failBatch(batch, 'auth-unavailable', err.message, handlers);
      }
    };

    try {
      await Promise.all(batches.map((batch) => scheduler.schedule(() => runBatch(batch))));
    } finally {
      await scheduler.stop({ dropWaitingJobs: false }).catch((err: unknown) => {
        logger.warn(`Scheduler shutdown: ${errorMessage(err)}`);
      });
    }

    if (abort.error) throw abort.error;
  }

  private async fetchBatch(batch: TickerBatch, handlers: FetchHandlers): Promise<void> {
    const outcome = await this.retry.execute(this.api.quotes(batch.symbols));

    if (!outcome.success) {
      logger.warn(
        `Batch ${batch.index + 1}: ${outcome.kind} after ${outcome.attempts} attempt(s) — ` +
          `${batch.symbols.length} symbols failed`,
      );
      this.failBatch(batch, outcome.kind, outcome.error, handlers);
      return;
    }

    const requested = new Set(batch.symbols);
    const returned = new Set<string>();
    for (const payload of outcome.value) {
      // Unrequested symbols are ignored, as are repeats.
      if (!requested.has(payload.symbol) || returned.has(payload.symbol)) continue;
      returned.add(payload.symbol);
      await handlers.onRecord(payload);
    }

    for (const symbol of batch.symbols) {
      if (!returned.has(symbol)) {
        logger.warn(`${symbol}: absent from quote payload`);
        handlers.onFailure(symbol, 'no-data', `${symbol} missing from quote response`);
      }
    }
  }

  private failBatch(
    batch: TickerBatch,
    kind: FailureKind,
    error: string,
    handlers: FetchHandlers,
  ): void {
    for (const symbol of batch.symbols) {
      handlers.onFailure(symbol, kind, error);
    }
  }
}
