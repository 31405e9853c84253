/**
 * harvestCoordinator.ts — Drives one harvest run end to end.
 *
 *   idle → acquiring-session → discovering → fetching → finalizing → done
 *
 * 1. ACQUIRE  → SessionStore hands out a valid cookie + crumb
 * 2. DISCOVER → TickerDiscovery pages the screener (skipped on resume)
 * 3. FETCH    → BatchQuoteFetcher pulls full quotes, records stream to the writer
 * 4. FINALIZE → writer closed, summary built and logged
 *
 * Per-batch failures are recorded and the run carries on.  Only
 * AuthUnavailableError aborts; every ticker not yet accounted for is then
 * marked `auth-unavailable` so a resume run can pick it up.
 */

import type { BatchQuoteFetcher } from './agents/batchQuoteFetcher';
import type { SessionStore } from './agents/sessionStore';
import type { TickerDiscovery } from './agents/tickerDiscovery';
import { AuthUnavailableError, errorMessage } from './core/errors';
import { Logger } from './core/logger';
import { buildQuoteRecord } from './core/quoteRecord';
import type {
  FailureKind,
  HarvestJob,
  HarvestStage,
  HarvestSummary,
  ProfileAttributes,
  RecordWriter,
  ScreenerProfile,
} from './core/types';

const logger = new Logger('HarvestCoordinator');

export interface HarvestCoordinatorOptions {
  store: Pick<SessionStore, 'getValidSession'>;
  discovery: Pick<TickerDiscovery, 'discover'>;
  fetcher: Pick<BatchQuoteFetcher, 'fetchAll'>;
  writer: RecordWriter;
  /** Regions discovered when `run()` is given none. */
  regions: string[];
  now?: () => Date;
}

export interface HarvestInput {
  regions?: string[];
  /** Resume: harvest exactly these symbols, without discovery. */
  tickers?: string[];
  /** Resume: screener profiles recorded by the previous run. */
  profiles?: ReadonlyMap<string, ScreenerProfile>;
}

type WorkingStage = Exclude<HarvestStage, 'finalizing' | 'done'>;

export class HarvestCoordinator {
  private readonly options: HarvestCoordinatorOptions;
  private readonly now: () => Date;
  private currentStage: HarvestStage = 'idle';
  /** Last working stage entered, reported in the summary. */
  private stageReached: WorkingStage = 'idle';
  private stopRequested = false;
  private readonly job: HarvestJob = { totalTickers: 0, fetched: new Set(), failed: new Map() };

  constructor(options: HarvestCoordinatorOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  stage(): HarvestStage {
    return this.currentStage;
  }

  /** Cooperative stop: batches not yet started are reported `cancelled`. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    logger.warn(`Stop requested during ${this.currentStage} — finishing in-flight batches`);
  }

  /**
   * Run the whole pipeline once.
   *
   * @throws Writer failures (and other unexpected errors); harvest failures
   *   are reported in the summary instead.
   */
  async run(input: HarvestInput = {}): Promise<HarvestSummary> {
    if (this.currentStage !== 'idle') {
      throw new Error('HarvestCoordinator.run() can only be called once');
    }

    const startedAt = this.now();
    const regions = input.tickers ? [] : input.regions ?? this.options.regions;
    const discovery: HarvestSummary['discovery'] = {
      regions,
      pages: 0,
      uniqueTickers: 0,
      errors: [],
    };
    const batches = { total: 0, completed: 0 };
    let universe: string[] = [];
    let profiles = new Map<string, ScreenerProfile>(input.profiles ?? []);
    let abortReason: string | undefined;

    const enter = (stage: WorkingStage): void => {
      this.stageReached = stage;
      this.currentStage = stage;
      logger.debug(`Stage → ${stage}`);
    };

    try {
      // ── 1. Session ───────────────────────────────────────
      enter('acquiring-session');
      const session = await this.options.store.getValidSession();
      logger.info(`Session #${session.id} ready (${session.source})`);

      // ── 2. Discovery ─────────────────────────────────────
      if (input.tickers) {
        universe = [...new Set(input.tickers)];
        logger.info(`Resuming with ${universe.length} ticker(s); discovery skipped`);
      } else {
        enter('discovering');
        // Progress is tracked per page so an abort still reports it.
        const result = await this.options.discovery.discover(regions, (page) => {
          discovery.pages += 1;
          for (const profile of page.profiles) {
            if (profiles.has(profile.ticker)) continue;
            profiles.set(profile.ticker, { ...profile, region: profile.region ?? page.region });
            universe.push(profile.ticker);
          }
          discovery.uniqueTickers = universe.length;
        });
        universe = result.tickers;
        profiles = result.profiles;
        discovery.pages = result.pages;
        discovery.uniqueTickers = result.tickers.length;
        discovery.errors = result.errors;
        logger.info(
          `Discovered ${result.tickers.length} ticker(s) across ${regions.length} region(s) ` +
            `in ${result.pages} page(s)`,
        );
      }
      this.job.totalTickers = universe.length;

      // ── 3. Quotes ────────────────────────────────────────
      enter('fetching');
      await this.options.fetcher.fetchAll(universe, {
        onPlan: (plan) => {
          batches.total = plan.length;
        },
        onRecord: async (payload) => {
          if (this.isAccounted(payload.symbol)) return;
          const record = buildQuoteRecord(payload, profiles.get(payload.symbol));
          await this.options.writer.write(record);
          this.job.fetched.add(record.ticker);
        },
        onFailure: (symbol, kind) => this.recordFailure(symbol, kind),
        onBatchDone: () => {
          batches.completed += 1;
        },
        shouldStop: () => this.stopRequested,
      });
    } catch (err) {
      if (!(err instanceof AuthUnavailableError)) {
        await this.closeWriterAfterError();
        this.currentStage = 'done';
        throw err;
      }
      abortReason = err.message;
      logger.error(`Run aborted during ${this.stageReached}: ${err.message}`);
      this.job.totalTickers = universe.length;
      for (const symbol of universe) {
        this.recordFailure(symbol, 'auth-unavailable');
      }
    }

    // ── 4. Finalize ──────────────────────────────────────
    this.currentStage = 'finalizing';
    await this.options.writer.close();

    const finishedAt = this.now();
    const status: HarvestSummary['status'] = abortReason
      ? 'aborted'
      : this.stopRequested
        ? 'stopped'
        : 'completed';

    const summary: HarvestSummary = {
      status,
      stageReached: this.stageReached,
      ...(abortReason ? { abortReason } : {}),
      totalTickers: this.job.totalTickers,
      fetchedCount: this.job.fetched.size,
      failedCount: this.job.failed.size,
      failuresByKind: countByKind(this.job.failed),
      failed: Object.fromEntries(this.job.failed),
      failedProfiles: profilesOf(this.job.failed.keys(), profiles),
      discovery,
      batches,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };

    this.logSummary(summary);
    this.currentStage = 'done';
    return summary;
  }

  // ── Internals ──────────────────────────────────────────

  private isAccounted(symbol: string): boolean {
    return this.job.fetched.has(symbol) || this.job.failed.has(symbol);
  }

  /** First outcome wins; a symbol is never counted twice. */
  private recordFailure(symbol: string, kind: FailureKind): void {
    if (this.isAccounted(symbol)) return;
    this.job.failed.set(symbol, kind);
  }

  private async closeWriterAfterError(): Promise<void> {
    try {
      await this.options.writer.close();
    } catch (closeErr) {
      logger.error(`Writer close failed after error: ${errorMessage(closeErr)}`);
    }
  }

  private logSummary(summary: HarvestSummary): void {
    const breakdown = Object.entries(summary.failuresByKind)
      .map(([kind, count]) => `${kind}=${count}`)
      .join(', ');

    const line =
      `Harvest ${summary.status}: ${summary.fetchedCount} fetched, ` +
      `${summary.failedCount} failed of ${summary.totalTickers}` +
      (breakdown ? ` (${breakdown})` : '') +
      ` — ${summary.batches.completed}/${summary.batches.total} batches, ` +
      `${summary.discovery.pages} discovery page(s), ${(summary.durationMs / 1000).toFixed(1)}s`;

    if (summary.status === 'aborted') {
      logger.error(`${line}; stopped at ${summary.stageReached}: ${summary.abortReason ?? ''}`);
    } else if (summary.failedCount > 0 || summary.status === 'stopped') {
      logger.warn(line);
    } else {
      logger.info(line);
    }
  }
}

function profilesOf(
  symbols: Iterable<string>,
  profiles: ReadonlyMap<string, ScreenerProfile>,
): Record<string, ProfileAttributes> {
  const out: Record<string, ProfileAttributes> = {};
  for (const symbol of symbols) {
    const profile = profiles.get(symbol);
    if (profile) {
      out[symbol] = { region: profile.region, sector: profile.sector, industry: profile.industry };
    }
  }
  return out;
}

function countByKind(failed: Map<string, FailureKind>): Partial<Record<FailureKind, number>> {
  const counts: Partial<Record<FailureKind, number>> = {};
  for (const kind of failed.values()) {
    counts[kind] = (counts[kind] ?? 0) + 1;
  }
  return counts;
}
