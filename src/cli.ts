/**
 * cli.ts — Command-line entry point.
 *
 *   tsx src/cli.ts [--regions us,gb] [--csv out.csv] [--summary harvest-summary.json]
 *                  [--resume previous-summary.json] [--list-regions]
 *
 * Configuration comes from the environment (see .env.example); flags
 * override the matching variables.  Exit code 1 means the run aborted.
 */

import { readFile, writeFile } from 'fs/promises';
import { pathToFileURL } from 'url';
import { parseArgs } from 'util';
import { z } from 'zod';
import { BatchQuoteFetcher, SessionStore, TickerDiscovery, createAcquirer } from './agents';
import { errorMessage } from './core/errors';
import { Logger } from './core/logger';
import { availableRegions, countryForRegion } from './core/regions';
import {
  loadHarvestConfig,
  parseRegions,
  type HarvestConfig,
  type HarvestSummary,
  type RecordWriter,
  type ScreenerProfile,
} from './core/types';
import { HarvestCoordinator } from './harvestCoordinator';
import { RetryController, clearRateLimiters } from './middleware';
import { CsvRecordWriter } from './services/csvRecordWriter';
import { MultiRecordWriter } from './services/recordWriter';
import { SupabaseRecordWriter } from './services/supabaseService';
import { YahooFinanceApi } from './services/yahooFinanceApi';

const logger = new Logger('CLI');

export interface CliOptions {
  regions?: string[];
  csv?: string;
  summary: string;
  resume?: string;
  listRegions: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      regions: { type: 'string' },
      csv: { type: 'string' },
      summary: { type: 'string' },
      resume: { type: 'string' },
      'list-regions': { type: 'boolean' },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    regions: values.regions !== undefined ? parseRegions(values.regions) : undefined,
    csv: values.csv,
    summary: values.summary ?? 'harvest-summary.json',
    resume: values.resume,
    listRegions: values['list-regions'] ?? false,
  };
}

const previousSummarySchema = z.object({
  failed: z.record(z.string(), z.string()),
  failedProfiles: z
    .record(
      z.string(),
      z.object({
        region: z.string().nullable(),
        sector: z.string().nullable(),
        industry: z.string().nullable(),
      }),
    )
    .default({}),
});

export interface ResumeInput {
  /** Symbols the previous run failed on, in the order they were recorded. */
  tickers: string[];
  /** Their screener profiles, where the previous run had one. */
  profiles: Map<string, ScreenerProfile>;
}

export async function loadResumeInput(path: string): Promise<ResumeInput> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  const previous = previousSummarySchema.parse(raw);
  const tickers = Object.keys(previous.failed);

  const profiles = new Map<string, ScreenerProfile>();
  for (const ticker of tickers) {
    const profile = previous.failedProfiles[ticker];
    if (profile) profiles.set(ticker, { ticker, ...profile });
  }
  return { tickers, profiles };
}

/** On a resume run the CSV is appended to, not replaced. */
function buildWriter(config: HarvestConfig, resuming: boolean): RecordWriter {
  const writers: RecordWriter[] = [];
  if (config.outputCsv) {
    writers.push(new CsvRecordWriter(config.outputCsv, { append: resuming }));
  }
  if (config.supabaseUrl && config.supabaseKey) {
    writers.push(new SupabaseRecordWriter({ url: config.supabaseUrl, key: config.supabaseKey }));
  }
  return writers.length === 1 ? writers[0] : new MultiRecordWriter(writers);
}

export async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);

  if (options.listRegions) {
    for (const code of availableRegions()) {
      console.log(`${code}  ${countryForRegion(code)}`);
    }
    return 0;
  }

  const config = loadHarvestConfig();
  if (options.regions) config.regions = options.regions;
  if (options.csv) config.outputCsv = options.csv;

  const api = new YahooFinanceApi({ timeoutMs: config.requestTimeoutMs });
  const { acquirer, browser } = createAcquirer(config);
  const store = new SessionStore({
    acquirer,
    acquisitionTimeoutMs: config.acquisitionTimeoutMs,
    cacheFile: config.sessionCacheFile,
    ttlHours: config.sessionTtlHours,
    probe: (session) => api.probeSession(session),
  });
  const retry = new RetryController({
    store,
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.baseDelayMs,
    maxDelayMs: config.maxDelayMs,
    jitterMs: config.jitterMs,
    rateLimitMs: config.rateLimitMs,
  });

  const coordinator = new HarvestCoordinator({
    store,
    discovery: new TickerDiscovery({ api, retry, pageSize: config.pageSize }),
    fetcher: new BatchQuoteFetcher({
      api,
      retry,
      batchSize: config.batchSize,
      concurrency: config.concurrency,
    }),
    writer: buildWriter(config, options.resume !== undefined),
    regions: config.regions,
  });

  const onSigint = (): void => coordinator.stop();
  process.on('SIGINT', onSigint);

  let summary: HarvestSummary;
  try {
    const resume = options.resume ? await loadResumeInput(options.resume) : undefined;
    summary = await coordinator.run({
      regions: config.regions,
      tickers: resume?.tickers,
      profiles: resume?.profiles,
    });
  } finally {
    process.off('SIGINT', onSigint);
    await browser?.close();
    await clearRateLimiters();
  }

  await writeFile(options.summary, JSON.stringify(summary, null, 2));
  logger.info(`Summary written to ${options.summary}`);

  return summary.status === 'aborted' ? 1 : 0;
}

const isDirectRun =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error(`Harvest failed: ${errorMessage(err)}`, err);
      process.exitCode = 1;
    });
}
