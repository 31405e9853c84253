/**
 * In-process stand-ins for the finance API and the credential acquirer.
 */

import Bottleneck from 'bottleneck';
import type { CredentialAcquirer } from '../agents/credentialAcquirer';
import { SessionStore } from '../agents/sessionStore';
import { RetryController } from '../middleware/retryController';
import { YahooFinanceApi } from '../services/yahooFinanceApi';
import type {
  Credentials,
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
  QuoteRecord,
  RecordWriter,
} from '../core/types';

export function httpResponse(
  statusCode: number,
  body: unknown = '',
  headers: HttpResponse['headers'] = {},
): HttpResponse {
  return {
    statusCode,
    body: typeof body === 'string' ? body : JSON.stringify(body),
    headers,
  };
}

// ─── Acquirer ───────────────────────────────────────────────

export interface CountingAcquirer extends CredentialAcquirer {
  calls: number;
}

/** Issues crumb-1, crumb-2, … ; `fail(n)` makes call n reject. */
export function countingAcquirer(fail: (call: number) => boolean = () => false): CountingAcquirer {
  const acquirer: CountingAcquirer = {
    name: 'test',
    calls: 0,
    async acquire(): Promise<Credentials> {
      acquirer.calls += 1;
      if (fail(acquirer.calls)) {
        throw new Error(`acquisition ${acquirer.calls} refused`);
      }
      return { cookie: `A1=cookie-${acquirer.calls}`, crumb: `crumb-${acquirer.calls}` };
    },
  };
  return acquirer;
}

// ─── Finance API ────────────────────────────────────────────

export interface FakeListing {
  ticker: string;
  sector?: string;
  industry?: string;
}

export interface FakeYahooOptions {
  /** Listings per region code, in screener order. */
  universe: Record<string, FakeListing[]>;
  /** Advertised total for the n-th screener call of a region (0-based). */
  total?: (region: string, call: number) => number;
  /** Status to answer the n-th screener call of a region with, instead of 200. */
  screenerStatus?: (region: string, call: number) => number | undefined;
  /** Status to answer the n-th quote call with, instead of 200. */
  quoteStatus?: (call: number) => number | undefined;
  /** Symbols the quote endpoint silently omits. */
  missing?: string[];
  /** Symbols the quote endpoint adds without being asked. */
  extra?: string[];
}

export interface FakeYahoo {
  transport: HttpTransport;
  screenerCalls: { region: string; offset: number; size: number; crumb: string | null }[];
  quoteCalls: { symbols: string[]; crumb: string | null; cookie?: string }[];
}

const REGION_IN_BODY = /\["region","([a-z]{2})"\]/;

export function fakeYahoo(options: FakeYahooOptions): FakeYahoo {
  const fake: FakeYahoo = {
    screenerCalls: [],
    quoteCalls: [],
    transport: async (url: string, request?: HttpRequestOptions) => {
      const parsed = new URL(url);

      if (parsed.pathname === '/v1/finance/screener') {
        const body = request?.body ?? '';
        const region = REGION_IN_BODY.exec(body)?.[1] ?? '';
        const query: { offset: number; size: number } = JSON.parse(body);
        const call = fake.screenerCalls.filter((c) => c.region === region).length;
        fake.screenerCalls.push({
          region,
          offset: query.offset,
          size: query.size,
          crumb: parsed.searchParams.get('crumb'),
        });

        const status = options.screenerStatus?.(region, call);
        if (status !== undefined) return httpResponse(status, 'blocked');

        const listings = options.universe[region] ?? [];
        const total = options.total?.(region, call) ?? listings.length;
        const records = listings.slice(query.offset, query.offset + query.size).map((l) => ({
          ticker: l.ticker,
          region,
          sector: l.sector ?? 'Technology',
          industry: l.industry ?? 'Software',
        }));
        return httpResponse(200, { finance: { result: [{ total, records }], error: null } });
      }

      if (parsed.pathname === '/v7/finance/quote') {
        const symbols = (parsed.searchParams.get('symbols') ?? '').split(',');
        const call = fake.quoteCalls.length;
        fake.quoteCalls.push({
          symbols,
          crumb: parsed.searchParams.get('crumb'),
          cookie: request?.cookieHeader,
        });

        const status = options.quoteStatus?.(call);
        if (status !== undefined) {
          return httpResponse(status, status === 401 ? 'Invalid Crumb' : 'error');
        }

        const result = [...symbols, ...(options.extra ?? [])]
          .filter((s) => !(options.missing ?? []).includes(s))
          .map((symbol) => ({
            symbol,
            shortName: `${symbol} Inc`,
            regularMarketPrice: 12.5,
            regularMarketTime: 1_700_000_000,
          }));
        return httpResponse(200, { quoteResponse: { result, error: null } });
      }

      return httpResponse(404, 'not found');
    },
  };
  return fake;
}

// ─── Writer ─────────────────────────────────────────────────

export class MemoryWriter implements RecordWriter {
  records: QuoteRecord[] = [];
  closed = 0;

  async write(record: QuoteRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

export function listings(...tickers: string[]): FakeListing[] {
  return tickers.map((ticker) => ({ ticker }));
}

// ─── Wiring ─────────────────────────────────────────────────

/** Real store, retry controller and API client over a fake transport; no sleeping. */
export function apiStack(
  transport: HttpTransport,
  options: { maxAttempts?: number; fail?: (call: number) => boolean } = {},
) {
  const acquirer = countingAcquirer(options.fail);
  const store = new SessionStore({ acquirer });
  const retry = new RetryController({
    store,
    maxAttempts: options.maxAttempts ?? 2,
    baseDelayMs: 0,
    maxDelayMs: 0,
    jitterMs: 0,
    limiter: new Bottleneck(),
    sleep: async () => undefined,
  });
  const api = new YahooFinanceApi({ transport });
  return { acquirer, store, retry, api };
}
