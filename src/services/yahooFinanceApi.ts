/**
 * yahooFinanceApi.ts — Request builders for the finance endpoints.
 *
 * Each builder returns an `OutboundRequest`: how to send it with a given
 * session and how to recognise a good payload.  Retrying and classification
 * belong to the RetryController, not here.
 */

import { z } from 'zod';
import { CRUMB_URL } from '../agents/credentialAcquirer';
import { QUOTE_REQUEST_FIELDS } from '../core/quoteFields';
import type {
  HttpRequestOptions,
  HttpTransport,
  OutboundRequest,
  QuotePayload,
  ScreenerProfile,
  Session,
} from '../core/types';
import { lightFetch } from '../middleware/lightFetcher';

const API_BASE = 'https://query1.finance.yahoo.com';

// ─── Response schemas ───────────────────────────────────────

/** Missing, blank or non-string attributes become null rather than failing the page. */
const nullableText = z
  .unknown()
  .transform((v): string | null => (typeof v === 'string' && v.trim() ? v : null));

const screenerRecordSchema = z
  .object({
    ticker: z.string().min(1),
    region: nullableText,
    sector: nullableText,
    industry: nullableText,
  })
  .passthrough();

const screenerResponseSchema = z.object({
  finance: z.object({
    result: z
      .array(
        z.object({
          total: z.number().int().nonnegative(),
          records: z.array(screenerRecordSchema).default([]),
        }),
      )
      .min(1),
  }),
});

const quoteResponseSchema = z.object({
  quoteResponse: z.object({
    result: z.array(z.object({ symbol: z.string().min(1) }).passthrough()),
  }),
});

export interface ScreenerPage {
  total: number;
  profiles: ScreenerProfile[];
}

// ─── Pure parsers ───────────────────────────────────────────

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/** @returns undefined when the body is not a screener payload. */
export function parseScreenerBody(body: string): ScreenerPage | undefined {
  const parsed = screenerResponseSchema.safeParse(parseJson(body));
  if (!parsed.success) return undefined;

  const [result] = parsed.data.finance.result;
  return {
    total: result.total,
    profiles: result.records.map((r) => ({
      ticker: r.ticker,
      region: r.region ? r.region.toLowerCase() : null,
      sector: r.sector,
      industry: r.industry,
    })),
  };
}

/** @returns undefined when the body is not a quote payload. */
export function parseQuoteBody(body: string): QuotePayload[] | undefined {
  const parsed = quoteResponseSchema.safeParse(parseJson(body));
  return parsed.success ? parsed.data.quoteResponse.result : undefined;
}

/**
 * Screener query: equities of one region across every market-cap and
 * day-volume bucket, most traded first.
 */
export function screenerQuery(region: string, offset: number, size: number) {
  return {
    size,
    offset,
    sortType: 'DESC',
    sortField: 'dayvolume',
    includeFields: ['ticker', 'sector', 'industry', 'region'],
    topOperator: 'AND',
    query: {
      operator: 'and',
      operands: [
        { operator: 'or', operands: [{ operator: 'eq', operands: ['region', region] }] },
        {
          operator: 'or',
          operands: [
            { operator: 'btwn', operands: ['intradaymarketcap', 2_000_000_000, 10_000_000_000] },
            { operator: 'btwn', operands: ['intradaymarketcap', 10_000_000_000, 100_000_000_000] },
            { operator: 'gt', operands: ['intradaymarketcap', 100_000_000_000] },
            { operator: 'lt', operands: ['intradaymarketcap', 1_000_000_000] },
            { operator: 'lt', operands: ['intradaymarketcap', 2_000_000_000] },
          ],
        },
        {
          operator: 'or',
          operands: [
            { operator: 'lt', operands: ['dayvolume', 100_000] },
            { operator: 'btwn', operands: ['dayvolume', 100_000, 1_000_000] },
            { operator: 'gt', operands: ['dayvolume', 1_000_000] },
          ],
        },
      ],
    },
    quoteType: 'EQUITY',
  };
}

// ─── Client ─────────────────────────────────────────────────

export interface YahooFinanceApiOptions {
  transport?: HttpTransport;
  timeoutMs?: number;
}

export class YahooFinanceApi {
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;

  constructor(options: YahooFinanceApiOptions = {}) {
    this.transport = options.transport ?? lightFetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  screener(region: string, offset: number, size: number): OutboundRequest<ScreenerPage> {
    return {
      label: `screener ${region}@${offset}`,
      send: (session) => {
        const params = new URLSearchParams({
          formatted: 'true',
          useRecordsResponse: 'true',
          lang: 'en-US',
          region: 'US',
          crumb: session.crumb,
        });
        const base = this.baseOptions(session);
        return this.transport(`${API_BASE}/v1/finance/screener?${params}`, {
          ...base,
          method: 'POST',
          headers: {
            ...base.headers,
            'content-type': 'application/json',
            origin: 'https://finance.yahoo.com',
            referer: `https://finance.yahoo.com/research-hub/screener/equity/?start=${offset}&count=${size}`,
          },
          body: JSON.stringify(screenerQuery(region, offset, size)),
        });
      },
      parse: parseScreenerBody,
    };
  }

  quotes(symbols: string[]): OutboundRequest<QuotePayload[]> {
    return {
      label: `quote ${symbols[0] ?? ''}… (${symbols.length})`,
      send: (session) => {
        const params = new URLSearchParams({
          symbols: symbols.join(','),
          fields: QUOTE_REQUEST_FIELDS.join(','),
          crumb: session.crumb,
          formatted: 'false',
          lang: 'en-US',
          region: 'US',
        });
        return this.transport(`${API_BASE}/v7/finance/quote?${params}`, this.baseOptions(session));
      },
      parse: parseQuoteBody,
    };
  }

  /** A 200 with a non-empty body means the session's cookie is still live. */
  async probeSession(session: Session): Promise<boolean> {
    const response = await this.transport(CRUMB_URL, this.baseOptions(session));
    return response.statusCode === 200 && response.body.trim().length > 0;
  }

  private baseOptions(session: Session): HttpRequestOptions {
    return {
      cookieHeader: session.cookie,
      timeout: this.timeoutMs,
      headers: session.userAgent ? { 'user-agent': session.userAgent } : {},
    };
  }
}
