/**
 * types.ts — Shared type definitions and configuration for the harvester.
 *
 * Every layer (acquirers, retry controller, paginator, fetcher, writers)
 * agrees on the shapes declared here.
 */

import { ConfigError } from './errors';
import { isKnownRegion } from './regions';

// ─── Session ───────────────────────────────────────────────

export type SessionState = 'valid' | 'expired' | 'unknown';

/** Raw output of a credential acquirer, before validation. */
export interface Credentials {
  /** Cookie header value, e.g. "A1=…; A3=…; GUC=…". */
  cookie: string;
  /** Anti-forgery token that must accompany the cookie. */
  crumb: string;
  /** User-Agent the cookie was issued to, when the acquirer knows it. */
  userAgent?: string;
  /** Acquirer that actually produced the pair (set by composite acquirers). */
  source?: string;
}

/**
 * A token pair owned by the SessionStore.
 *
 * Instances handed out are frozen; a state change replaces the stored object
 * rather than mutating the one a caller is holding.
 */
export interface Session extends Credentials {
  /** Monotonic id within a process — used to ignore stale invalidations. */
  readonly id: number;
  /** Epoch milliseconds at which the pair was observed. */
  readonly acquiredAt: number;
  /** Which acquirer produced it ("static", "light", "browser", "cache"). */
  readonly source: string;
  readonly state: SessionState;
}

// ─── HTTP ──────────────────────────────────────────────────

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  cookieHeader?: string;
  body?: string;
  timeout?: number;
  /** Defaults to true. */
  followRedirect?: boolean;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
  headers: Record<string, string | string[] | undefined>;
}

/** Anything that can perform an HTTP exchange — `lightFetch` in production. */
export type HttpTransport = (
  url: string,
  options?: HttpRequestOptions,
) => Promise<HttpResponse>;

// ─── Request classification ────────────────────────────────

export type FailureKind =
  | 'auth-expired'       // 401/403 with an auth body, still failing after one re-acquisition
  | 'rate-limited'       // 429
  | 'bot-blocked'        // 403 without auth body, or malformed/empty 2xx body
  | 'transient-network'  // timeouts, resets, 5xx
  | 'fatal-client'       // any other 4xx — never retried
  | 'no-data'            // ticker absent from an otherwise successful payload
  | 'auth-unavailable'   // run aborted before this ticker could be requested
  | 'cancelled';         // run stopped before this ticker's batch started

export type ResponseClass = 'success' | Exclude<FailureKind, 'no-data' | 'auth-unavailable' | 'cancelled'>;

/** One outbound call the retry controller can replay with a fresh session. */
export interface OutboundRequest<T> {
  /** Short description for logs, e.g. "screener us@300". */
  label: string;
  send(session: Session): Promise<HttpResponse>;
  /** Return undefined when the body is not the payload we expected. */
  parse(body: string): T | undefined;
}

export type RequestOutcome<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; kind: FailureKind; error: string; attempts: number };

// ─── Discovery ─────────────────────────────────────────────

/** Identity attributes the screener returns alongside each symbol. */
export interface ScreenerProfile {
  ticker: string;
  region: string | null;
  sector: string | null;
  industry: string | null;
}

/** Profile attributes carried over to a resume run, keyed by ticker elsewhere. */
export type ProfileAttributes = Omit<ScreenerProfile, 'ticker'>;

export interface DiscoveryPage {
  region: string;
  offset: number;
  pageSize: number;
  totalAdvertised: number;
  tickersReturned: string[];
  profiles: ScreenerProfile[];
}

export interface DiscoveryError {
  region: string;
  offset: number;
  kind: FailureKind;
  error: string;
}

export interface DiscoveryResult {
  /** Deduplicated symbols in first-seen order. */
  tickers: string[];
  profiles: Map<string, ScreenerProfile>;
  pages: number;
  errors: DiscoveryError[];
}

// ─── Quotes ────────────────────────────────────────────────

export type FieldType =
  | 'number'
  | 'string'
  | 'boolean'
  | 'timestamp'    // epoch seconds → ISO string
  | 'timestampMs'  // epoch milliseconds → ISO string
  | 'json';        // arrays / objects → JSON string

export type FieldValue = number | string | boolean | null;

export interface QuoteField {
  key: string;
  label: string;
  type: FieldType;
  /** "screener" fields are filled from discovery, everything else from the quote payload. */
  source: 'quote' | 'screener';
}

export interface QuoteRecord {
  readonly ticker: string;
  readonly fields: Readonly<Record<string, FieldValue>>;
}

/** One element of `quoteResponse.result`. */
export type QuotePayload = { symbol: string } & Record<string, unknown>;

export interface TickerBatch {
  index: number;
  symbols: string[];
}

// ─── Harvest job ───────────────────────────────────────────

export type HarvestStage =
  | 'idle'
  | 'acquiring-session'
  | 'discovering'
  | 'fetching'
  | 'finalizing'
  | 'done';

export interface HarvestJob {
  totalTickers: number;
  fetched: Set<string>;
  failed: Map<string, FailureKind>;
}

export interface HarvestSummary {
  status: 'completed' | 'stopped' | 'aborted';
  /** Last working stage reached before finalizing. */
  stageReached: HarvestStage;
  abortReason?: string;
  totalTickers: number;
  fetchedCount: number;
  failedCount: number;
  failuresByKind: Partial<Record<FailureKind, number>>;
  failed: Record<string, FailureKind>;
  /** Screener attributes of the failed symbols, so a resume can merge them. */
  failedProfiles: Record<string, ProfileAttributes>;
  discovery: {
    regions: string[];
    pages: number;
    uniqueTickers: number;
    errors: DiscoveryError[];
  };
  batches: { total: number; completed: number };
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

/** Downstream sink for finished records (CSV, Supabase, …). */
export interface RecordWriter {
  write(record: QuoteRecord): Promise<void>;
  close(): Promise<void>;
}

// ─── Configuration ─────────────────────────────────────────

export type CredentialStrategy = 'static' | 'light' | 'browser' | 'auto';

/**
 * Central configuration for a harvest run.
 * Read from environment variables with defaults.
 */
export interface HarvestConfig {
  // Discovery
  regions: string[];
  pageSize: number;

  // Quotes
  batchSize: number;
  concurrency: number;

  // Retry / pacing
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  rateLimitMs: number;
  requestTimeoutMs: number;

  // Credentials
  credentialStrategy: CredentialStrategy;
  acquisitionTimeoutMs: number;
  sessionTtlHours: number;
  sessionCacheFile?: string;
  staticCookie?: string;
  staticCrumb?: string;
  chromeExecutablePath?: string;

  // Output
  outputCsv?: string;
  supabaseUrl?: string;
  supabaseKey?: string;
}

/** Screener refuses pages larger than this. */
export const SCREENER_MAX_PAGE_SIZE = 250;
/** Quote endpoint symbols-per-request ceiling. */
export const QUOTE_MAX_SYMBOLS = 500;

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max} (got "${raw}")`);
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function parseStrategy(raw: string | undefined): CredentialStrategy {
  const value = (raw ?? 'auto').trim().toLowerCase();
  if (value === 'static' || value === 'light' || value === 'browser' || value === 'auto') {
    return value;
  }
  throw new ConfigError(`CREDENTIAL_STRATEGY must be static, light, browser or auto (got "${raw}")`);
}

export function parseRegions(raw: string): string[] {
  const regions = [
    ...new Set(
      raw
        .split(',')
        .map((r) => r.trim().toLowerCase())
        .filter(Boolean),
    ),
  ];
  if (regions.length === 0) {
    throw new ConfigError('At least one region is required');
  }
  const unknown = regions.filter((r) => !isKnownRegion(r));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown region code(s): ${unknown.join(', ')}`);
  }
  return regions;
}

/** Build a HarvestConfig from the environment with defaults. */
export function loadHarvestConfig(env: Env = process.env): HarvestConfig {
  const config: HarvestConfig = {
    regions: parseRegions(env.HARVEST_REGIONS ?? 'us'),
    pageSize: intFromEnv(env, 'SCREENER_PAGE_SIZE', 100, 1, SCREENER_MAX_PAGE_SIZE),
    batchSize: intFromEnv(env, 'QUOTE_BATCH_SIZE', 250, 1, QUOTE_MAX_SYMBOLS),
    concurrency: intFromEnv(env, 'HARVEST_CONCURRENCY', 1, 1, 16),
    maxAttempts: intFromEnv(env, 'RETRY_MAX_ATTEMPTS', 4, 1, 20),
    baseDelayMs: intFromEnv(env, 'RETRY_BASE_DELAY_MS', 1_000, 0, 600_000),
    maxDelayMs: intFromEnv(env, 'RETRY_MAX_DELAY_MS', 30_000, 0, 3_600_000),
    jitterMs: intFromEnv(env, 'RETRY_JITTER_MS', 500, 0, 60_000),
    rateLimitMs: intFromEnv(env, 'RATE_LIMIT_MS', 250, 0, 60_000),
    requestTimeoutMs: intFromEnv(env, 'REQUEST_TIMEOUT_MS', 30_000, 1_000, 300_000),
    credentialStrategy: parseStrategy(env.CREDENTIAL_STRATEGY),
    acquisitionTimeoutMs: intFromEnv(env, 'ACQUISITION_TIMEOUT_MS', 60_000, 1_000, 600_000),
    sessionTtlHours: intFromEnv(env, 'SESSION_TTL_HOURS', 12, 0, 24 * 30),
    sessionCacheFile: optional(env, 'SESSION_CACHE_FILE') ?? '.session.json',
    staticCookie: optional(env, 'YAHOO_COOKIE'),
    staticCrumb: optional(env, 'YAHOO_CRUMB'),
    chromeExecutablePath: optional(env, 'CHROME_EXECUTABLE_PATH'),
    outputCsv: optional(env, 'OUTPUT_CSV') ?? 'tickers.csv',
    supabaseUrl: optional(env, 'SUPABASE_URL'),
    supabaseKey: optional(env, 'SUPABASE_SERVICE_ROLE_KEY'),
  };

  if (config.maxDelayMs < config.baseDelayMs) {
    throw new ConfigError('RETRY_MAX_DELAY_MS must be >= RETRY_BASE_DELAY_MS');
  }
  if (config.credentialStrategy === 'static' && (!config.staticCookie || !config.staticCrumb)) {
    throw new ConfigError('CREDENTIAL_STRATEGY=static requires YAHOO_COOKIE and YAHOO_CRUMB');
  }
  if (Boolean(config.supabaseUrl) !== Boolean(config.supabaseKey)) {
    throw new ConfigError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together');
  }

  return config;
}
