/**
 * agents/index.ts — Barrel export for the stateful harvesting layer.
 *
 * `middleware/` holds request-level concerns (transport, classification,
 * retry).  `agents/` holds the modules that own state across a run:
 *   • Session Store        — the cookie + crumb pair and its transitions
 *   • Credential acquirers — static, light, browser and fallback chains
 *   • Ticker Discovery     — screener pagination
 *   • Batch Quote Fetcher  — batched quote requests
 */

export { SessionStore, validateCredentials } from './sessionStore';
export type { SessionStoreOptions } from './sessionStore';

export {
  StaticCredentialAcquirer,
  LightCredentialAcquirer,
  FallbackCredentialAcquirer,
  COOKIE_URL,
  CRUMB_URL,
} from './credentialAcquirer';
export type { CredentialAcquirer } from './credentialAcquirer';
export { BrowserCredentialAcquirer } from './browserCredentialAcquirer';
export { createAcquirer } from './acquirerFactory';

export { TickerDiscovery, DiscoveryPageError } from './tickerDiscovery';
export { BatchQuoteFetcher, partition } from './batchQuoteFetcher';
export type { FetchHandlers } from './batchQuoteFetcher';
