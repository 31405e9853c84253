/**
 * acquirerFactory.ts — Turn CREDENTIAL_STRATEGY into an acquirer chain.
 */

import { BrowserManager } from '../core/browserManager';
import { ConfigError } from '../core/errors';
import type { HarvestConfig } from '../core/types';
import { BrowserCredentialAcquirer } from './browserCredentialAcquirer';
import {
  FallbackCredentialAcquirer,
  LightCredentialAcquirer,
  StaticCredentialAcquirer,
  type CredentialAcquirer,
} from './credentialAcquirer';

export interface AcquirerSetup {
  acquirer: CredentialAcquirer;
  /** Present when the chain may launch Chrome; the caller closes it. */
  browser?: BrowserManager;
}

/**
 * static → only the configured pair
 * light → light
 * browser → browser
 * auto → [static if configured] → light → browser
 */
export function createAcquirer(config: HarvestConfig): AcquirerSetup {
  const staticPair =
    config.staticCookie && config.staticCrumb
      ? new StaticCredentialAcquirer(config.staticCookie, config.staticCrumb)
      : null;
  const light = () => new LightCredentialAcquirer({ timeoutMs: config.requestTimeoutMs });
  const browser = () =>
    new BrowserManager({ executablePath: config.chromeExecutablePath });

  switch (config.credentialStrategy) {
    case 'static': {
      if (!staticPair) {
        throw new ConfigError('CREDENTIAL_STRATEGY=static requires YAHOO_COOKIE and YAHOO_CRUMB');
      }
      return { acquirer: staticPair };
    }
    case 'light':
      return { acquirer: light() };
    case 'browser': {
      const manager = browser();
      return { acquirer: new BrowserCredentialAcquirer(manager), browser: manager };
    }
    case 'auto': {
      const manager = browser();
      const chain: CredentialAcquirer[] = [
        ...(staticPair ? [staticPair] : []),
        light(),
        new BrowserCredentialAcquirer(manager),
      ];
      return { acquirer: new FallbackCredentialAcquirer(chain), browser: manager };
    }
  }
}
