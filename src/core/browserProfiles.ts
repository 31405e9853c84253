/**
 * browserProfiles.ts — Self-consistent desktop browser identities.
 *
 * The API binds a cookie to the client that received it, and flags clients
 * whose User-Agent, platform and Accept-Language disagree.  Each profile is a
 * combination that exists in the wild; one is picked per acquisition and
 * reused for every request made with the resulting session.
 */

export interface BrowserProfile {
  userAgent: string;
  /** navigator.platform value. */
  platform: string;
  /** Viewport [width, height]. */
  viewport: [number, number];
  acceptLanguage: string;
}

export const BROWSER_PROFILES: readonly BrowserProfile[] = [
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
    platform: 'Win32',
    viewport: [1920, 1080],
    acceptLanguage: 'en-US,en;q=0.9',
  },
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    platform: 'Win32',
    viewport: [1536, 864],
    acceptLanguage: 'en-GB,en;q=0.9',
  },
  {
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
    platform: 'MacIntel',
    viewport: [1440, 900],
    acceptLanguage: 'en-US,en;q=0.9',
  },
  {
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    platform: 'MacIntel',
    viewport: [1680, 1050],
    acceptLanguage: 'en-US,en;q=0.9,fr;q=0.8',
  },
  {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
    platform: 'Win32',
    viewport: [2560, 1440],
    acceptLanguage: 'en-CA,en;q=0.9',
  },
];

export function pickRandomProfile(random: () => number = Math.random): BrowserProfile {
  const index = Math.min(
    BROWSER_PROFILES.length - 1,
    Math.floor(random() * BROWSER_PROFILES.length),
  );
  return BROWSER_PROFILES[index];
}
