/**
 * regions.ts — Screener region codes and the country names they map to.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const regionsSchema = z.record(z.string().length(2), z.string().min(1));

const REGION_COUNTRIES: Readonly<Record<string, string>> = regionsSchema.parse(
  JSON.parse(readFileSync(new URL('./regions.json', import.meta.url), 'utf-8')),
);

/** All region codes the screener accepts, sorted. */
export function availableRegions(): string[] {
  return Object.keys(REGION_COUNTRIES).sort();
}

export function isKnownRegion(code: string): boolean {
  return Object.hasOwn(REGION_COUNTRIES, code.toLowerCase());
}

/** "gb" → "United Kingdom"; unknown or missing codes → "Unknown". */
export function countryForRegion(code: string | null | undefined): string {
  if (!code) return 'Unknown';
  return REGION_COUNTRIES[code.toLowerCase()] ?? 'Unknown';
}
