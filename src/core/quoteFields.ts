/**
 * quoteFields.ts — The fixed field catalogue every QuoteRecord carries.
 *
 * The catalogue lives in quoteFields.json (key, CSV label, value type and
 * source).  Order in the file is the CSV column order.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { QuoteField } from './types';

const fieldSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  type: z.enum(['number', 'string', 'boolean', 'timestamp', 'timestampMs', 'json']),
  source: z.enum(['quote', 'screener']).default('quote'),
});

function loadCatalogue(): readonly QuoteField[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./quoteFields.json', import.meta.url), 'utf-8'),
  );
  const fields = z.array(fieldSchema).parse(raw);

  const keys = new Set<string>();
  for (const field of fields) {
    if (keys.has(field.key)) {
      throw new Error(`quoteFields.json: duplicate field key "${field.key}"`);
    }
    keys.add(field.key);
  }
  return Object.freeze(fields);
}

export const QUOTE_FIELDS: readonly QuoteField[] = loadCatalogue();

/** Keys requested from the quote endpoint (screener-sourced fields excluded). */
export const QUOTE_REQUEST_FIELDS: readonly string[] = QUOTE_FIELDS.filter(
  (f) => f.source === 'quote',
).map((f) => f.key);

/** CSV header: the ticker column followed by every field label. */
export function csvHeader(): string[] {
  return ['Ticker', ...QUOTE_FIELDS.map((f) => f.label)];
}
