/**
 * quoteRecord.ts — Build fully-keyed, immutable QuoteRecords.
 *
 * A record always carries every catalogued key; anything the payload does
 * not provide (or provides with the wrong type) is an explicit null.
 * Epoch timestamps are converted to UTC ISO strings with Luxon.
 */

import { DateTime } from 'luxon';
import { QUOTE_FIELDS } from './quoteFields';
import { countryForRegion } from './regions';
import type {
  FieldType,
  FieldValue,
  QuotePayload,
  QuoteRecord,
  ScreenerProfile,
} from './types';

/** Coerce one raw payload value to its declared field type. */
export function coerceFieldValue(type: FieldType, raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return null;

  switch (type) {
    case 'number':
      return typeof raw === 'number' && Number.isFinite(raw) ? raw : null;
    case 'string':
      return typeof raw === 'string' ? raw : null;
    case 'boolean':
      return typeof raw === 'boolean' ? raw : null;
    case 'timestamp':
      return typeof raw === 'number' && Number.isFinite(raw)
        ? DateTime.fromSeconds(raw, { zone: 'utc' }).toISO()
        : null;
    case 'timestampMs':
      return typeof raw === 'number' && Number.isFinite(raw)
        ? DateTime.fromMillis(raw, { zone: 'utc' }).toISO()
        : null;
    case 'json':
      return typeof raw === 'object' ? JSON.stringify(raw) : null;
  }
}

/** Every catalogued key, set to null. */
export function emptyFields(): Record<string, FieldValue> {
  const fields: Record<string, FieldValue> = {};
  for (const field of QUOTE_FIELDS) {
    fields[field.key] = null;
  }
  return fields;
}

/**
 * Assemble a record from the quote payload and (optionally) the screener
 * profile discovered for the same symbol.
 */
export function buildQuoteRecord(
  payload: QuotePayload,
  profile?: ScreenerProfile,
): QuoteRecord {
  const fields = emptyFields();

  for (const field of QUOTE_FIELDS) {
    if (field.source === 'quote') {
      fields[field.key] = coerceFieldValue(field.type, payload[field.key]);
    }
  }

  if (profile) {
    fields.country = countryForRegion(profile.region);
    fields.sector = profile.sector;
    fields.industry = profile.industry;
  }

  return Object.freeze({
    ticker: payload.symbol,
    fields: Object.freeze(fields),
  });
}
