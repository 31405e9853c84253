/**
 * supabaseService.ts — Idempotent, chunked upserts of QuoteRecords.
 *
 * Records are buffered and sent `chunkSize` at a time, one HTTP request per
 * chunk.  Rows are keyed by `ticker`, so a re-run (or a resume) updates the
 * existing row instead of inserting a duplicate.
 *
 * Expected table:
 *
 *   create table quote_records (
 *     ticker       text primary key,
 *     fields       jsonb not null,
 *     harvested_at timestamptz not null
 *   );
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { Logger } from '../core/logger';
import type { QuoteRecord, RecordWriter } from '../core/types';

const logger = new Logger('SupabaseService');

export const QUOTE_TABLE = 'quote_records';

export interface SupabaseWriterOptions {
  /** Existing client; otherwise one is built from `url` + `key`. */
  client?: SupabaseClient;
  url?: string;
  key?: string;
  chunkSize?: number;
  now?: () => Date;
}

export class SupabaseRecordWriter implements RecordWriter {
  private readonly client: SupabaseClient;
  private readonly chunkSize: number;
  private readonly now: () => Date;
  private buffer: QuoteRecord[] = [];
  private written = 0;

  constructor(options: SupabaseWriterOptions) {
    if (options.client) {
      this.client = options.client;
    } else {
      if (!options.url || !options.key) {
        throw new Error(
          'SupabaseRecordWriter: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be ' +
            'set in the environment.  See .env.example.',
        );
      }
      // Service-role key: the table is not writable by anonymous users.
      this.client = createClient(options.url, options.key, {
        auth: { persistSession: false, autoRefreshToken: false },
      });
    }
    this.chunkSize = Math.max(1, options.chunkSize ?? 500);
    this.now = options.now ?? (() => new Date());
  }

  async write(record: QuoteRecord): Promise<void> {
    this.buffer.push(record);
    if (this.buffer.length >= this.chunkSize) {
      await this.flush();
    }
  }

  async close(): Promise<void> {
    await this.flush();
    logger.info(`Upserted ${this.written} record(s) into ${QUOTE_TABLE}`);
  }

  /** Send everything buffered. */
  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const chunk = this.buffer;
    this.buffer = [];

    const harvestedAt = this.now().toISOString();
    const rows = chunk.map((r) => ({
      ticker: r.ticker,
      fields: r.fields,
      harvested_at: harvestedAt,
    }));

    const { error } = await this.client
      .from(QUOTE_TABLE)
      .upsert(rows, { onConflict: 'ticker', ignoreDuplicates: false });

    if (error) {
      throw new Error(`SupabaseRecordWriter.flush failed: ${error.message}`);
    }

    this.written += rows.length;
    logger.debug(`Upserted chunk of ${rows.length} record(s)`);
  }
}
