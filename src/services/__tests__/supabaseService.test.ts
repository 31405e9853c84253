import { createClient } from '@supabase/supabase-js';
import { describe, expect, it } from 'vitest';
import { QUOTE_TABLE, SupabaseRecordWriter } from '../supabaseService';
import { buildQuoteRecord } from '../../core/quoteRecord';

interface PostedChunk {
  url: URL;
  rows: { ticker: string; harvested_at: string }[];
}

/** A PostgREST stand-in answering every request with `status`. */
function fakeRest(status = 201, body: unknown = null) {
  const posted: PostedChunk[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    posted.push({
      url: new URL(input instanceof Request ? input.url : input.toString()),
      rows: JSON.parse(String(init?.body)),
    });
    return new Response(body === null ? null : JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json' },
    });
  };
  const client = createClient('http://localhost:54321', 'test-key', {
    global: { fetch: fetchImpl },
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return { client, posted };
}

const record = (symbol: string) => buildQuoteRecord({ symbol, regularMarketPrice: 1 });

describe('SupabaseRecordWriter', () => {
  it('upserts in chunks keyed by ticker', async () => {
    const { client, posted } = fakeRest();
    const writer = new SupabaseRecordWriter({
      client,
      chunkSize: 2,
      now: () => new Date('2026-01-05T21:00:00Z'),
    });

    for (const symbol of ['AAA', 'BBB', 'CCC', 'DDD', 'EEE']) {
      await writer.write(record(symbol));
    }
    expect(posted).toHaveLength(2);
    await writer.close();

    expect(posted.map((p) => p.rows.map((r) => r.ticker))).toEqual([
      ['AAA', 'BBB'],
      ['CCC', 'DDD'],
      ['EEE'],
    ]);
    expect(posted[0].url.pathname).toBe(`/rest/v1/${QUOTE_TABLE}`);
    expect(posted[0].url.searchParams.get('on_conflict')).toBe('ticker');
    expect(posted[2].rows[0].harvested_at).toBe('2026-01-05T21:00:00.000Z');
  });

  it('sends nothing on close when the buffer is empty', async () => {
    const { client, posted } = fakeRest();
    await new SupabaseRecordWriter({ client }).close();

    expect(posted).toEqual([]);
  });

  it('throws with the server message when an upsert fails', async () => {
    const { client } = fakeRest(400, { message: 'boom' });
    const writer = new SupabaseRecordWriter({ client, chunkSize: 10 });

    await writer.write(record('AAA'));
    await expect(writer.close()).rejects.toThrow('SupabaseRecordWriter.flush failed: boom');
  });

  it('builds its own client from a url and key on Node 20', async () => {
    const writer = new SupabaseRecordWriter({
      url: 'http://localhost:54321',
      key: 'test-key',
    });

    await expect(writer.close()).resolves.toBeUndefined();
  });

  it('requires a url and key when no client is given', () => {
    expect(() => new SupabaseRecordWriter({ url: 'http://localhost:54321' })).toThrow(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set',
    );
  });
});
