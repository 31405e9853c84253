/**
 * recordWriter.ts — Fan a record stream out to several writers.
 */

import type { QuoteRecord, RecordWriter } from '../core/types';

export class MultiRecordWriter implements RecordWriter {
  constructor(private readonly writers: RecordWriter[]) {}

  async write(record: QuoteRecord): Promise<void> {
    await Promise.all(this.writers.map((w) => w.write(record)));
  }

  /** Closes every writer, then rethrows the first close failure. */
  async close(): Promise<void> {
    const results = await Promise.allSettled(this.writers.map((w) => w.close()));
    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
  }
}
