/**
 * csvRecordWriter.ts — Stream QuoteRecords to a CSV file.
 *
 * One header row (`Ticker` + field labels in catalogue order), then one row
 * per record as it arrives.  Cells are quoted per RFC 4180; null is an empty
 * cell.
 */

import { open, rename, type FileHandle } from 'fs/promises';
import { Logger } from '../core/logger';
import { QUOTE_FIELDS, csvHeader } from '../core/quoteFields';
import type { FieldValue, QuoteRecord, RecordWriter } from '../core/types';

const logger = new Logger('CsvRecordWriter');

export function csvCell(value: FieldValue): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvRow(cells: FieldValue[]): string {
  return cells.map(csvCell).join(',') + '\r\n';
}

export function recordToCsvRow(record: QuoteRecord): string {
  return csvRow([record.ticker, ...QUOTE_FIELDS.map((f) => record.fields[f.key] ?? null)]);
}

export interface CsvRecordWriterOptions {
  /** Add rows to an existing file instead of replacing it (resume runs). */
  append?: boolean;
}

/**
 * A fresh run writes to `<path>.partial` and renames it over `path` on
 * close, so the previous harvest stays in place until rows replace it.  An
 * append run checks the existing header before adding to the file.  Either
 * way, a run that wrote nothing leaves an existing file untouched.
 */
export class CsvRecordWriter implements RecordWriter {
  private handle: FileHandle | null = null;
  private opening: Promise<FileHandle> | null = null;
  private rows = 0;
  private readonly append: boolean;
  private readonly partialPath: string;

  constructor(
    private readonly path: string,
    options: CsvRecordWriterOptions = {},
  ) {
    this.append = options.append ?? false;
    this.partialPath = `${path}.partial`;
  }

  async write(record: QuoteRecord): Promise<void> {
    const handle = await this.ensureOpen();
    await handle.write(recordToCsvRow(record));
    this.rows += 1;
  }

  async close(): Promise<void> {
    const handle = this.handle ?? (this.opening ? await this.opening : null);
    this.handle = null;
    this.opening = null;

    if (!handle) {
      await writeHeaderOnlyIfAbsent(this.path);
      logger.info(`No rows written to ${this.path}`);
      return;
    }

    await handle.close();
    if (!this.append) {
      await rename(this.partialPath, this.path);
    }
    logger.info(`${this.append ? 'Appended' : 'Wrote'} ${this.rows} row(s) to ${this.path}`);
  }

  private ensureOpen(): Promise<FileHandle> {
    if (this.handle) return Promise.resolve(this.handle);
    // Concurrent first writes share one open + header.
    this.opening ??= (this.append ? this.openForAppend() : this.openPartial()).then((handle) => {
      this.handle = handle;
      return handle;
    });
    return this.opening;
  }

  private async openPartial(): Promise<FileHandle> {
    const handle = await open(this.partialPath, 'w');
    await handle.write(csvRow(csvHeader()));
    return handle;
  }

  private async openForAppend(): Promise<FileHandle> {
    const header = csvRow(csvHeader());
    const existing = await readHeaderLine(this.path);
    if (existing !== null && existing !== header) {
      throw new Error(`${this.path}: existing header does not match the quote field catalogue`);
    }

    const handle = await open(this.path, 'a');
    if (existing === null) {
      await handle.write(header);
    }
    return handle;
  }
}

// ─── Helpers ────────────────────────────────────────────────

const HEADER_READ_BYTES = 64 * 1024;

/** First line of `path` including its CRLF; null when the file is absent or empty. */
async function readHeaderLine(path: string): Promise<string | null> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return null;
    throw err;
  }

  try {
    const { buffer, bytesRead } = await handle.read(
      Buffer.alloc(HEADER_READ_BYTES),
      0,
      HEADER_READ_BYTES,
      0,
    );
    if (bytesRead === 0) return null;
    const text = buffer.toString('utf-8', 0, bytesRead);
    const end = text.indexOf('\r\n');
    return end === -1 ? text : text.slice(0, end + 2);
  } finally {
    await handle.close();
  }
}

async function writeHeaderOnlyIfAbsent(path: string): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'wx');
  } catch (err) {
    if (hasErrorCode(err, 'EEXIST')) return;
    throw err;
  }
  try {
    await handle.write(csvRow(csvHeader()));
  } finally {
    await handle.close();
  }
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
