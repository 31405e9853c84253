import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CsvRecordWriter, csvCell, csvRow, recordToCsvRow } from '../csvRecordWriter';
import { QUOTE_FIELDS, csvHeader } from '../../core/quoteFields';
import { buildQuoteRecord } from '../../core/quoteRecord';

describe('csvCell', () => {
  it.each([
    [null, ''],
    [12.5, '12.5'],
    [true, 'true'],
    ['plain', 'plain'],
    ['Acme, Inc.', '"Acme, Inc."'],
    ['say "hi"', '"say ""hi"""'],
    ['two\nlines', '"two\nlines"'],
  ] as const)('%j → %j', (value, expected) => {
    expect(csvCell(value)).toBe(expected);
  });
});

describe('csvRow', () => {
  it('joins cells and ends with CRLF', () => {
    expect(csvRow(['a', null, 3])).toBe('a,,3\r\n');
  });
});

describe('CsvRecordWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'csv-writer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the header then one row per record', async () => {
    const path = join(dir, 'out.csv');
    const writer = new CsvRecordWriter(path);

    await writer.write(
      buildQuoteRecord(
        { symbol: 'AAA', shortName: 'Acme, Inc.' },
        { ticker: 'AAA', region: 'us', sector: 'Technology', industry: 'Software' },
      ),
    );
    await writer.close();

    const lines = (await readFile(path, 'utf-8')).split('\r\n');
    expect(lines).toHaveLength(3);
    expect(lines[0].startsWith('Ticker,Country,Sector,Industry,Short Name,Long Name,')).toBe(true);
    expect(lines[0]).toBe(csvHeader().join(','));
    expect(lines[1]).toBe(
      [
        'AAA',
        'United States',
        'Technology',
        'Software',
        '"Acme, Inc."',
        ...Array<string>(QUOTE_FIELDS.length - 4).fill(''),
      ].join(','),
    );
    expect(lines[2]).toBe('');
  });

  it('leaves a header-only file when nothing was written', async () => {
    const path = join(dir, 'empty.csv');
    await new CsvRecordWriter(path).close();

    expect(await readFile(path, 'utf-8')).toBe(csvRow(csvHeader()));
  });

  it('writes the header once under concurrent first writes', async () => {
    const path = join(dir, 'concurrent.csv');
    const writer = new CsvRecordWriter(path);

    await Promise.all(['AAA', 'BBB'].map((symbol) => writer.write(buildQuoteRecord({ symbol }))));
    await writer.close();

    const lines = (await readFile(path, 'utf-8')).split('\r\n').filter(Boolean);
    expect(lines.filter((l) => l.startsWith('Ticker,'))).toHaveLength(1);
    expect(lines.slice(1).map((l) => l.split(',')[0]).sort()).toEqual(['AAA', 'BBB']);
  });

  it('leaves an existing file untouched when nothing was written', async () => {
    const path = join(dir, 'tickers.csv');
    const previous = csvRow(csvHeader()) + 'AAPL\r\n';
    await writeFile(path, previous);

    await new CsvRecordWriter(path).close();

    expect(await readFile(path, 'utf-8')).toBe(previous);
  });

  it('replaces the previous file only when closed', async () => {
    const path = join(dir, 'tickers.csv');
    const previous = csvRow(csvHeader()) + 'AAPL\r\n';
    await writeFile(path, previous);
    const record = buildQuoteRecord({ symbol: 'BBB' });

    const writer = new CsvRecordWriter(path);
    await writer.write(record);
    expect(await readFile(path, 'utf-8')).toBe(previous);

    await writer.close();
    expect(await readFile(path, 'utf-8')).toBe(csvRow(csvHeader()) + recordToCsvRow(record));
    expect(await readdir(dir)).toEqual(['tickers.csv']);
  });

  it('appends below an existing header without repeating it', async () => {
    const path = join(dir, 'tickers.csv');
    const previous = csvRow(csvHeader()) + 'AAPL\r\n';
    await writeFile(path, previous);
    const record = buildQuoteRecord({ symbol: 'BBB' });

    const writer = new CsvRecordWriter(path, { append: true });
    await writer.write(record);
    await writer.close();

    expect(await readFile(path, 'utf-8')).toBe(previous + recordToCsvRow(record));
  });

  it('starts a new file with a header in append mode', async () => {
    const path = join(dir, 'tickers.csv');
    const record = buildQuoteRecord({ symbol: 'BBB' });

    const writer = new CsvRecordWriter(path, { append: true });
    await writer.write(record);
    await writer.close();

    expect(await readFile(path, 'utf-8')).toBe(csvRow(csvHeader()) + recordToCsvRow(record));
  });

  it('refuses to append to a file with a different header', async () => {
    const path = join(dir, 'tickers.csv');
    await writeFile(path, 'Symbol,Price\r\nAAPL,1\r\n');

    const writer = new CsvRecordWriter(path, { append: true });

    await expect(writer.write(buildQuoteRecord({ symbol: 'BBB' }))).rejects.toThrow(
      'existing header does not match',
    );
    expect(await readFile(path, 'utf-8')).toBe('Symbol,Price\r\nAAPL,1\r\n');
  });
});
