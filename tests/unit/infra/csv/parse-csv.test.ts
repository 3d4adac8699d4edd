import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseCsv, readCsvFile, recordLine } from '@/infra/csv/index.js';

describe('parseCsv', () => {
  it('splits header from rows and trims fields', () => {
    const result = parseCsv('Country, Value\n Testland , 200000\n', 'population.csv');

    expect(result.isOk()).toBe(true);
    const table = result._unsafeUnwrap();
    expect(table.file).toBe('population.csv');
    expect(table.header).toEqual(['Country', 'Value']);
    expect(table.rows).toEqual([['Testland', '200000']]);
  });

  it('keeps ragged records and skips blank lines', () => {
    const table = parseCsv('a,b,c\n1,2\n\n4,5,6\n', 'ragged.csv')._unsafeUnwrap();

    expect(table.rows).toEqual([
      ['1', '2'],
      ['4', '5', '6'],
    ]);
  });

  it('strips a byte order mark from the first header', () => {
    const table = parseCsv('\uFEFFCountry,Value\nTestland,1\n', 'bom.csv')._unsafeUnwrap();
    expect(table.header[0]).toBe('Country');
  });

  it('fails on empty input', () => {
    const result = parseCsv('', 'empty.csv');

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'ParseError',
      message: 'empty.csv: Missing header row',
      file: 'empty.csv',
    });
  });

  it('numbers data records from line 2', () => {
    expect(recordLine(0)).toBe(2);
    expect(recordLine(3)).toBe(5);
  });
});

describe('readCsvFile', () => {
  it('reads and parses a file from disk', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'csv-'));
    const file = path.join(dir, 'table.csv');
    await writeFile(file, 'a,b\n1,2\n', 'utf8');

    const table = readCsvFile(file)._unsafeUnwrap();
    expect(table.header).toEqual(['a', 'b']);
    expect(table.rows).toEqual([['1', '2']]);
  });

  it('returns a ReadError for a missing file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'csv-'));
    const file = path.join(dir, 'missing.csv');

    const result = readCsvFile(file);

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('ReadError');
    expect(error.message.startsWith(`Failed to read ${file}:`)).toBe(true);
  });
});
