import fs from 'node:fs';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createParseError,
  createReadError,
  type ParseError,
  type ReadError,
} from '@/common/types/errors.js';

const CsvRowsSchema = Type.Array(Type.Array(Type.String()));

const validator = TypeCompiler.Compile(CsvRowsSchema);

/**
 * A parsed delimited file. `header` holds the trimmed column names,
 * `rows` the data records in file order.
 */
export interface CsvTable {
  file: string;
  header: string[];
  rows: string[][];
}

/**
 * Parses comma-delimited text. Fields are trimmed, blank lines skipped and
 * ragged records kept as they are so callers can report missing cells.
 */
export const parseCsv = (contents: string, file: string): Result<CsvTable, ParseError> => {
  let parsed: unknown;
  try {
    parsed = parse(contents, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(createParseError(`Invalid CSV: ${reason}`, file));
  }

  if (!validator.Check(parsed)) {
    return err(createParseError('Unexpected CSV structure', file));
  }

  const [header, ...rows] = parsed;
  if (header === undefined) {
    return err(createParseError('Missing header row', file));
  }

  return ok({ file, header, rows });
};

export const readCsvFile = (filePath: string): Result<CsvTable, ParseError | ReadError> => {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    return err(createReadError(filePath, error));
  }

  return parseCsv(contents, filePath);
};

/**
 * 1-based line number of a data record, counting the header as line 1.
 * Blank lines skipped by the parser are not counted.
 */
export const recordLine = (rowIndex: number): number => rowIndex + 2;
