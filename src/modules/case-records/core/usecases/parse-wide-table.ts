import { err, ok, type Result } from 'neverthrow';

import { createParseError } from '@/common/types/errors.js';
import { recordLine, type CsvTable } from '@/infra/csv/index.js';

import { parseWideDateHeader } from '../dates.js';
import {
  COUNTRY_COLUMN,
  LAT_COLUMN,
  LONG_COLUMN,
  PROVINCE_COLUMN,
  type Metric,
  type Observation,
  type ObservationFilter,
} from '../types.js';

import type { ParseError } from '../errors.js';

const COUNT_RE = /^\d+$/;

const FIXED_COLUMNS = new Set([PROVINCE_COLUMN, COUNTRY_COLUMN, LAT_COLUMN, LONG_COLUMN]);

interface DateColumn {
  index: number;
  date: string;
}

const findColumn = (table: CsvTable, name: string): Result<number, ParseError> => {
  const index = table.header.indexOf(name);
  if (index === -1) {
    return err(createParseError(`Missing '${name}' column`, table.file));
  }
  return ok(index);
};

const parseDateColumns = (table: CsvTable): Result<DateColumn[], ParseError> => {
  const columns: DateColumn[] = [];

  for (const [index, name] of table.header.entries()) {
    if (FIXED_COLUMNS.has(name)) continue;

    const date = parseWideDateHeader(name);
    if (date.isErr()) {
      return err(createParseError(date.error, table.file, 1));
    }
    columns.push({ index, date: date.value });
  }

  return ok(columns);
};

/**
 * Reads a wide time-series table (one row per area/sub-area, one column per
 * date) into observations of a single metric.
 *
 * Rows for areas outside `filter.areas` are discarded before their cells are
 * read. Cells dated before `filter.startDate` are skipped; any other cell must
 * hold a non-negative integer.
 */
export const parseWideTable = (
  table: CsvTable,
  metric: Metric,
  filter: ObservationFilter
): Result<Observation[], ParseError> => {
  const provinceIndex = findColumn(table, PROVINCE_COLUMN);
  if (provinceIndex.isErr()) return err(provinceIndex.error);

  const countryIndex = findColumn(table, COUNTRY_COLUMN);
  if (countryIndex.isErr()) return err(countryIndex.error);

  for (const name of [LAT_COLUMN, LONG_COLUMN]) {
    const index = findColumn(table, name);
    if (index.isErr()) return err(index.error);
  }

  const dateColumns = parseDateColumns(table);
  if (dateColumns.isErr()) return err(dateColumns.error);

  const startDate = filter.startDate;
  const columns =
    startDate === undefined
      ? dateColumns.value
      : dateColumns.value.filter((column) => column.date >= startDate);

  const observations: Observation[] = [];

  for (const [rowIndex, row] of table.rows.entries()) {
    const area = (row[countryIndex.value] ?? '').trim();
    if (!filter.areas.has(area)) continue;

    const subArea = (row[provinceIndex.value] ?? '').trim();

    for (const column of columns) {
      const cell = row[column.index]?.trim();
      if (cell === undefined || !COUNT_RE.test(cell)) {
        return err(
          createParseError(
            `Invalid count '${cell ?? ''}' for ${area} on ${column.date}`,
            table.file,
            recordLine(rowIndex)
          )
        );
      }

      observations.push({ area, subArea, date: column.date, metric, count: Number(cell) });
    }
  }

  return ok(observations);
};
