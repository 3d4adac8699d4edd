import { err, ok, type Result } from 'neverthrow';

import { createParseError } from '@/common/types/errors.js';
import { recordLine, type CsvTable } from '@/infra/csv/index.js';

import {
  COUNTRY_COLUMN,
  COUNTRY_COLUMN_ALIASES,
  PROVINCE_COLUMN_ALIASES,
  SNAPSHOT_METRIC_COLUMNS,
  type Metric,
  type Observation,
  type ObservationFilter,
} from '../types.js';

import type { ParseError } from '../errors.js';

const COUNT_RE = /^\d+$/;

const findAnyColumn = (header: readonly string[], names: readonly string[]): number | undefined => {
  for (const name of names) {
    const index = header.indexOf(name);
    if (index !== -1) return index;
  }
  return undefined;
};

/**
 * Reads one daily snapshot table (one row per area/sub-area, one column per
 * metric) dated `date`.
 *
 * The province column and metric columns are optional; empty or missing
 * counts read as zero. Every kept row yields one observation per requested
 * metric.
 */
export const parseSnapshotTable = (
  table: CsvTable,
  date: string,
  metrics: readonly Metric[],
  filter: ObservationFilter
): Result<Observation[], ParseError> => {
  const countryIndex = findAnyColumn(table.header, COUNTRY_COLUMN_ALIASES);
  if (countryIndex === undefined) {
    return err(createParseError(`Missing '${COUNTRY_COLUMN}' column`, table.file));
  }

  const provinceIndex = findAnyColumn(table.header, PROVINCE_COLUMN_ALIASES);
  const metricIndexes = metrics.map((metric) => ({
    metric,
    index: table.header.indexOf(SNAPSHOT_METRIC_COLUMNS[metric]),
  }));

  const observations: Observation[] = [];

  for (const [rowIndex, row] of table.rows.entries()) {
    const area = (row[countryIndex] ?? '').trim();
    if (!filter.areas.has(area)) continue;

    const subArea = provinceIndex === undefined ? '' : (row[provinceIndex] ?? '').trim();

    for (const { metric, index } of metricIndexes) {
      const cell = index === -1 ? '' : (row[index] ?? '').trim();
      if (cell !== '' && !COUNT_RE.test(cell)) {
        return err(
          createParseError(
            `Invalid ${metric} count '${cell}' for ${area}`,
            table.file,
            recordLine(rowIndex)
          )
        );
      }

      observations.push({ area, subArea, date, metric, count: cell === '' ? 0 : Number(cell) });
    }
  }

  return ok(observations);
};
