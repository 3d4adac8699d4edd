import { err, ok, type Result } from 'neverthrow';

import { createParseError, type ParseError } from '@/common/types/errors.js';
import { readCsvFile, recordLine, type CsvTable } from '@/infra/csv/index.js';

import { PopulationTable } from '../../core/population.js';

import type { PopulationRepoError, PopulationRepository } from '../../core/ports.js';

// ============================================================================
// Constants
// ============================================================================

const AREA_COLUMN = 'Country';
const VALUE_COLUMN = 'Value';

const POPULATION_RE = /^\d+$/;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Builds a PopulationTable from a `Country, Value` table.
 * Values must be positive integers.
 */
export const parsePopulationTable = (table: CsvTable): Result<PopulationTable, ParseError> => {
  const areaIndex = table.header.indexOf(AREA_COLUMN);
  const valueIndex = table.header.indexOf(VALUE_COLUMN);
  if (areaIndex === -1 || valueIndex === -1) {
    return err(
      createParseError(`Expected '${AREA_COLUMN}' and '${VALUE_COLUMN}' columns`, table.file)
    );
  }

  const entries: [string, string][] = [];

  for (const [rowIndex, row] of table.rows.entries()) {
    const area = (row[areaIndex] ?? '').trim();
    const value = (row[valueIndex] ?? '').trim();

    if (!POPULATION_RE.test(value) || /^0+$/.test(value)) {
      return err(
        createParseError(
          `Invalid population '${value}' for '${area}'`,
          table.file,
          recordLine(rowIndex)
        )
      );
    }

    entries.push([area, value]);
  }

  return ok(PopulationTable.fromEntries(entries));
};

// ============================================================================
// Repository Implementation
// ============================================================================

/**
 * Reads the population table from a CSV file on first use and keeps it.
 */
export const makePopulationRepo = (filePath: string): PopulationRepository => {
  let table: PopulationTable | null = null;

  return {
    load(): Result<PopulationTable, PopulationRepoError> {
      if (table !== null) {
        return ok(table);
      }

      const result = readCsvFile(filePath).andThen(parsePopulationTable);
      if (result.isOk()) {
        table = result.value;
      }
      return result;
    },
  };
};
