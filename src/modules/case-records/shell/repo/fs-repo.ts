import fs from 'node:fs';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { createReadError } from '@/common/types/errors.js';
import { readCsvFile } from '@/infra/csv/index.js';

import { parseSnapshotFileName } from '../../core/dates.js';
import { WIDE_TABLE_FILES, type SnapshotFileEntry } from '../../core/types.js';

import type { CaseRecordsError } from '../../core/errors.js';
import type { CaseRecordsRepo } from '../../core/ports.js';

export interface CaseRecordsRepoOptions {
  /** Directory holding the wide time-series tables */
  timeSeriesDir: string;
  /** Directory holding the MM-DD-YYYY.csv daily reports */
  dailyReportsDir: string;
}

const listSnapshotEntries = (
  dailyReportsDir: string
): Result<SnapshotFileEntry[], CaseRecordsError> => {
  let names: string[];
  try {
    names = fs.readdirSync(dailyReportsDir);
  } catch (error) {
    return err(createReadError(dailyReportsDir, error));
  }

  const entries: SnapshotFileEntry[] = [];
  for (const fileName of names) {
    const date = parseSnapshotFileName(fileName);
    if (date === undefined) continue;
    entries.push({ date, fileName, absolutePath: path.join(dailyReportsDir, fileName) });
  }

  return ok(entries.sort((a, b) => a.date.localeCompare(b.date)));
};

export const createCaseRecordsRepo = (options: CaseRecordsRepoOptions): CaseRecordsRepo => {
  let snapshotEntries: SnapshotFileEntry[] | null = null;

  return {
    readWideTable(metric) {
      return readCsvFile(path.join(options.timeSeriesDir, WIDE_TABLE_FILES[metric]));
    },

    listSnapshotFiles() {
      if (snapshotEntries !== null) {
        return ok(snapshotEntries);
      }

      const result = listSnapshotEntries(options.dailyReportsDir);
      if (result.isOk()) {
        snapshotEntries = result.value;
      }
      return result;
    },

    readSnapshotTable(entry) {
      return readCsvFile(entry.absolutePath);
    },
  };
};
