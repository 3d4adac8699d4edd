/**
 * Test fakes and mocks
 */

import { err, ok, type Result } from 'neverthrow';
import pinoLib, { type Logger } from 'pino';

import { createReadError } from '@/common/types/errors.js';
import { parseCsv } from '@/infra/csv/index.js';
import { parseSnapshotFileName } from '@/modules/case-records/index.js';
import { PopulationTable } from '@/modules/normalization/index.js';

import type { CaseRecordsRepo, Metric, SnapshotFileEntry } from '@/modules/case-records/index.js';
import type { PopulationRepoError, PopulationRepository } from '@/modules/normalization/index.js';

export interface FakeCaseRecordsRepoOptions {
  /** CSV text of each wide table */
  wide?: Partial<Record<Metric, string>>;
  /** CSV text keyed by snapshot file name, e.g. '03-01-2020.csv' */
  snapshots?: Record<string, string>;
}

/**
 * In-memory case records repository. Missing wide tables read as a
 * ReadError, like a missing file on disk.
 */
export const makeFakeCaseRecordsRepo = (
  options: FakeCaseRecordsRepoOptions = {}
): CaseRecordsRepo & { reads: string[] } => {
  const reads: string[] = [];

  return {
    reads,

    readWideTable(metric) {
      reads.push(metric);
      const contents = options.wide?.[metric];
      if (contents === undefined) {
        return err(createReadError(`${metric}.csv`, new Error('not found')));
      }
      return parseCsv(contents, `${metric}.csv`);
    },

    listSnapshotFiles() {
      const entries: SnapshotFileEntry[] = [];
      for (const fileName of Object.keys(options.snapshots ?? {})) {
        const date = parseSnapshotFileName(fileName);
        if (date === undefined) continue;
        entries.push({ date, fileName, absolutePath: `/fake/${fileName}` });
      }
      return ok(entries.sort((a, b) => a.date.localeCompare(b.date)));
    },

    readSnapshotTable(entry) {
      reads.push(entry.fileName);
      return parseCsv(options.snapshots?.[entry.fileName] ?? '', entry.fileName);
    },
  };
};

/**
 * Population repository over fixed entries, counting loads.
 */
export const makeFakePopulationRepo = (
  entries: Record<string, number>
): PopulationRepository & { loads: () => number } => {
  let loads = 0;
  return {
    loads: () => loads,
    load(): Result<PopulationTable, PopulationRepoError> {
      loads++;
      return ok(PopulationTable.fromEntries(Object.entries(entries)));
    },
  };
};

/**
 * Logger that discards everything.
 */
export const makeTestLogger = (): Logger => pinoLib({ level: 'silent' });
