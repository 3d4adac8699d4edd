import type { CaseRecordsError } from './errors.js';
import type { Metric, SnapshotFileEntry } from './types.js';
import type { CsvTable } from '@/infra/csv/index.js';
import type { Result } from 'neverthrow';

export interface CaseRecordsRepo {
  /**
   * Read the wide time-series table holding one metric.
   */
  readWideTable(metric: Metric): Result<CsvTable, CaseRecordsError>;

  /**
   * List daily snapshot files, ascending by date.
   * Files whose name is not a MM-DD-YYYY.csv date are ignored.
   */
  listSnapshotFiles(): Result<SnapshotFileEntry[], CaseRecordsError>;

  /**
   * Read one daily snapshot table.
   */
  readSnapshotTable(entry: SnapshotFileEntry): Result<CsvTable, CaseRecordsError>;
}
