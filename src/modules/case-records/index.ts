// Repository
export { createCaseRecordsRepo, type CaseRecordsRepoOptions } from './shell/repo/fs-repo.js';
export type { CaseRecordsRepo } from './core/ports.js';

// Use cases
export { parseWideTable } from './core/usecases/parse-wide-table.js';
export { parseSnapshotTable } from './core/usecases/parse-snapshot-table.js';
export {
  loadWideObservations,
  loadSnapshotDays,
  type LoadObservationsDeps,
  type LoadObservationsInput,
} from './core/usecases/load-observations.js';
export { listAreas } from './core/usecases/list-areas.js';

// Dates
export { parseIsoDate, parseSnapshotFileName, parseWideDateHeader } from './core/dates.js';

// Types
export { METRICS, isMetric, WIDE_TABLE_FILES } from './core/types.js';
export type {
  Metric,
  Observation,
  ObservationFilter,
  SnapshotDay,
  SnapshotFileEntry,
} from './core/types.js';

// Errors
export type { CaseRecordsError } from './core/errors.js';
