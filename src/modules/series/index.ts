// Builder
export { AreaBundleBuilder, areaLabel } from './core/bundle-builder.js';

// Use cases
export { aggregateWide } from './core/usecases/aggregate-wide.js';
export {
  aggregateSnapshots,
  type AggregateSnapshotsOptions,
} from './core/usecases/aggregate-snapshots.js';

// Types
export type {
  AggregateOptions,
  AreaBundle,
  AreaBundles,
  Series,
  SeriesPoint,
} from './core/types.js';

// Errors
export { createNoDataError, type NoDataError } from './core/errors.js';
