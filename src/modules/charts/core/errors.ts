import type { ConfigurationError } from '@/common/types/errors.js';
import type { CaseRecordsError } from '@/modules/case-records/index.js';
import type { PopulationLookupError, PopulationRepoError } from '@/modules/normalization/index.js';
import type { NoDataError } from '@/modules/series/index.js';

export type { ConfigurationError } from '@/common/types/errors.js';

export type ChartError =
  | ConfigurationError
  | CaseRecordsError
  | NoDataError
  | PopulationLookupError
  | PopulationRepoError;
