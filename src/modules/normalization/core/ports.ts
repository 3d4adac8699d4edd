import type { PopulationTable } from './population.js';
import type { ParseError, ReadError } from '@/common/types/errors.js';
import type { Result } from 'neverthrow';

export type PopulationRepoError = ParseError | ReadError;

/**
 * Source of the population reference table.
 */
export interface PopulationRepository {
  /**
   * Loads the whole table. Called at most once per run.
   */
  load(): Result<PopulationTable, PopulationRepoError>;
}
