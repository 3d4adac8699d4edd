import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { createConfigurationError } from '@/common/types/errors.js';
import { parseIsoDate } from '@/modules/case-records/index.js';

import { PlotOptionsSchema, type PlotOptions } from './types.js';

import type { ConfigurationError } from './errors.js';

const validator = TypeCompiler.Compile(PlotOptionsSchema);

/**
 * Checks option shape and the combinations that cannot work together.
 * Runs before any input file is opened.
 */
export const validatePlotOptions = (input: unknown): Result<PlotOptions, ConfigurationError> => {
  if (!validator.Check(input)) {
    const errors = Array.from(validator.Errors(input));
    const details = errors.map((error) => `${error.path}: ${error.message}`);
    const paths = new Set(errors.map((error) => error.path.split('/')[1] ?? error.path));
    return err(createConfigurationError(`Invalid options: ${details.join(', ')}`, [...paths]));
  }

  if (input.compare && !input.metrics.includes('confirmed')) {
    return err(
      createConfigurationError('--compare requires confirmed cases to be included', [
        'compare',
        'confirmed',
      ])
    );
  }

  if (input.perCapita && input.splitBySubArea) {
    return err(
      createConfigurationError('--per-capita cannot be combined with --split-by-state', [
        'per-capita',
        'split-by-state',
      ])
    );
  }

  if (input.startDate !== undefined) {
    const startDate = parseIsoDate(input.startDate);
    if (startDate.isErr()) {
      return err(createConfigurationError(startDate.error, ['startdate']));
    }
  }

  return ok(input);
};
