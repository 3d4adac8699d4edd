import { err, ok, type Result } from 'neverthrow';

import { areaLabel, AreaBundleBuilder } from '../bundle-builder.js';
import { createNoDataError, type NoDataError } from '../errors.js';

import type { AggregateOptions, AreaBundles } from '../types.js';
import type { Metric, Observation } from '@/modules/case-records/index.js';

/**
 * Builds bundles from wide-table observations, one observation list per
 * metric file.
 *
 * Without sub-area split, every row of an area is summed date by date into
 * one series. With it, each (area, sub-area) row keeps its own series.
 */
export const aggregateWide = (
  observationsByMetric: ReadonlyMap<Metric, readonly Observation[]>,
  requestedAreas: Iterable<string>,
  options: AggregateOptions
): Result<AreaBundles, NoDataError> => {
  const builder = new AreaBundleBuilder();

  for (const [metric, observations] of observationsByMetric) {
    for (const observation of observations) {
      builder.add(
        areaLabel(observation, options.splitBySubArea),
        metric,
        observation.date,
        observation.count
      );
    }
  }

  if (builder.size === 0) {
    return err(createNoDataError(requestedAreas));
  }

  return ok(builder.build());
};
