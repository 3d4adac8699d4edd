import { err, ok, type Result } from 'neverthrow';

import { alignBundles } from '@/modules/alignment/index.js';
import {
  loadSnapshotDays,
  loadWideObservations,
  type CaseRecordsRepo,
  type ObservationFilter,
} from '@/modules/case-records/index.js';
import { normalizeBundles, type PopulationRepository } from '@/modules/normalization/index.js';
import { aggregateSnapshots, aggregateWide, type AreaBundles } from '@/modules/series/index.js';

import { validatePlotOptions } from '../options.js';
import { buildAlignedChart, buildCalendarChart } from './build-chart-data.js';

import type { ChartError } from '../errors.js';
import type { ChartData, PlotOptions } from '../types.js';
import type { Logger } from 'pino';

export interface BuildChartDeps {
  caseRecordsRepo: CaseRecordsRepo;
  populationRepo: PopulationRepository;
  logger: Logger;
}

const collectBundles = (
  deps: BuildChartDeps,
  options: PlotOptions
): Result<AreaBundles, ChartError> => {
  const filter: ObservationFilter = {
    areas: new Set(options.areas),
    startDate: options.startDate,
  };
  const aggregateOptions = { splitBySubArea: options.splitBySubArea };

  if (options.source === 'snapshot') {
    const days = loadSnapshotDays(deps, { metrics: options.metrics, filter });
    if (days.isErr()) return err(days.error);

    deps.logger.debug({ days: days.value.length }, 'Loaded daily snapshots');
    return aggregateSnapshots(days.value, options.areas, {
      ...aggregateOptions,
      metrics: options.metrics,
    });
  }

  const observations = loadWideObservations(deps, { metrics: options.metrics, filter });
  if (observations.isErr()) return err(observations.error);

  deps.logger.debug({ metrics: [...observations.value.keys()] }, 'Loaded time-series tables');
  return aggregateWide(observations.value, options.areas, aggregateOptions);
};

/**
 * Runs the whole pipeline: validate options, load, aggregate, optionally
 * normalize per capita, optionally align on the confirmed-case milestone,
 * and describe the chart.
 *
 * Alignment shifts are always computed from raw counts, so per-capita
 * series line up on the same case-count milestone as their totals.
 */
export const buildChart = (
  deps: BuildChartDeps,
  input: PlotOptions
): Result<ChartData, ChartError> => {
  const validated = validatePlotOptions(input);
  if (validated.isErr()) {
    return err(validated.error);
  }
  const options = validated.value;

  const bundles = collectBundles(deps, options);
  if (bundles.isErr()) {
    return err(bundles.error);
  }

  const raw = bundles.value;
  deps.logger.info({ areas: [...raw.keys()], source: options.source }, 'Aggregated case series');

  let series = raw;
  if (options.perCapita) {
    const populations = deps.populationRepo.load();
    if (populations.isErr()) {
      return err(populations.error);
    }

    const normalized = normalizeBundles(raw, populations.value);
    if (normalized.isErr()) {
      return err(normalized.error);
    }
    series = normalized.value;
  }

  if (options.compare) {
    const alignment = alignBundles(series, raw);
    deps.logger.info(
      {
        reference: alignment.reference,
        shifts: Object.fromEntries(alignment.areas.map((area) => [area.label, area.shift])),
      },
      'Aligned areas on first confirmed-case milestone'
    );
    return ok(buildAlignedChart(alignment, options));
  }

  return ok(buildCalendarChart(series, options));
};
