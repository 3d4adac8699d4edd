import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { areaLabel, AreaBundleBuilder } from '../bundle-builder.js';
import { createNoDataError, type NoDataError } from '../errors.js';

import type { AggregateOptions, AreaBundles } from '../types.js';
import type { Metric, SnapshotDay } from '@/modules/case-records/index.js';

type MetricValues = Map<Metric, Decimal>;

export interface AggregateSnapshotsOptions extends AggregateOptions {
  metrics: readonly Metric[];
}

const sumDay = (day: SnapshotDay, splitBySubArea: boolean): Map<string, MetricValues> => {
  const sums = new Map<string, MetricValues>();

  for (const observation of day.observations) {
    const label = areaLabel(observation, splitBySubArea);
    let values = sums.get(label);
    if (values === undefined) {
      values = new Map();
      sums.set(label, values);
    }
    const running = values.get(observation.metric) ?? new Decimal(0);
    values.set(observation.metric, running.plus(observation.count));
  }

  return sums;
};

/**
 * Builds bundles from daily snapshots, which must be ascending by date.
 *
 * A label is tracked once it appears in any snapshot. Leading days on which
 * no tracked label appears are skipped. From the first day with data, every
 * tracked label gets one value per day and metric: that day's sum when
 * present, else the last known value, else zero.
 */
export const aggregateSnapshots = (
  days: readonly SnapshotDay[],
  requestedAreas: Iterable<string>,
  options: AggregateSnapshotsOptions
): Result<AreaBundles, NoDataError> => {
  const daySums = days.map((day) => ({ date: day.date, sums: sumDay(day, options.splitBySubArea) }));

  const tracked = new Set<string>();
  for (const { sums } of daySums) {
    for (const label of sums.keys()) tracked.add(label);
  }

  if (tracked.size === 0) {
    return err(createNoDataError(requestedAreas));
  }

  const builder = new AreaBundleBuilder();
  const lastKnown = new Map<string, MetricValues>();
  let started = false;

  for (const { date, sums } of daySums) {
    if (!started && sums.size === 0) continue;
    started = true;

    for (const label of tracked) {
      const present = sums.get(label);
      const previous = lastKnown.get(label);
      const current: MetricValues = new Map();

      for (const metric of options.metrics) {
        const value = present?.get(metric) ?? previous?.get(metric) ?? new Decimal(0);
        current.set(metric, value);
        builder.add(label, metric, date, value);
      }

      lastKnown.set(label, current);
    }
  }

  return ok(builder.build());
};
