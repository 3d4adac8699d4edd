import { err, ok, type Result } from 'neverthrow';

import { parseSnapshotTable } from './parse-snapshot-table.js';
import { parseWideTable } from './parse-wide-table.js';

import type { CaseRecordsError } from '../errors.js';
import type { CaseRecordsRepo } from '../ports.js';
import type { Metric, Observation, ObservationFilter, SnapshotDay } from '../types.js';

export interface LoadObservationsDeps {
  caseRecordsRepo: CaseRecordsRepo;
}

export interface LoadObservationsInput {
  metrics: readonly Metric[];
  filter: ObservationFilter;
}

/**
 * Reads one wide table per requested metric.
 * The returned map keeps the order of `input.metrics`.
 */
export const loadWideObservations = (
  deps: LoadObservationsDeps,
  input: LoadObservationsInput
): Result<Map<Metric, Observation[]>, CaseRecordsError> => {
  const byMetric = new Map<Metric, Observation[]>();

  for (const metric of input.metrics) {
    const table = deps.caseRecordsRepo.readWideTable(metric);
    if (table.isErr()) {
      return err(table.error);
    }

    const observations = parseWideTable(table.value, metric, input.filter);
    if (observations.isErr()) {
      return err(observations.error);
    }

    byMetric.set(metric, observations.value);
  }

  return ok(byMetric);
};

/**
 * Reads every daily snapshot on or after `filter.startDate`, ascending by date.
 */
export const loadSnapshotDays = (
  deps: LoadObservationsDeps,
  input: LoadObservationsInput
): Result<SnapshotDay[], CaseRecordsError> => {
  const entries = deps.caseRecordsRepo.listSnapshotFiles();
  if (entries.isErr()) {
    return err(entries.error);
  }

  const startDate = input.filter.startDate;
  const days: SnapshotDay[] = [];

  for (const entry of entries.value) {
    if (startDate !== undefined && entry.date < startDate) continue;

    const table = deps.caseRecordsRepo.readSnapshotTable(entry);
    if (table.isErr()) {
      return err(table.error);
    }

    const observations = parseSnapshotTable(table.value, entry.date, input.metrics, input.filter);
    if (observations.isErr()) {
      return err(observations.error);
    }

    days.push({ date: entry.date, observations: observations.value });
  }

  return ok(days);
};
