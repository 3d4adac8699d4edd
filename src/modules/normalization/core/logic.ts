import { err, ok, type Result } from 'neverthrow';

import { createPopulationLookupError, type PopulationLookupError } from './errors.js';

import type { PopulationTable } from './population.js';
import type { AreaBundle, AreaBundles, Series } from '@/modules/series/index.js';
import type { Decimal } from 'decimal.js';

/** Per-capita values are expressed per this many inhabitants */
export const PER_CAPITA_UNIT = 100_000;

/**
 * Divides every value by `population / PER_CAPITA_UNIT`.
 */
export function applyPerCapita(series: Series, population: Decimal): Series {
  const scale = population.div(PER_CAPITA_UNIT);
  return series.map((point) => ({ ...point, value: point.value.div(scale) }));
}

/**
 * Rescales every bundle to per-capita values.
 *
 * All labels are looked up before any value is touched: one missing
 * population fails the whole set.
 */
export function normalizeBundles(
  bundles: AreaBundles,
  populations: PopulationTable
): Result<AreaBundles, PopulationLookupError> {
  const resolved = new Map<string, Decimal>();

  for (const label of bundles.keys()) {
    const population = populations.get(label);
    if (population === undefined) {
      return err(createPopulationLookupError(label));
    }
    resolved.set(label, population);
  }

  const normalized: AreaBundles = new Map();

  for (const [label, bundle] of bundles) {
    const population = resolved.get(label);
    if (population === undefined) continue;

    const scaled: AreaBundle = new Map();
    for (const [metric, series] of bundle) {
      scaled.set(metric, applyPerCapita(series, population));
    }
    normalized.set(label, scaled);
  }

  return ok(normalized);
}
