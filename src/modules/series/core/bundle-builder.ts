import { Decimal } from 'decimal.js';

import { METRICS, type Metric, type Observation } from '@/modules/case-records/index.js';

import type { AreaBundle, AreaBundles, Series } from './types.js';

/**
 * Label of the bundle an observation belongs to.
 */
export const areaLabel = (
  observation: Pick<Observation, 'area' | 'subArea'>,
  splitBySubArea: boolean
): string =>
  splitBySubArea && observation.subArea !== ''
    ? `${observation.area} - ${observation.subArea}`
    : observation.area;

/**
 * Accumulates label -> metric -> date -> value with insert-or-merge
 * semantics: adding a value for an existing (label, metric, date) sums it.
 *
 * `build()` freezes the result into AreaBundles with dates ascending and
 * metrics in canonical order. Labels keep their first-insertion order.
 */
export class AreaBundleBuilder {
  private readonly areas = new Map<string, Map<Metric, Map<string, Decimal>>>();

  add(label: string, metric: Metric, date: string, value: Decimal.Value): this {
    let metrics = this.areas.get(label);
    if (metrics === undefined) {
      metrics = new Map();
      this.areas.set(label, metrics);
    }

    let points = metrics.get(metric);
    if (points === undefined) {
      points = new Map();
      metrics.set(metric, points);
    }

    const existing = points.get(date);
    points.set(date, existing === undefined ? new Decimal(value) : existing.plus(value));
    return this;
  }

  get size(): number {
    return this.areas.size;
  }

  build(): AreaBundles {
    const bundles: AreaBundles = new Map();

    for (const [label, metrics] of this.areas) {
      const bundle: AreaBundle = new Map();

      for (const metric of METRICS) {
        const points = metrics.get(metric);
        if (points === undefined) continue;

        const series: Series = [...points.entries()]
          .sort(([a], [b]) => a.localeCompare(b))
          .map(([date, value]) => ({ date, value }));
        bundle.set(metric, series);
      }

      bundles.set(label, bundle);
    }

    return bundles;
  }
}
