import type { Metric } from '@/modules/case-records/index.js';
import type { Decimal } from 'decimal.js';

export interface SeriesPoint {
  /** ISO date, YYYY-MM-DD */
  date: string;
  value: Decimal;
}

/**
 * Points of one (area, metric) pair, ascending by date without duplicates.
 */
export type Series = SeriesPoint[];

/**
 * Series of one area label, keyed by metric in canonical metric order.
 */
export type AreaBundle = Map<Metric, Series>;

/**
 * Area label -> bundle, in the order areas were first seen.
 */
export type AreaBundles = Map<string, AreaBundle>;

export interface AggregateOptions {
  /** One bundle per (area, sub-area) labelled "area - subArea" */
  splitBySubArea: boolean;
}
