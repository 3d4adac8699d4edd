/**
 * Case count categories, in the order they are charted.
 */
export const METRICS = ['confirmed', 'deaths', 'recovered'] as const;

export type Metric = (typeof METRICS)[number];

export const isMetric = (value: string): value is Metric =>
  METRICS.some((metric) => metric === value);

/**
 * One cell of a source table: the cumulative count of a metric for an area
 * on a day. `subArea` is '' when the row carries no province/state.
 */
export interface Observation {
  area: string;
  subArea: string;
  /** ISO date, YYYY-MM-DD */
  date: string;
  metric: Metric;
  count: number;
}

/**
 * Restricts what the loader keeps.
 */
export interface ObservationFilter {
  /** Exact, case-sensitive country/region names */
  areas: ReadonlySet<string>;
  /** ISO date; observations strictly before it are dropped */
  startDate?: string | undefined;
}

/**
 * A daily snapshot file found on disk.
 */
export interface SnapshotFileEntry {
  /** ISO date derived from the MM-DD-YYYY file name */
  date: string;
  fileName: string;
  absolutePath: string;
}

/**
 * All observations read from one daily snapshot file.
 */
export interface SnapshotDay {
  date: string;
  observations: Observation[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Column names
// ─────────────────────────────────────────────────────────────────────────────

export const PROVINCE_COLUMN = 'Province/State';
export const COUNTRY_COLUMN = 'Country/Region';
export const LAT_COLUMN = 'Lat';
export const LONG_COLUMN = 'Long';

/**
 * Later daily reports renamed the location columns.
 */
export const PROVINCE_COLUMN_ALIASES = [PROVINCE_COLUMN, 'Province_State'] as const;
export const COUNTRY_COLUMN_ALIASES = [COUNTRY_COLUMN, 'Country_Region'] as const;

export const SNAPSHOT_METRIC_COLUMNS: Record<Metric, string> = {
  confirmed: 'Confirmed',
  deaths: 'Deaths',
  recovered: 'Recovered',
};

export const WIDE_TABLE_FILES: Record<Metric, string> = {
  confirmed: 'time_series_19-covid-Confirmed.csv',
  deaths: 'time_series_19-covid-Deaths.csv',
  recovered: 'time_series_19-covid-Recovered.csv',
};
