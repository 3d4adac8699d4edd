import { type Static, Type } from '@sinclair/typebox';

import type { Metric } from '@/modules/case-records/index.js';

const MetricSchema = Type.Union([
  Type.Literal('confirmed'),
  Type.Literal('deaths'),
  Type.Literal('recovered'),
]);

/**
 * wide: one time-series table per metric; snapshot: one table per day.
 */
const DataSourceSchema = Type.Union([Type.Literal('wide'), Type.Literal('snapshot')]);

export const PlotOptionsSchema = Type.Object({
  areas: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  metrics: Type.Array(MetricSchema, { minItems: 1 }),
  startDate: Type.Optional(Type.String({ description: 'YYYY-MM-DD' })),
  splitBySubArea: Type.Boolean(),
  compare: Type.Boolean(),
  perCapita: Type.Boolean(),
  logarithmic: Type.Boolean(),
  annotate: Type.Boolean(),
  source: DataSourceSchema,
});

export type PlotOptions = Static<typeof PlotOptionsSchema>;

export type DataSource = Static<typeof DataSourceSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Chart description handed to renderers
// ─────────────────────────────────────────────────────────────────────────────

export type YScale = 'linear' | 'logarithmic';

export interface ChartTick {
  position: number;
  label: string;
}

export interface ChartPoint {
  /** Position on the x-axis: index into the date domain, or day number when aligned */
  x: number;
  y: number;
  /** Annotation text, thousands grouped */
  label: string;
}

export interface ChartLine {
  area: string;
  metric: Metric;
  legend: string;
  points: ChartPoint[];
}

export interface ChartData {
  title: 'Linear' | 'Logarithmic';
  yScale: YScale;
  annotate: boolean;
  xAxisLabel: string;
  yAxisLabel: string;
  xTicks: ChartTick[];
  lines: ChartLine[];
}

/**
 * Presentation flags carried through to the chart description.
 */
export type ChartPresentation = Pick<PlotOptions, 'logarithmic' | 'annotate' | 'perCapita'>;
