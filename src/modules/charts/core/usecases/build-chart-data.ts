import { formatValue } from '../format.js';

import type { ChartData, ChartLine, ChartPresentation, ChartTick } from '../types.js';
import type { AlignmentResult } from '@/modules/alignment/index.js';
import type { AreaBundles } from '@/modules/series/index.js';
import type { Decimal } from 'decimal.js';

const X_AXIS_LABEL = 'Days';

const frame = (presentation: ChartPresentation): Omit<ChartData, 'xTicks' | 'lines'> => ({
  title: presentation.logarithmic ? 'Logarithmic' : 'Linear',
  yScale: presentation.logarithmic ? 'logarithmic' : 'linear',
  annotate: presentation.annotate,
  xAxisLabel: X_AXIS_LABEL,
  yAxisLabel: presentation.perCapita ? 'Cases per 100k' : 'Cases',
});

const toPoint = (x: number, value: Decimal, perCapita: boolean) => ({
  x,
  y: value.toNumber(),
  label: formatValue(value, perCapita ? 2 : 0),
});

/**
 * Chart over calendar dates. The x-axis is the union of all series' dates;
 * each point's x is its date's position in that domain.
 */
export const buildCalendarChart = (
  bundles: AreaBundles,
  presentation: ChartPresentation
): ChartData => {
  const dates = new Set<string>();
  for (const bundle of bundles.values()) {
    for (const series of bundle.values()) {
      for (const point of series) dates.add(point.date);
    }
  }

  const domain = [...dates].sort((a, b) => a.localeCompare(b));
  const positions = new Map(domain.map((date, index) => [date, index]));
  const xTicks: ChartTick[] = domain.map((date, index) => ({ position: index, label: date }));

  const lines: ChartLine[] = [];
  for (const [area, bundle] of bundles) {
    for (const [metric, series] of bundle) {
      lines.push({
        area,
        metric,
        legend: `${area} - ${metric}`,
        points: series.map((point) =>
          toPoint(positions.get(point.date) ?? 0, point.value, presentation.perCapita)
        ),
      });
    }
  }

  return { ...frame(presentation), xTicks, lines };
};

/**
 * Chart over aligned day numbers 0..length-1.
 */
export const buildAlignedChart = (
  alignment: AlignmentResult,
  presentation: ChartPresentation
): ChartData => {
  const xTicks: ChartTick[] = Array.from({ length: alignment.length }, (_, day) => ({
    position: day,
    label: String(day),
  }));

  const lines: ChartLine[] = [];
  for (const area of alignment.areas) {
    for (const [metric, values] of area.series) {
      lines.push({
        area: area.label,
        metric,
        legend: `${area.label} - ${metric}`,
        points: values.map((value, day) => toPoint(day, value, presentation.perCapita)),
      });
    }
  }

  return { ...frame(presentation), xTicks, lines };
};
