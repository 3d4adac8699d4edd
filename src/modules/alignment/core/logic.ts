import { Decimal } from 'decimal.js';

import { ALIGNMENT_THRESHOLD } from './types.js';

import type { AlignedArea, AlignmentResult, AreaShift } from './types.js';
import type { Metric } from '@/modules/case-records/index.js';
import type { AreaBundles, Series } from '@/modules/series/index.js';

/**
 * Leftmost index at which `target` could be inserted keeping `values`
 * sorted. Assumes `values` is non-decreasing.
 */
export function bisectLeft(values: readonly Decimal[], target: Decimal.Value): number {
  let lo = 0;
  let hi = values.length;

  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const value = values[mid];
    if (value !== undefined && value.lessThan(target)) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }

  return lo;
}

/**
 * Index of the first value >= threshold, or null when the series never
 * gets there.
 */
export function findThresholdCrossing(
  series: Series,
  threshold: Decimal.Value = ALIGNMENT_THRESHOLD
): number | null {
  const values = series.map((point) => point.value);
  if (values.length === 0 || Decimal.max(...values).lessThan(threshold)) {
    return null;
  }
  return bisectLeft(values, threshold);
}

/**
 * Computes the shift of every area from its confirmed series.
 *
 * The area with the smallest crossing index is the reference (the first one
 * in iteration order on ties). Every other area is shifted by the distance
 * between its crossing and the reference's. Areas that never reach the
 * threshold, or carry no confirmed series, keep shift 0.
 */
export function computeShifts(
  bundles: AreaBundles,
  threshold: Decimal.Value = ALIGNMENT_THRESHOLD
): { reference: string | null; shifts: AreaShift[] } {
  const crossings: { label: string; crossing: number | null }[] = [];

  for (const [label, bundle] of bundles) {
    const confirmed = bundle.get('confirmed');
    crossings.push({
      label,
      crossing: confirmed === undefined ? null : findThresholdCrossing(confirmed, threshold),
    });
  }

  let reference: { label: string; crossing: number } | null = null;
  for (const { label, crossing } of crossings) {
    if (crossing === null) continue;
    if (reference === null || crossing < reference.crossing) {
      reference = { label, crossing };
    }
  }

  const shifts = crossings.map(({ label, crossing }) => ({
    label,
    crossing,
    shift: crossing === null || reference === null ? 0 : crossing - reference.crossing,
  }));

  return { reference: reference?.label ?? null, shifts };
}

/**
 * Trims `shift` leading samples when positive, `-shift` trailing samples
 * when negative.
 */
export function applyShift<T>(values: readonly T[], shift: number): T[] {
  if (shift > 0) return values.slice(shift);
  if (shift < 0) return values.slice(0, Math.max(0, values.length + shift));
  return [...values];
}

/**
 * Re-indexes every area's series onto a shared day-number axis.
 *
 * Shifts are taken from `reference` when given (e.g. raw counts, so that
 * per-capita series are aligned on the same case-count milestone), else
 * from `bundles` itself.
 */
export function alignBundles(
  bundles: AreaBundles,
  reference: AreaBundles = bundles,
  threshold: Decimal.Value = ALIGNMENT_THRESHOLD
): AlignmentResult {
  const computed = computeShifts(reference, threshold);
  const shiftByLabel = new Map(computed.shifts.map((entry) => [entry.label, entry]));

  const areas: AlignedArea[] = [];
  let length = 0;

  for (const [label, bundle] of bundles) {
    const areaShift = shiftByLabel.get(label) ?? { label, crossing: null, shift: 0 };
    const series = new Map<Metric, Decimal[]>();

    for (const [metric, points] of bundle) {
      const values = applyShift(points.map((point) => point.value), areaShift.shift);
      series.set(metric, values);
      length = Math.max(length, values.length);
    }

    areas.push({ ...areaShift, series });
  }

  return { reference: computed.reference, areas, length };
}
