import type { Metric } from '@/modules/case-records/index.js';
import type { Decimal } from 'decimal.js';

/** Confirmed-case count that marks the start of an aligned timeline */
export const ALIGNMENT_THRESHOLD = 100;

/**
 * Where an area's confirmed series first reaches the threshold, and how far
 * its timeline is moved to line up with the reference area.
 */
export interface AreaShift {
  label: string;
  /** Index of the first value >= threshold; null when never reached */
  crossing: number | null;
  /** > 0 trims leading samples, < 0 trims trailing samples */
  shift: number;
}

export interface AlignedArea extends AreaShift {
  /** Values by metric; index i is day i of the aligned timeline */
  series: Map<Metric, Decimal[]>;
}

export interface AlignmentResult {
  /** Label of the area that reached the threshold first, null if none did */
  reference: string | null;
  areas: AlignedArea[];
  /** Length of the longest aligned series */
  length: number;
}
