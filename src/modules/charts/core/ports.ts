import type { ChartData } from './types.js';

/**
 * Draws or exports a chart description. The core never emits drawing
 * commands; everything visual happens behind this port.
 */
export interface ChartRenderer {
  render(chart: ChartData): Promise<void>;
}
