import fs from 'node:fs/promises';

import type { ChartRenderer } from '../../core/ports.js';
import type { ChartData } from '../../core/types.js';

export interface JsonRendererOptions {
  /** Write to this file instead of the sink */
  outputPath?: string | undefined;
  /** Receives the serialized chart when no output path is given */
  sink?: (text: string) => void;
}

export const serializeChart = (chart: ChartData): string => `${JSON.stringify(chart, null, 2)}\n`;

/**
 * Renders a chart description as JSON, for plotting tools outside this
 * process.
 */
export const createJsonRenderer = (options: JsonRendererOptions = {}): ChartRenderer => {
  const sink =
    options.sink ??
    ((text: string) => {
      process.stdout.write(text);
    });

  return {
    async render(chart: ChartData): Promise<void> {
      const text = serializeChart(chart);
      if (options.outputPath !== undefined) {
        await fs.writeFile(options.outputPath, text, 'utf8');
        return;
      }
      sink(text);
    },
  };
};
