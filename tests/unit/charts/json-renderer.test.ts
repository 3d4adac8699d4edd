import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createJsonRenderer, serializeChart, type ChartData } from '@/modules/charts/index.js';

const chart: ChartData = {
  title: 'Linear',
  yScale: 'linear',
  annotate: true,
  xAxisLabel: 'Days',
  yAxisLabel: 'Cases',
  xTicks: [{ position: 0, label: '2020-01-22' }],
  lines: [
    {
      area: 'Testland',
      metric: 'confirmed',
      legend: 'Testland - confirmed',
      points: [{ x: 0, y: 1200, label: "1'200" }],
    },
  ],
};

describe('createJsonRenderer', () => {
  it('writes the chart to the sink without an output path', async () => {
    const written: string[] = [];
    const renderer = createJsonRenderer({ sink: (text) => written.push(text) });

    await renderer.render(chart);

    expect(written).toEqual([serializeChart(chart)]);
    expect(JSON.parse(written[0] ?? '')).toEqual(chart);
  });

  it('writes the chart to a file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'chart-'));
    const outputPath = path.join(dir, 'chart.json');
    const written: string[] = [];

    await createJsonRenderer({ outputPath, sink: (text) => written.push(text) }).render(chart);

    expect(await readFile(outputPath, 'utf8')).toBe(serializeChart(chart));
    expect(written).toEqual([]);
  });
});

describe('serializeChart', () => {
  it('ends with a newline', () => {
    expect(serializeChart(chart).endsWith('}\n')).toBe(true);
  });
});
