import { err, ok, type Result } from 'neverthrow';

import { createConfigurationError } from '@/common/types/errors.js';
import { METRICS, type Metric } from '@/modules/case-records/index.js';

import type { ConfigurationError } from '../../core/errors.js';
import type { DataSource, PlotOptions } from '../../core/types.js';

export const DEFAULT_AREAS = ['Switzerland'];

export const USAGE = `Usage: case-trends [areas...] [options]

Plot confirmed/deaths/recovered case counts per country/region
(defaults to Switzerland).

Options:
  -l, --logarithmic        use logarithmic scale
  -c, --confirmed          include confirmed (default)
  -d, --deaths             include deaths
  -r, --recovered          include recovered
  -a, --all                include all
  -s, --startdate DATE     plot data from the given date on, format YYYY-MM-DD
      --no-annotate        disable annotation of data points
      --split-by-state     show a line for each province/state
      --compare            align areas on their 100th confirmed case
      --per-capita         show cases per 100k inhabitants
      --source SOURCE      'wide' time-series tables (default) or daily 'snapshot' reports
  -o, --output FILE        write the chart description to FILE instead of stdout
      --list-countries     list available countries/regions
  -h, --help               show this help
`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'list-areas' }
  | { kind: 'plot'; options: PlotOptions; outputPath?: string | undefined };

const SHORT_FLAGS: Record<string, string> = {
  '-l': '--logarithmic',
  '-c': '--confirmed',
  '-d': '--deaths',
  '-r': '--recovered',
  '-a': '--all',
  '-s': '--startdate',
  '-o': '--output',
  '-h': '--help',
};

const SHORT_CLUSTER_RE = /^-[a-z]{2,}$/;

const expandShortFlags = (args: readonly string[]): string[] =>
  args.flatMap((arg) =>
    SHORT_CLUSTER_RE.test(arg)
      ? [...arg.slice(1)].map((letter) => SHORT_FLAGS[`-${letter}`] ?? `-${letter}`)
      : [SHORT_FLAGS[arg] ?? arg]
  );

const takeValue = (
  args: readonly string[],
  index: number
): Result<string, ConfigurationError> => {
  const flag = args[index] ?? '';
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    return err(createConfigurationError(`${flag} expects a value`, [flag.replace(/^-+/, '')]));
  }
  return ok(value);
};

const isDataSource = (value: string): value is DataSource =>
  value === 'wide' || value === 'snapshot';

/**
 * Parse command line arguments (without the node and script entries).
 */
export function parseArgs(argv: readonly string[]): Result<CliCommand, ConfigurationError> {
  const args = expandShortFlags(argv);
  const areas: string[] = [];
  const selected = new Set<Metric>();

  let all = false;
  let logarithmic = false;
  let annotate = true;
  let splitBySubArea = false;
  let compare = false;
  let perCapita = false;
  let listAreas = false;
  let source: DataSource = 'wide';
  let startDate: string | undefined;
  let outputPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '--help':
        return ok({ kind: 'help' });
      case '--list-countries':
        listAreas = true;
        break;
      case '--logarithmic':
        logarithmic = true;
        break;
      case '--confirmed':
        selected.add('confirmed');
        break;
      case '--deaths':
        selected.add('deaths');
        break;
      case '--recovered':
        selected.add('recovered');
        break;
      case '--all':
        all = true;
        break;
      case '--no-annotate':
        annotate = false;
        break;
      case '--split-by-state':
        splitBySubArea = true;
        break;
      case '--compare':
        compare = true;
        break;
      case '--per-capita':
        perCapita = true;
        break;
      case '--startdate': {
        const value = takeValue(args, i++);
        if (value.isErr()) return err(value.error);
        startDate = value.value;
        break;
      }
      case '--output': {
        const value = takeValue(args, i++);
        if (value.isErr()) return err(value.error);
        outputPath = value.value;
        break;
      }
      case '--source': {
        const value = takeValue(args, i++);
        if (value.isErr()) return err(value.error);
        if (!isDataSource(value.value)) {
          return err(
            createConfigurationError(
              `--source must be 'wide' or 'snapshot', got '${value.value}'`,
              ['source']
            )
          );
        }
        source = value.value;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          return err(createConfigurationError(`Unknown option '${arg}'`, [arg]));
        }
        areas.push(arg);
    }
  }

  if (listAreas) {
    return ok({ kind: 'list-areas' });
  }

  const metrics: Metric[] = all
    ? [...METRICS]
    : selected.size === 0
      ? ['confirmed']
      : METRICS.filter((metric) => selected.has(metric));

  return ok({
    kind: 'plot',
    outputPath,
    options: {
      areas: areas.length > 0 ? areas : [...DEFAULT_AREAS],
      metrics,
      ...(startDate !== undefined && { startDate }),
      splitBySubArea,
      compare,
      perCapita,
      logarithmic,
      annotate,
      source,
    },
  });
}
