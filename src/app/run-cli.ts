/**
 * Command-line application
 * Wires configuration, repositories and the renderer around the chart pipeline
 */

import { createChildLogger } from '@/infra/logger/index.js';
import {
  createCaseRecordsRepo,
  listAreas,
  type CaseRecordsRepo,
} from '@/modules/case-records/index.js';
import {
  buildChart,
  createJsonRenderer,
  parseArgs,
  USAGE,
  type ChartError,
  type ChartRenderer,
} from '@/modules/charts/index.js';
import { makePopulationRepo, type PopulationRepository } from '@/modules/normalization/index.js';

import type { AppConfig } from '@/infra/config/index.js';
import type { Logger } from 'pino';

export interface RunCliDeps {
  config: AppConfig;
  logger: Logger;
  caseRecordsRepo?: CaseRecordsRepo;
  populationRepo?: PopulationRepository;
  /** Builds the renderer for an optional output file */
  makeRenderer?: (outputPath: string | undefined) => ChartRenderer;
  /** Receives plain text output (help, area listing) */
  print?: (text: string) => void;
  exit?: (code: number) => void;
  /** Source of SIGINT, the process by default */
  signals?: Pick<NodeJS.EventEmitter, 'once' | 'removeListener'>;
}

const describeError = (error: ChartError): Record<string, unknown> => {
  switch (error.type) {
    case 'ConfigurationError':
      return { type: error.type, options: error.options };
    case 'ParseError':
      return { type: error.type, file: error.file, line: error.line };
    case 'ReadError':
      return { type: error.type, path: error.path };
    case 'PopulationLookupError':
      return { type: error.type, area: error.area };
    case 'NoDataError':
      return { type: error.type, areas: error.areas };
  }
};

/**
 * Runs one invocation and resolves to the process exit code.
 * An interrupt while the chart is being rendered ends the run with 0.
 */
export const runCli = async (argv: readonly string[], deps: RunCliDeps): Promise<number> => {
  const { config, logger } = deps;
  const print =
    deps.print ??
    ((text: string) => {
      process.stdout.write(text);
    });
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const signals: Pick<NodeJS.EventEmitter, 'once' | 'removeListener'> = deps.signals ?? process;

  const command = parseArgs(argv);
  if (command.isErr()) {
    logger.error(describeError(command.error), command.error.message);
    print(USAGE);
    return 1;
  }

  if (command.value.kind === 'help') {
    print(USAGE);
    return 0;
  }

  const caseRecordsRepo =
    deps.caseRecordsRepo ??
    createCaseRecordsRepo({
      timeSeriesDir: config.data.timeSeriesDir,
      dailyReportsDir: config.data.dailyReportsDir,
    });

  if (command.value.kind === 'list-areas') {
    const areas = listAreas({ caseRecordsRepo });
    if (areas.isErr()) {
      logger.error(describeError(areas.error), areas.error.message);
      return 1;
    }
    print(`${areas.value.join('\n')}\n`);
    return 0;
  }

  const { options, outputPath } = command.value;
  const chart = buildChart(
    {
      caseRecordsRepo,
      populationRepo: deps.populationRepo ?? makePopulationRepo(config.data.populationCsvPath),
      logger: createChildLogger(logger, { areas: options.areas, source: options.source }),
    },
    options
  );

  if (chart.isErr()) {
    logger.error(describeError(chart.error), chart.error.message);
    return 1;
  }

  const renderer = (deps.makeRenderer ?? ((path) => createJsonRenderer({ outputPath: path })))(
    outputPath
  );

  const onInterrupt = (): void => {
    logger.info('Interrupted while rendering');
    exit(0);
  };

  signals.once('SIGINT', onInterrupt);
  try {
    await renderer.render(chart.value);
  } finally {
    signals.removeListener('SIGINT', onInterrupt);
  }

  logger.debug({ lines: chart.value.lines.length }, 'Chart rendered');
  return 0;
};
