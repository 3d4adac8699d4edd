/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

const DEFAULT_TIME_SERIES_DIR = 'COVID-19/csse_covid_19_data/csse_covid_19_time_series';
const DEFAULT_DAILY_REPORTS_DIR = 'COVID-19/csse_covid_19_data/csse_covid_19_daily_reports';
const DEFAULT_POPULATION_CSV = 'data/population.csv';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Input data
  CASES_TIME_SERIES_DIR: Type.String({ minLength: 1 }),
  CASES_DAILY_REPORTS_DIR: Type.String({ minLength: 1 }),
  POPULATION_CSV_PATH: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const nonEmpty = (value: string | undefined, fallback: string): string =>
  value !== undefined && value !== '' ? value : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    CASES_TIME_SERIES_DIR: nonEmpty(env['CASES_TIME_SERIES_DIR'], DEFAULT_TIME_SERIES_DIR),
    CASES_DAILY_REPORTS_DIR: nonEmpty(env['CASES_DAILY_REPORTS_DIR'], DEFAULT_DAILY_REPORTS_DIR),
    POPULATION_CSV_PATH: nonEmpty(env['POPULATION_CSV_PATH'], DEFAULT_POPULATION_CSV),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment.
 * Relative paths resolve against `cwd`.
 */
export const createConfig = (env: Env, cwd: string = process.cwd()) => ({
  runtime: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  data: {
    timeSeriesDir: path.resolve(cwd, env.CASES_TIME_SERIES_DIR),
    dailyReportsDir: path.resolve(cwd, env.CASES_DAILY_REPORTS_DIR),
    populationCsvPath: path.resolve(cwd, env.POPULATION_CSV_PATH),
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
