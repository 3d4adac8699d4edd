#!/usr/bin/env node
/**
 * CLI entry point
 * Builds a case-count chart description for the requested areas
 */

import { runCli } from '@/app/run-cli.js';
import { createConfig, parseEnv } from '@/infra/config/index.js';
import { createLogger } from '@/infra/logger/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  const code = await runCli(process.argv.slice(2), { config, logger });
  process.exitCode = code;
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
