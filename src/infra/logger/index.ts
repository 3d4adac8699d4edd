/**
 * Logger factory using Pino
 * Logs go to stderr so stdout stays free for chart output
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const STDERR = 2;

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'case-trends',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  // Use pino-pretty in development for readable logs
  if (finalConfig.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR,
      },
    };
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(STDERR));
};

/**
 * Creates a child logger with additional context
 */
export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

export { type Logger } from 'pino';
