/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Invalid combination of options, detected before any file is read
 */
export interface ConfigurationError extends AppError {
  readonly type: 'ConfigurationError';
  readonly options: readonly string[];
}

/**
 * Malformed input: bad date token, non-numeric count, missing header
 */
export interface ParseError extends AppError {
  readonly type: 'ParseError';
  readonly file: string;
  readonly line?: number | undefined;
}

/**
 * A file or directory could not be read
 */
export interface ReadError extends AppError {
  readonly type: 'ReadError';
  readonly path: string;
}

export const createConfigurationError = (
  message: string,
  options: readonly string[]
): ConfigurationError => ({
  type: 'ConfigurationError',
  message,
  options,
});

export const createParseError = (message: string, file: string, line?: number): ParseError => ({
  type: 'ParseError',
  message: line !== undefined ? `${file}:${String(line)}: ${message}` : `${file}: ${message}`,
  file,
  ...(line !== undefined && { line }),
});

export const createReadError = (filePath: string, cause: unknown): ReadError => ({
  type: 'ReadError',
  message: `Failed to read ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
  path: filePath,
  cause,
});
