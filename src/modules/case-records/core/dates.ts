import { err, ok, type Result } from 'neverthrow';

const WIDE_HEADER_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/;
const SNAPSHOT_FILE_RE = /^(\d{2})-(\d{2})-(\d{4})\.csv$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/**
 * Builds an ISO date, rejecting days that do not exist in the calendar.
 */
export const toIsoDate = (year: number, month: number, day: number): Result<string, string> => {
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return err(`${String(year)}-${String(month)}-${String(day)} is not a calendar date`);
  }
  return ok(`${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`);
};

/**
 * Parses a wide-table date column header, e.g. `1/22/20` -> `2020-01-22`.
 */
export const parseWideDateHeader = (header: string): Result<string, string> => {
  const match = WIDE_HEADER_RE.exec(header);
  if (match === null) {
    return err(`Expected M/D/YY date column, got '${header}'`);
  }
  const [, month = '', day = '', year = ''] = match;
  return toIsoDate(2000 + Number(year), Number(month), Number(day));
};

/**
 * Derives the date of a daily snapshot from its file name,
 * e.g. `03-15-2020.csv` -> `2020-03-15`. Returns undefined for other files.
 */
export const parseSnapshotFileName = (fileName: string): string | undefined => {
  const match = SNAPSHOT_FILE_RE.exec(fileName);
  if (match === null) {
    return undefined;
  }
  const [, month = '', day = '', year = ''] = match;
  const result = toIsoDate(Number(year), Number(month), Number(day));
  return result.isOk() ? result.value : undefined;
};

/**
 * Validates a YYYY-MM-DD date given on the command line.
 */
export const parseIsoDate = (value: string): Result<string, string> => {
  const match = ISO_DATE_RE.exec(value);
  if (match === null) {
    return err(`Not a valid date: '${value}'`);
  }
  const [, year = '', month = '', day = ''] = match;
  return toIsoDate(Number(year), Number(month), Number(day)).mapErr(
    () => `Not a valid date: '${value}'`
  );
};
