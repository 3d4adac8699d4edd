import type { ParseError, ReadError } from '@/common/types/errors.js';

export type { ParseError, ReadError } from '@/common/types/errors.js';

export type CaseRecordsError = ParseError | ReadError;
