import { err, ok, type Result } from 'neverthrow';

import { COUNTRY_COLUMN_ALIASES } from '../types.js';

import type { CaseRecordsError } from '../errors.js';
import type { CaseRecordsRepo } from '../ports.js';

export interface ListAreasDeps {
  caseRecordsRepo: CaseRecordsRepo;
}

/**
 * Collects every country/region named in the daily snapshots, sorted.
 * Files without a country column contribute nothing.
 */
export const listAreas = (deps: ListAreasDeps): Result<string[], CaseRecordsError> => {
  const entries = deps.caseRecordsRepo.listSnapshotFiles();
  if (entries.isErr()) {
    return err(entries.error);
  }

  const areas = new Set<string>();

  for (const entry of entries.value) {
    const table = deps.caseRecordsRepo.readSnapshotTable(entry);
    if (table.isErr()) {
      return err(table.error);
    }

    const index = table.value.header.findIndex((name) =>
      COUNTRY_COLUMN_ALIASES.some((alias) => alias === name)
    );
    if (index === -1) continue;

    for (const row of table.value.rows) {
      const area = (row[index] ?? '').trim();
      if (area !== '') areas.add(area);
    }
  }

  return ok([...areas].sort((a, b) => a.localeCompare(b)));
};
