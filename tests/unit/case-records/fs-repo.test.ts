import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { beforeEach, describe, expect, it } from 'vitest';

import { createCaseRecordsRepo, WIDE_TABLE_FILES } from '@/modules/case-records/index.js';
import { makeSnapshotCsv, makeWideCsv } from '@/tests/fixtures/builders.js';

describe('createCaseRecordsRepo', () => {
  let root: string;
  let timeSeriesDir: string;
  let dailyReportsDir: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'case-records-'));
    timeSeriesDir = path.join(root, 'time_series');
    dailyReportsDir = path.join(root, 'daily_reports');
    await mkdir(timeSeriesDir);
    await mkdir(dailyReportsDir);
  });

  it('reads the wide table of a metric', async () => {
    await writeFile(
      path.join(timeSeriesDir, WIDE_TABLE_FILES.deaths),
      makeWideCsv(['1/22/20'], [{ country: 'Testland', counts: [2] }])
    );
    const repo = createCaseRecordsRepo({ timeSeriesDir, dailyReportsDir });

    const table = repo.readWideTable('deaths')._unsafeUnwrap();

    expect(table.header).toEqual(['Province/State', 'Country/Region', 'Lat', 'Long', '1/22/20']);
    expect(table.rows).toEqual([['', 'Testland', '0', '0', '2']]);
  });

  it('reports a missing wide table as a ReadError', () => {
    const repo = createCaseRecordsRepo({ timeSeriesDir, dailyReportsDir });

    const error = repo.readWideTable('recovered')._unsafeUnwrapErr();

    expect(error.type).toBe('ReadError');
  });

  it('lists snapshot files by date and ignores other files', async () => {
    await writeFile(path.join(dailyReportsDir, '01-02-2021.csv'), makeSnapshotCsv([]));
    await writeFile(path.join(dailyReportsDir, '12-31-2020.csv'), makeSnapshotCsv([]));
    await writeFile(path.join(dailyReportsDir, 'README.md'), '# reports');
    const repo = createCaseRecordsRepo({ timeSeriesDir, dailyReportsDir });

    const entries = repo.listSnapshotFiles()._unsafeUnwrap();

    expect(entries).toEqual([
      {
        date: '2020-12-31',
        fileName: '12-31-2020.csv',
        absolutePath: path.join(dailyReportsDir, '12-31-2020.csv'),
      },
      {
        date: '2021-01-02',
        fileName: '01-02-2021.csv',
        absolutePath: path.join(dailyReportsDir, '01-02-2021.csv'),
      },
    ]);
  });

  it('reports a missing reports directory as a ReadError', () => {
    const missing = path.join(root, 'nowhere');
    const repo = createCaseRecordsRepo({ timeSeriesDir, dailyReportsDir: missing });

    expect(repo.listSnapshotFiles()._unsafeUnwrapErr()).toMatchObject({
      type: 'ReadError',
      path: missing,
    });
  });

  it('reads a snapshot table', async () => {
    await writeFile(
      path.join(dailyReportsDir, '03-01-2020.csv'),
      makeSnapshotCsv([{ country: 'Testland', confirmed: 3 }])
    );
    const repo = createCaseRecordsRepo({ timeSeriesDir, dailyReportsDir });
    const [entry] = repo.listSnapshotFiles()._unsafeUnwrap();
    if (entry === undefined) throw new Error('expected one snapshot entry');

    const table = repo.readSnapshotTable(entry)._unsafeUnwrap();

    expect(table.rows).toEqual([['', 'Testland', '2020-03-01T10:00:00', '3', '', '']]);
  });
});
