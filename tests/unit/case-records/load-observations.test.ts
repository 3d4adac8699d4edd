import { describe, expect, it } from 'vitest';

import {
  listAreas,
  loadSnapshotDays,
  loadWideObservations,
} from '@/modules/case-records/index.js';
import { makeSnapshotCsv, makeWideCsv } from '@/tests/fixtures/builders.js';
import { makeFakeCaseRecordsRepo } from '@/tests/fixtures/fakes.js';

describe('loadWideObservations', () => {
  it('reads one table per metric in the requested order', () => {
    const caseRecordsRepo = makeFakeCaseRecordsRepo({
      wide: {
        confirmed: makeWideCsv(['1/22/20'], [{ country: 'Testland', counts: [5] }]),
        deaths: makeWideCsv(['1/22/20'], [{ country: 'Testland', counts: [1] }]),
      },
    });

    const result = loadWideObservations(
      { caseRecordsRepo },
      { metrics: ['deaths', 'confirmed'], filter: { areas: new Set(['Testland']) } }
    );

    const byMetric = result._unsafeUnwrap();
    expect([...byMetric.keys()]).toEqual(['deaths', 'confirmed']);
    expect(byMetric.get('confirmed')?.map((o) => o.count)).toEqual([5]);
    expect(caseRecordsRepo.reads).toEqual(['deaths', 'confirmed']);
  });

  it('stops at the first table that cannot be read', () => {
    const caseRecordsRepo = makeFakeCaseRecordsRepo({
      wide: { recovered: makeWideCsv(['1/22/20'], [{ country: 'Testland', counts: [5] }]) },
    });

    const result = loadWideObservations(
      { caseRecordsRepo },
      { metrics: ['confirmed', 'recovered'], filter: { areas: new Set(['Testland']) } }
    );

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ReadError', path: 'confirmed.csv' });
    expect(caseRecordsRepo.reads).toEqual(['confirmed']);
  });
});

describe('loadSnapshotDays', () => {
  const snapshots = {
    '03-02-2020.csv': makeSnapshotCsv([{ country: 'Testland', confirmed: 20 }]),
    '03-01-2020.csv': makeSnapshotCsv([{ country: 'Testland', confirmed: 10 }]),
    '03-03-2020.csv': makeSnapshotCsv([{ country: 'Otherland', confirmed: 1 }]),
  };

  it('returns days ascending by date', () => {
    const caseRecordsRepo = makeFakeCaseRecordsRepo({ snapshots });

    const days = loadSnapshotDays(
      { caseRecordsRepo },
      { metrics: ['confirmed'], filter: { areas: new Set(['Testland']) } }
    )._unsafeUnwrap();

    expect(days.map((day) => [day.date, day.observations.map((o) => o.count)])).toEqual([
      ['2020-03-01', [10]],
      ['2020-03-02', [20]],
      ['2020-03-03', []],
    ]);
  });

  it('skips files dated before the start date without reading them', () => {
    const caseRecordsRepo = makeFakeCaseRecordsRepo({ snapshots });

    const days = loadSnapshotDays(
      { caseRecordsRepo },
      {
        metrics: ['confirmed'],
        filter: { areas: new Set(['Testland']), startDate: '2020-03-02' },
      }
    )._unsafeUnwrap();

    expect(days.map((day) => day.date)).toEqual(['2020-03-02', '2020-03-03']);
    expect(caseRecordsRepo.reads).toEqual(['03-02-2020.csv', '03-03-2020.csv']);
  });
});

describe('listAreas', () => {
  it('lists distinct countries across all snapshots, sorted', () => {
    const caseRecordsRepo = makeFakeCaseRecordsRepo({
      snapshots: {
        '03-01-2020.csv': makeSnapshotCsv([
          { state: 'North', country: 'Testland' },
          { state: 'South', country: 'Testland' },
          { country: 'Otherland' },
        ]),
        '03-02-2020.csv': 'Province_State,Country_Region,Confirmed\n,Anotherland,1\n',
      },
    });

    expect(listAreas({ caseRecordsRepo })._unsafeUnwrap()).toEqual([
      'Anotherland',
      'Otherland',
      'Testland',
    ]);
  });
});
