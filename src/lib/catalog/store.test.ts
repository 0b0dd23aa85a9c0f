import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';

import type { Db } from '../db.js';
import { mkTmpDir, testDb } from '../test-helpers.js';
import type { CatalogRecord } from '../types.js';
import { countRecords, deleteWhere, insertIgnore, listFilenames, listFilenamesAt, listRecords, query } from './store.js';

function record(filename: string, location: string, overrides: Partial<CatalogRecord> = {}): CatalogRecord {
  const [indexType = '', product = '', timestep = '', experiment = '', model = ''] = location.split('/');
  return {
    filename,
    location,
    modifiedAt: '2024-03-01T10:00:00.000Z',
    sizeBytes: 1024,
    indexType,
    product,
    timestep,
    experiment,
    model,
    ensemble: 'r1i1p1f1',
    variable: filename.split('ETCCDI')[0] ?? '',
    ...overrides,
  };
}

const LOC_A = 'etccdi/base_independent/mon/historical/CanESM5';
const LOC_B = 'etccdi/base_independent/mon/ssp1_2_6/CanESM5';

describe('catalog store', () => {
  let root: string;
  let db: Db;

  beforeEach(() => {
    root = mkTmpDir();
    db = testDb(root);
  });

  afterEach(() => {
    db.sqlite.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('keeps one row per filename on insert-ignore', () => {
    const first = record('txxETCCDI_mon_a.nc', LOC_A);
    const dup = record('txxETCCDI_mon_a.nc', LOC_B, { sizeBytes: 1 });

    expect(insertIgnore(db, [first])).toBe(1);
    expect(insertIgnore(db, [dup])).toBe(0);
    expect(countRecords(db)).toBe(1);
    expect(listRecords(db)).toEqual([first]);
  });

  it('counts only the rows it inserted in a mixed batch', () => {
    insertIgnore(db, [record('a.nc', LOC_A)]);
    expect(insertIgnore(db, [record('a.nc', LOC_A), record('b.nc', LOC_A), record('c.nc', LOC_B)])).toBe(2);
    expect(countRecords(db)).toBe(3);
  });

  it('lists filenames by location pattern', () => {
    insertIgnore(db, [record('b.nc', LOC_A), record('a.nc', LOC_A), record('c.nc', LOC_B)]);

    expect(listFilenames(db, LOC_A)).toEqual(['a.nc', 'b.nc']);
    expect(listFilenames(db, 'etccdi/base_independent/mon/%/CanESM5')).toEqual(['a.nc', 'b.nc', 'c.nc']);
    expect(listFilenamesAt(db, LOC_B)).toEqual(['c.nc']);
  });

  it('treats underscores in patterns literally', () => {
    insertIgnore(db, [record('a.nc', 'etccdi/base_independent/mon/ssp1x2x6/CanESM5')]);
    expect(listFilenames(db, LOC_B)).toEqual([]);
  });

  it('projects the first column or returns whole rows', () => {
    insertIgnore(db, [record('a.nc', LOC_A), record('b.nc', LOC_B)]);

    expect(query(db, 'SELECT filename FROM file ORDER BY filename')).toEqual(['a.nc', 'b.nc']);
    expect(query(db, 'SELECT filename, size FROM file WHERE location = ?', [LOC_B], false)).toEqual([['b.nc', 1024]]);
  });

  it('deletes by filename and location', () => {
    insertIgnore(db, [record('a.nc', LOC_A), record('b.nc', LOC_A)]);

    expect(deleteWhere(db, 'a.nc', LOC_B)).toBe(0);
    expect(deleteWhere(db, 'a.nc', LOC_A)).toBe(1);
    expect(listFilenames(db, LOC_A)).toEqual(['b.nc']);
  });
});
