import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';

import type { AppContext } from '../context.js';
import type { Db } from '../db.js';
import { etccdiFilename, mkTmpDir, testContext, testDb, writeDataFile } from '../test-helpers.js';
import { countRecords, listFilenames } from './store.js';
import { updateCatalog } from './update.js';

const HIST = 'etccdi/base_independent/mon/historical/CanESM5';
const SSP = 'etccdi/base_independent/mon/ssp2_4_5/CanESM5';

describe('updateCatalog', () => {
  let root: string;
  let ctx: AppContext;
  let db: Db;

  beforeEach(() => {
    root = mkTmpDir();
    ctx = testContext(root);
    db = testDb(root);
    writeDataFile(ctx.config, HIST, etccdiFilename('txx', 'CanESM5', 'historical', 'no-base'));
    writeDataFile(ctx.config, HIST, etccdiFilename('tnn', 'CanESM5', 'historical', 'no-base'));
    writeDataFile(ctx.config, SSP, etccdiFilename('txx', 'CanESM5', 'ssp245', 'no-base'));
  });

  afterEach(() => {
    db.sqlite.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('inserts nothing the second time over an unchanged tree', () => {
    const first = updateCatalog(db, ctx);
    expect(first.inserted).toBe(3);
    expect(first.alreadyCataloged).toBe(0);

    const second = updateCatalog(db, ctx);
    expect(second).toMatchObject({ candidates: 3, alreadyCataloged: 3, newFiles: 0, inserted: 0 });
    expect(countRecords(db)).toBe(3);
  });

  it('only crawls the scoped locations', () => {
    const res = updateCatalog(db, ctx, {
      index: 'etccdi',
      timestep: 'mon',
      products: ['base_independent'],
      experiments: ['ssp2_4_5'],
      models: ['canesm5'],
    });

    expect(res.locations).toEqual([SSP]);
    expect(res.inserted).toBe(1);
    expect(listFilenames(db, HIST)).toEqual([]);
  });

  it('picks up files added after the last run', () => {
    updateCatalog(db, ctx);
    writeDataFile(ctx.config, SSP, etccdiFilename('tnn', 'CanESM5', 'ssp245', 'no-base'));

    const res = updateCatalog(db, ctx);
    expect(res.newFiles).toBe(1);
    expect(res.inserted).toBe(1);
    expect(countRecords(db)).toBe(4);
  });
});
