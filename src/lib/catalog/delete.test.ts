import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs';

import type { AppContext } from '../context.js';
import type { Db } from '../db.js';
import { SelectionError } from '../errors.js';
import { etccdiFilename, mkTmpDir, testContext, testDb, writeDataFile } from '../test-helpers.js';
import { deleteRecords, type DeleteScope } from './delete.js';
import { countRecords, listFilenamesAt } from './store.js';
import { updateCatalog } from './update.js';

const HIST = 'etccdi/base_independent/yr/historical/MIROC6';
const SSP = 'etccdi/base_independent/yr/ssp3_7_0/MIROC6';

const SCOPE: DeleteScope = {
  index: 'etccdi',
  timestep: 'yr',
  product: 'base_independent',
  experiments: ['historical', 'ssp3_7_0'],
  models: ['miroc6'],
};

describe('deleteRecords', () => {
  let root: string;
  let ctx: AppContext;
  let db: Db;

  beforeEach(() => {
    root = mkTmpDir();
    ctx = testContext(root);
    db = testDb(root);
    writeDataFile(ctx.config, HIST, etccdiFilename('fd', 'MIROC6', 'historical', 'no-base', 'yr'));
    writeDataFile(ctx.config, HIST, etccdiFilename('su', 'MIROC6', 'historical', 'no-base', 'yr'));
    writeDataFile(ctx.config, SSP, etccdiFilename('fd', 'MIROC6', 'ssp370', 'no-base', 'yr'));
    updateCatalog(db, ctx);
  });

  afterEach(() => {
    db.sqlite.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('asks once per location and deletes only what was confirmed', async () => {
    const confirm = vi.fn(async (prompt: string) => prompt.includes('historical'));

    const results = await deleteRecords(db, ctx, SCOPE, confirm);

    expect(confirm).toHaveBeenCalledTimes(2);
    expect(confirm.mock.calls[0]).toEqual([
      `Confirm deletion of 2 records under ${HIST} from database: Y/N `,
      [
        etccdiFilename('fd', 'MIROC6', 'historical', 'no-base', 'yr'),
        etccdiFilename('su', 'MIROC6', 'historical', 'no-base', 'yr'),
      ],
    ]);
    expect(results.map((r) => [r.location, r.selected.length, r.confirmed, r.deleted])).toEqual([
      [HIST, 2, true, 2],
      [SSP, 1, false, 0],
    ]);
    expect(listFilenamesAt(db, HIST)).toEqual([]);
    expect(countRecords(db)).toBe(1);
  });

  it('removes nothing without confirmation but still reports the selection', async () => {
    const results = await deleteRecords(db, ctx, SCOPE, async () => false);

    expect(results.map((r) => r.selected.length)).toEqual([2, 1]);
    expect(results.every((r) => r.deleted === 0)).toBe(true);
    expect(countRecords(db)).toBe(3);
  });

  it('does not prompt for empty locations', async () => {
    const confirm = vi.fn(async () => true);
    const results = await deleteRecords(db, ctx, { ...SCOPE, models: ['canesm5'] }, confirm);

    expect(confirm).not.toHaveBeenCalled();
    expect(results.map((r) => r.selected)).toEqual([[], []]);
  });

  it('needs at least one experiment and one model', async () => {
    await expect(deleteRecords(db, ctx, { ...SCOPE, experiments: [] }, async () => true)).rejects.toThrow(SelectionError);
    await expect(deleteRecords(db, ctx, { ...SCOPE, models: [] }, async () => true)).rejects.toThrow(SelectionError);
  });
});
