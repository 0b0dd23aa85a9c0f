import fs from 'node:fs';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';

import type { Db } from '../db.js';
import { listRecords } from './store.js';

export const INTAKE_HEADER = [
  'path',
  'index_type',
  'base',
  'frequency',
  'experiment',
  'model',
  'ensemble',
  'variable',
  'date_range',
];

/** `..._201501-210012_v1-0.nc` → `201501-210012` */
export function dateRange(filename: string): string {
  return filename.split('_').at(-2) ?? '';
}

export function intakeRows(db: Db, basedir: string): string[][] {
  return listRecords(db).map((r) => [
    path.posix.join(basedir, r.location, r.filename),
    r.indexType,
    r.product,
    r.timestep,
    r.experiment,
    r.model,
    r.ensemble,
    r.variable,
    dateRange(r.filename),
  ]);
}

/** Writes the whole catalog as an intake-esm style CSV; returns the row count. */
export function writeIntake(db: Db, basedir: string, outPath: string): number {
  const rows = intakeRows(db, basedir);
  fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
  fs.writeFileSync(outPath, stringify([INTAKE_HEADER, ...rows]));
  return rows.length;
}
