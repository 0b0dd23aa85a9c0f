import type { Db } from '../db.js';
import type { CatalogRecord, FileRow } from '../types.js';

export type SqlParam = string | number | null;

const INSERT_SQL = `INSERT OR IGNORE INTO file (
    filename, location, modified_at, size, index_type, product,
    timestep, experiment, model, ensemble, variable
  ) VALUES (
    @filename, @location, @modified_at, @size, @index_type, @product,
    @timestep, @experiment, @model, @ensemble, @variable
  )`;

export function toRow(r: CatalogRecord): FileRow {
  return {
    filename: r.filename,
    location: r.location,
    modified_at: r.modifiedAt,
    size: r.sizeBytes,
    index_type: r.indexType,
    product: r.product,
    timestep: r.timestep,
    experiment: r.experiment,
    model: r.model,
    ensemble: r.ensemble,
    variable: r.variable,
  };
}

export function fromRow(row: FileRow): CatalogRecord {
  return {
    filename: row.filename,
    location: row.location,
    modifiedAt: row.modified_at,
    sizeBytes: row.size,
    indexType: row.index_type,
    product: row.product,
    timestep: row.timestep,
    experiment: row.experiment,
    model: row.model,
    ensemble: row.ensemble,
    variable: row.variable,
  };
}

/**
 * Parameterised read. With `projectFirstColumn` (the default) returns the
 * first column of every row, otherwise each row as an array of columns.
 */
export function query(db: Db, sql: string, params?: SqlParam[], projectFirstColumn?: true): unknown[];
export function query(db: Db, sql: string, params: SqlParam[], projectFirstColumn: false): unknown[][];
export function query(db: Db, sql: string, params: SqlParam[] = [], projectFirstColumn = true): unknown[] | unknown[][] {
  const stmt = db.sqlite.prepare(sql);
  if (projectFirstColumn) return stmt.pluck().all(...params);
  return stmt
    .raw()
    .all(...params)
    .map((row) => (Array.isArray(row) ? row : [row]));
}

/**
 * Bulk insert in one transaction; rows whose filename is already cataloged
 * are skipped. Returns the number of rows actually inserted.
 */
export function insertIgnore(db: Db, records: CatalogRecord[]): number {
  const stmt = db.sqlite.prepare(INSERT_SQL);
  const insertAll = db.sqlite.transaction((rows: CatalogRecord[]) => {
    let inserted = 0;
    for (const r of rows) inserted += stmt.run(toRow(r)).changes;
    return inserted;
  });
  return insertAll(records);
}

export function deleteWhere(db: Db, filename: string, location: string): number {
  const stmt = db.sqlite.prepare('DELETE FROM file WHERE filename = ? AND location = ?');
  const remove = db.sqlite.transaction(() => stmt.run(filename, location).changes);
  return remove();
}

// `%` is the only wildcard; GLOB metacharacters in the literal parts are bracketed.
function toGlob(locationPattern: string): string {
  return locationPattern.replace(/[*?[]/g, (c) => `[${c}]`).replaceAll('%', '*');
}

export function listFilenames(db: Db, locationPattern: string): string[] {
  const rows = query(db, 'SELECT filename FROM file WHERE location GLOB ? ORDER BY filename ASC', [toGlob(locationPattern)]);
  return rows.filter((r): r is string => typeof r === 'string');
}

/** Filenames cataloged under one exact location. */
export function listFilenamesAt(db: Db, location: string): string[] {
  const rows = query(db, 'SELECT filename FROM file WHERE location = ? ORDER BY filename ASC', [location]);
  return rows.filter((r): r is string => typeof r === 'string');
}

export function listRecords(db: Db, locationPattern = '%/%/%/%/%'): CatalogRecord[] {
  return db.sqlite
    .prepare<[string], FileRow>('SELECT * FROM file WHERE location GLOB ? ORDER BY location, filename')
    .all(toGlob(locationPattern))
    .map(fromRow);
}

export function countRecords(db: Db): number {
  const row = db.sqlite.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM file').get();
  return row?.n ?? 0;
}
