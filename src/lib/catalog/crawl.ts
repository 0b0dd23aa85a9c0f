import fs from 'node:fs';
import path from 'node:path';

import { findIndex } from '../datasets.js';
import { RecordError, errorMessage } from '../errors.js';
import { wildcardToRegex } from '../naming/patterns.js';
import type { CatalogRecord, IndexDefinition } from '../types.js';

export type LocationParts = [indexType: string, product: string, timestep: string, experiment: string, model: string];

export interface CrawlRejection {
  path: string;
  reason: string;
}

export interface CrawlResult {
  records: CatalogRecord[];
  rejected: CrawlRejection[];
}

// 0-based position of the ensemble member among the `_`-separated tokens.
const ENSEMBLE_TOKEN = 4;

export type IndexLookup = (indexType: string) => IndexDefinition | undefined;

export interface FilenameFields {
  ensemble: string;
  variable: string;
}

function isDir(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Files with the given extension in every directory under `baseDir` matching
 * a `/`-separated location pattern (`%` or `*` segments match any name).
 */
export function listFiles(baseDir: string, locationPattern: string, extension: string): string[] {
  let dirs = [baseDir];

  for (const segment of locationPattern.split('/')) {
    const next: string[] = [];
    const wild = segment.includes('%') || segment.includes('*');
    const re = wild ? wildcardToRegex(segment) : null;

    for (const dir of dirs) {
      if (re) {
        if (!isDir(dir)) continue;
        for (const name of fs.readdirSync(dir).sort()) {
          const child = path.join(dir, name);
          if (re.test(name) && isDir(child)) next.push(child);
        }
      } else {
        const child = path.join(dir, segment);
        if (isDir(child)) next.push(child);
      }
    }
    dirs = next;
  }

  const suffix = `.${extension}`;
  const files: string[] = [];
  for (const dir of dirs) {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (entry.isFile() && entry.name.endsWith(suffix)) files.push(path.join(dir, entry.name));
    }
  }
  return files.sort();
}

export function splitLocation(location: string): LocationParts {
  const parts = location.split('/');
  const [indexType, product, timestep, experiment, model] = parts;
  if (
    parts.length !== 5 ||
    indexType === undefined ||
    product === undefined ||
    timestep === undefined ||
    experiment === undefined ||
    model === undefined ||
    parts.some((p) => p.length === 0)
  ) {
    throw new RecordError(`Expected index/product/timestep/experiment/model, got '${location}'`, location);
  }
  return [indexType, product, timestep, experiment, model];
}

export function joinLocation(parts: LocationParts): string {
  return parts.join('/');
}

/**
 * Ensemble and variable of a filename. `product-coded` names carry the
 * variable before the upper-cased index name, `model-first` names as their
 * first token.
 */
export function filenameFields(filename: string, definition: IndexDefinition, filePath = filename): FilenameFields {
  const ensemble = filename.split('_')[ENSEMBLE_TOKEN];
  if (ensemble === undefined) {
    throw new RecordError(`Filename has too few '_' tokens for ${definition.name}`, filePath);
  }

  let variable: string | undefined;
  if (definition.family === 'product-coded') {
    const marker = definition.name.toUpperCase();
    variable = filename.includes(marker) ? filename.split(marker)[0] : undefined;
  } else {
    variable = filename.split('_')[0];
  }
  if (!variable) throw new RecordError(`Cannot find the variable in '${filename}'`, filePath);

  return { ensemble, variable };
}

/** Catalog record for one file, derived from its directory and name. */
export function fileAttributes(filePath: string, baseDir: string, lookup: IndexLookup = findIndex): CatalogRecord {
  const filename = path.basename(filePath);
  const rel = path.relative(baseDir, path.dirname(filePath));
  if (rel.startsWith('..') || path.isAbsolute(rel)) {
    throw new RecordError(`File is outside ${baseDir}`, filePath);
  }
  const location = rel.split(path.sep).join('/');
  const [indexType, product, timestep, experiment, model] = splitLocation(location);

  const definition = lookup(indexType);
  if (!definition) throw new RecordError(`Unknown index type '${indexType}'`, filePath);
  const { ensemble, variable } = filenameFields(filename, definition, filePath);

  const stat = fs.statSync(filePath);
  return {
    filename,
    location,
    modifiedAt: stat.mtime.toISOString(),
    sizeBytes: stat.size,
    indexType,
    product,
    timestep,
    experiment,
    model,
    ensemble,
    variable,
  };
}

/**
 * Records for every candidate whose basename is not already cataloged.
 * Files that cannot be described are returned in `rejected`, never guessed.
 */
export function crawl(
  candidateFiles: string[],
  knownFilenames: ReadonlySet<string>,
  baseDir: string,
  lookup: IndexLookup = findIndex
): CrawlResult {
  const records: CatalogRecord[] = [];
  const rejected: CrawlRejection[] = [];

  for (const f of candidateFiles) {
    if (knownFilenames.has(path.basename(f))) continue;
    try {
      records.push(fileAttributes(f, baseDir, lookup));
    } catch (e) {
      rejected.push({ path: f, reason: errorMessage(e) });
    }
  }

  return { records, rejected };
}
