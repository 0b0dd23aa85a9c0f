import path from 'node:path';

import type { AppContext } from '../context.js';
import type { Db } from '../db.js';
import { WILDCARD, locationPattern, toFsGlob } from '../naming/patterns.js';
import type { IndexType, Timestep } from '../types.js';
import { crawl, listFiles, type CrawlRejection } from './crawl.js';
import { insertIgnore, listFilenames } from './store.js';

/** Part of the data tree to reconcile; omitted for a full sweep. */
export interface UpdateScope {
  index: IndexType;
  timestep: Timestep;
  products: string[];
  experiments: string[];
  models: string[];
}

export interface UpdateResult {
  locations: string[];
  candidates: number;
  alreadyCataloged: number;
  newFiles: number;
  inserted: number;
  rejected: CrawlRejection[];
}

const FULL_SWEEP = [WILDCARD, WILDCARD, WILDCARD, WILDCARD, WILDCARD].join('/');

function scopeLocations(ctx: AppContext, scope: UpdateScope | undefined): string[] {
  if (!scope) return [FULL_SWEEP];

  const products = scope.products.length ? scope.products : [WILDCARD];
  const experiments = scope.experiments.length ? scope.experiments : [WILDCARD];
  const models = scope.models.length ? scope.models : [WILDCARD];

  const locations: string[] = [];
  for (const product of products) {
    for (const experiment of experiments) {
      for (const model of models) {
        locations.push(
          locationPattern({ index: scope.index, timestep: scope.timestep, product, experiment, model }, ctx.vocabulary)
        );
      }
    }
  }
  return [...new Set(locations)];
}

/**
 * Adds files found on disk but missing from the catalog. Only the set
 * difference is crawled, so a second run over an unchanged tree inserts nothing.
 */
export function updateCatalog(db: Db, ctx: AppContext, scope?: UpdateScope): UpdateResult {
  const { config, logger } = ctx;
  const baseDir = config.storage.datadir;
  const locations = scopeLocations(ctx, scope);

  const candidates = new Set<string>();
  const known = new Set<string>();

  for (const location of locations) {
    logger.info(`Searching on filesystem: ${path.join(baseDir, toFsGlob(location), `*.${config.download.fileExtension}`)}`);
    const found = listFiles(baseDir, location, config.download.fileExtension);
    logger.info(`Found ${found.length} files.`);
    for (const f of found) candidates.add(f);
    for (const name of listFilenames(db, location)) known.add(name);
  }

  const { records, rejected } = crawl([...candidates], known, baseDir);
  for (const r of rejected) logger.warn(`Skipping ${r.path}: ${r.reason}`);

  let inserted = 0;
  if (records.length > 0) {
    logger.info(`Updating db with ${records.length} records ...`);
    inserted = insertIgnore(db, records);
  }

  return {
    locations,
    candidates: candidates.size,
    alreadyCataloged: known.size,
    newFiles: records.length + rejected.length,
    inserted,
    rejected,
  };
}
