import type { AppContext } from '../context.js';
import type { Db } from '../db.js';
import { expectedFilenames, selectionPatterns } from '../naming/patterns.js';
import type { ExpectedFile, SelectionKey } from '../types.js';
import { listFilenames } from './store.js';

export interface ExistenceCheck {
  location: string;
  filenamePattern: string;
  cataloged: string[];
  present: ExpectedFile[];
  missing: ExpectedFile[];
}

/**
 * Expected files no cataloged name matches. Matching is by regex because the
 * date range and version in real names are unknown before download.
 */
export function unmatched(filenames: string[], expected: ExpectedFile[]): ExpectedFile[] {
  return expected.filter((e) => !filenames.some((f) => e.regex.test(f)));
}

export function checkSelection(db: Db, ctx: AppContext, key: SelectionKey, variables: string[]): ExistenceCheck {
  const { location, filename } = selectionPatterns(key, ctx.vocabulary, ctx.config.download.fileExtension);
  const expected = expectedFilenames(filename, key.index, key.model, variables, ctx.vocabulary);
  const cataloged = listFilenames(db, location);
  const missing = unmatched(cataloged, expected);

  return {
    location,
    filenamePattern: filename,
    cataloged,
    present: expected.filter((e) => !missing.includes(e)),
    missing,
  };
}

export function computeMissing(db: Db, ctx: AppContext, key: SelectionKey, variables: string[]): ExpectedFile[] {
  return checkSelection(db, ctx, key, variables).missing;
}
