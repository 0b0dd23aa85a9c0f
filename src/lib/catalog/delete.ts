import type { AppContext } from '../context.js';
import type { Db } from '../db.js';
import { SelectionError } from '../errors.js';
import { locationPattern } from '../naming/patterns.js';
import type { IndexType, Timestep } from '../types.js';
import { deleteWhere, listFilenamesAt } from './store.js';

/** Asked once per location with the filenames that would be removed. */
export type ConfirmFn = (prompt: string, selected: string[]) => Promise<boolean>;

export interface DeleteScope {
  index: IndexType;
  timestep: Timestep;
  product: string;
  experiments: string[];
  models: string[];
}

export interface LocationDeletion {
  location: string;
  selected: string[];
  confirmed: boolean;
  deleted: number;
}

/**
 * Removes the catalog rows under each experiment × model location, one
 * confirmation per location. Declined locations are still reported with the
 * rows that would have been removed.
 */
export async function deleteRecords(
  db: Db,
  ctx: AppContext,
  scope: DeleteScope,
  confirm: ConfirmFn
): Promise<LocationDeletion[]> {
  if (scope.experiments.length === 0 || scope.models.length === 0) {
    throw new SelectionError('Deleting records needs at least one experiment and one model');
  }

  const results: LocationDeletion[] = [];
  for (const experiment of scope.experiments) {
    for (const model of scope.models) {
      const location = locationPattern(
        { index: scope.index, timestep: scope.timestep, product: scope.product, experiment, model },
        ctx.vocabulary
      );
      const selected = listFilenamesAt(db, location);
      ctx.logger.info(`Selected ${selected.length} records in db under ${location}`);

      if (selected.length === 0) {
        results.push({ location, selected, confirmed: false, deleted: 0 });
        continue;
      }

      const confirmed = await confirm(`Confirm deletion of ${selected.length} records under ${location} from database: Y/N `, selected);
      let deleted = 0;
      if (confirmed) {
        for (const filename of selected) deleted += deleteWhere(db, filename, location);
        ctx.logger.info(`Deleted ${deleted} records under ${location}`);
      }
      results.push({ location, selected, confirmed, deleted });
    }
  }
  return results;
}
