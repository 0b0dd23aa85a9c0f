import type { AppContext } from '../context.js';
import { loadDatasetMetadata, loadProductLists } from '../datasets.js';
import type { Db } from '../db.js';
import { WILDCARD } from '../naming/patterns.js';
import type { ExpectedFile, IndexType, Timestep } from '../types.js';
import { checkSelection } from './existence.js';

export interface StatsQuery {
  index: IndexType;
  timestep: Timestep;
  products: string[];
  models: string[];
  variables: string[];
}

export interface ModelStats {
  model: string;
  cataloged: string[];
  missing: ExpectedFile[];
}

export interface ProductStats {
  product: string;
  variables: string[];
  /** Reporting estimate only: variables × experiments configured for the dataset. */
  expectedPerEnsemble: number;
  models: ModelStats[];
}

export function modelStats(db: Db, ctx: AppContext, q: StatsQuery): ProductStats[] {
  const dataDir = ctx.config.datasets.dir;
  const metadata = loadDatasetMetadata(dataDir, q.index, q.timestep);

  return q.products.map((product) => {
    const lists = loadProductLists(dataDir, q.index, q.timestep, product, metadata);
    const models = q.models.length ? q.models : lists.model;
    const variables = q.variables.length ? q.variables : lists.variable;

    return {
      product,
      variables,
      expectedPerEnsemble: variables.length * metadata.experiment.length,
      models: models.map((model) => {
        const check = checkSelection(
          db,
          ctx,
          { index: q.index, product, timestep: q.timestep, experiment: WILDCARD, model },
          variables
        );
        return { model, cataloged: check.cataloged, missing: check.missing };
      }),
    };
  });
}
