import {
  indexDefinition,
  isIndexType,
  isTimestep,
  loadDatasetMetadata,
  loadProductLists,
  variableCode,
  type DatasetMetadata,
  type Vocabulary,
} from './datasets.js';
import { LookupError, SelectionError } from './errors.js';
import { expandProduct } from './naming/products.js';
import type { ArchiveFormat, IndexType, Timestep } from './types.js';

/**
 * What to download. `products` holds product names (`base_period_1981_2010`),
 * and an empty experiment/model/variable list means every configured value.
 */
export interface SelectionRequest {
  format: ArchiveFormat;
  index: IndexType;
  timestep: Timestep;
  products: string[];
  experiments: string[];
  models: string[];
  variables: string[];
}

/** Raw arguments as they come from the command line; products are short codes. */
export interface SelectionInput {
  format?: string;
  index: string;
  timestep: string;
  products: string[];
  experiments?: string[];
  models?: string[];
  variables?: string[];
}

function checkMembers(kind: string, values: string[], allowed: string[], index: IndexType, context?: Record<string, unknown>) {
  for (const v of values) {
    if (!allowed.includes(v)) throw new LookupError(kind, v, { index, ...context });
  }
}

/**
 * Checks an already-expanded selection against the index definition and the
 * dataset metadata. Returns the metadata so callers do not read it twice.
 */
export function validateSelection(selection: SelectionRequest, dataDir: string, vocabulary: Vocabulary): DatasetMetadata {
  const def = indexDefinition(selection.index);
  if (!def.timesteps.includes(selection.timestep)) {
    throw new SelectionError(`Timestep ${selection.timestep} not available for ${selection.index} product`);
  }
  if (!def.formats.includes(selection.format)) {
    throw new SelectionError(`Download format ${selection.format} not available for ${selection.index} product`);
  }
  if (selection.products.length === 0) {
    throw new SelectionError('At least one product is required');
  }

  const metadata = loadDatasetMetadata(dataDir, selection.index, selection.timestep);
  checkMembers('product', selection.products, metadata.product_type, selection.index);
  checkMembers('experiment', selection.experiments, metadata.experiment, selection.index);
  checkMembers('model', selection.models, metadata.model, selection.index);
  checkMembers('variable', selection.variables, metadata.variable, selection.index);
  for (const v of selection.variables) variableCode(vocabulary, selection.index, v);

  return metadata;
}

function parseFormat(format: string): ArchiveFormat {
  if (format === 'tgz' || format === 'zip') return format;
  throw new SelectionError(`Unknown download format ${format}`);
}

export function createSelection(input: SelectionInput, dataDir: string, vocabulary: Vocabulary): SelectionRequest {
  if (!isIndexType(input.index)) throw new SelectionError(`Unknown index type ${input.index}`);
  if (!isTimestep(input.timestep)) throw new SelectionError(`Unknown timestep ${input.timestep}`);

  const selection: SelectionRequest = {
    format: parseFormat(input.format ?? 'tgz'),
    index: input.index,
    timestep: input.timestep,
    products: input.products.map(expandProduct),
    experiments: input.experiments ?? [],
    models: input.models ?? [],
    variables: input.variables ?? [],
  };
  validateSelection(selection, dataDir, vocabulary);
  return selection;
}

export interface ResolvedProduct {
  product: string;
  experiments: string[];
  models: string[];
  variables: string[];
}

/**
 * Fills empty experiment/model/variable lists with what the product publishes.
 * Explicit models and variables must be published for every selected product.
 */
export function resolveSelection(
  selection: SelectionRequest,
  metadata: DatasetMetadata,
  dataDir: string
): ResolvedProduct[] {
  return selection.products.map((product) => {
    const lists = loadProductLists(dataDir, selection.index, selection.timestep, product, metadata);
    checkMembers('model', selection.models, lists.model, selection.index, { product });
    checkMembers('variable', selection.variables, lists.variable, selection.index, { product });
    return {
      product,
      experiments: selection.experiments.length > 0 ? selection.experiments : metadata.experiment,
      models: selection.models.length > 0 ? selection.models : lists.model,
      variables: selection.variables.length > 0 ? selection.variables : lists.variable,
    };
  });
}
