import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { LookupError } from './errors.js';
import type { IndexDefinition, IndexType, Timestep } from './types.js';

const INDEXES: Record<IndexType, IndexDefinition> = {
  etccdi: { name: 'etccdi', family: 'product-coded', timesteps: ['mon', 'yr'], formats: ['tgz', 'zip'] },
  hsi: { name: 'hsi', family: 'product-coded', timesteps: ['day'], formats: ['tgz', 'zip'] },
};

export const TIMESTEPS: Timestep[] = ['yr', 'mon', 'day'];

export function isIndexType(x: string): x is IndexType {
  return Object.hasOwn(INDEXES, x);
}

export function isTimestep(x: string): x is Timestep {
  return TIMESTEPS.some((t) => t === x);
}

export function findIndex(index: string): IndexDefinition | undefined {
  return isIndexType(index) ? INDEXES[index] : undefined;
}

export function indexDefinition(index: string): IndexDefinition {
  if (!isIndexType(index)) throw new LookupError('index type', index);
  return INDEXES[index];
}

const names = z.array(z.string().min(1));

const DatasetMetadataSchema = z
  .object({
    dsid: z.string().min(1),
    product_type: names,
    experiment: names,
    model: names,
    variable: names,
    ensemble_member: z.string(),
    temporal_aggregation: z.string(),
    version: z.string(),
  })
  .passthrough()
  .transform((raw) => {
    const periods: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (key.startsWith('period_') && typeof value === 'string') periods[key] = value;
    }
    return {
      dsid: raw.dsid,
      product_type: raw.product_type,
      experiment: raw.experiment,
      model: raw.model,
      variable: raw.variable,
      ensemble_member: raw.ensemble_member,
      temporal_aggregation: raw.temporal_aggregation,
      version: raw.version,
      periods,
    };
  });

/** Provider-side description of one index/timestep dataset (`data/<index>_<tstep>.json`). */
export type DatasetMetadata = z.output<typeof DatasetMetadataSchema>;

const ProductListsSchema = z.object({ model: names, variable: names });
export type ProductLists = z.infer<typeof ProductListsSchema>;

const CodeMapSchema = z.record(z.string(), z.string().min(1));

/** Lookup tables shared by the pattern translator, crawler and request builder. */
export interface Vocabulary {
  modelDirs: Record<string, string>;
  variableCodes: Record<IndexType, Record<string, string>>;
}

function readJson(dataDir: string, fileName: string): unknown {
  const filePath = path.join(dataDir, fileName);
  if (!fs.existsSync(filePath)) {
    throw new LookupError('dataset file', fileName, { dataDir });
  }
  return JSON.parse(fs.readFileSync(filePath, 'utf8'));
}

export function loadDatasetMetadata(dataDir: string, index: IndexType, timestep: Timestep): DatasetMetadata {
  return DatasetMetadataSchema.parse(readJson(dataDir, `${index}_${timestep}.json`));
}

/**
 * Models and variables published for one product. etccdi splits them into
 * base-period and base-independent lists; hsi uses the dataset lists as is.
 */
export function loadProductLists(
  dataDir: string,
  index: IndexType,
  timestep: Timestep,
  product: string,
  metadata: DatasetMetadata
): ProductLists {
  if (index === 'hsi') return { model: metadata.model, variable: metadata.variable };
  const base = product === 'base_independent' ? 'nobase' : 'base';
  return ProductListsSchema.parse(readJson(dataDir, `${index}_${timestep}_${base}.json`));
}

export function loadVocabulary(dataDir: string): Vocabulary {
  return {
    modelDirs: CodeMapSchema.parse(readJson(dataDir, 'model_map.json')),
    variableCodes: {
      etccdi: CodeMapSchema.parse(readJson(dataDir, 'etccdi_vars.json')),
      hsi: CodeMapSchema.parse(readJson(dataDir, 'hsi_vars.json')),
    },
  };
}

export function modelDir(vocabulary: Vocabulary, model: string): string {
  const dir = Object.hasOwn(vocabulary.modelDirs, model) ? vocabulary.modelDirs[model] : undefined;
  if (dir === undefined) throw new LookupError('model', model);
  return dir;
}

export function variableCode(vocabulary: Vocabulary, index: IndexType, variable: string): string {
  const codes = vocabulary.variableCodes[index];
  const code = Object.hasOwn(codes, variable) ? codes[variable] : undefined;
  if (code === undefined) throw new LookupError('variable', variable, { index });
  return code;
}
