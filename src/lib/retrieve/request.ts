import type { AppContext } from '../context.js';
import type { DatasetMetadata } from '../datasets.js';
import { LookupError } from '../errors.js';
import { expectedFilenames, filenamePattern } from '../naming/patterns.js';
import { datasetPaths, type DatasetPaths } from '../storage.js';
import type { ArchiveFormat, ExpectedFile, SelectionKey } from '../types.js';

/** Body of a data store retrieve call. */
export interface RequestPayload {
  format: ArchiveFormat;
  variable: string[];
  product_type: string;
  model: string;
  experiment: string;
  period: string;
  ensemble_member: string;
  temporal_aggregation: string;
  version: string;
}

export interface DownloadTarget extends DatasetPaths {
  /** Files the unpacked archive should provide, one per requested variable. */
  expected: ExpectedFile[];
}

/** `historical` → `period_his`, `ssp5_8_5` → `period_ssp`. */
export function periodKey(experiment: string): string {
  return `period_${experiment.slice(0, 3)}`;
}

export function buildPayload(
  metadata: DatasetMetadata,
  product: string,
  experiment: string,
  model: string,
  variables: string[],
  format: ArchiveFormat
): RequestPayload {
  const key = periodKey(experiment);
  const period = metadata.periods[key];
  if (period === undefined) throw new LookupError('dataset metadata key', key, { dsid: metadata.dsid });

  return {
    format,
    variable: [...variables],
    product_type: product,
    model,
    experiment,
    period,
    ensemble_member: metadata.ensemble_member,
    temporal_aggregation: metadata.temporal_aggregation,
    version: metadata.version,
  };
}

export function buildTarget(ctx: AppContext, key: SelectionKey, variables: string[], format: ArchiveFormat): DownloadTarget {
  const { config, vocabulary } = ctx;
  const pattern = filenamePattern(key, config.download.fileExtension, vocabulary);
  return {
    ...datasetPaths(config, vocabulary, key, format),
    expected: expectedFilenames(pattern, key.index, key.model, variables, vocabulary),
  };
}
