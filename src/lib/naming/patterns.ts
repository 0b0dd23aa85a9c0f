import { indexDefinition, modelDir, variableCode, type Vocabulary } from '../datasets.js';
import type { ExpectedFile, FilenameFamily, IndexType, SelectionKey } from '../types.js';
import { filenameProductCode } from './products.js';

/** Wildcard used in location and filename patterns (SQL LIKE style). */
export const WILDCARD = '%';

export interface SelectionPatterns {
  /** `<index>/<product>/<timestep>/<experiment>/<modelDir>` relative to the data dir. */
  location: string;
  filename: string;
}

// Position of the model in a `_`-split filename, per family.
const MODEL_SEGMENT: Record<FilenameFamily, number> = {
  'product-coded': 2,
  'model-first': 3,
};

/** Model as spelled in directory and file names: `canesm5` → `CanESM5`. */
export function publishedModel(vocabulary: Vocabulary, model: string): string {
  return model === WILDCARD ? WILDCARD : modelDir(vocabulary, model);
}

/** Experiment as it appears inside filenames: `ssp5_8_5` → `ssp585`. */
export function filenameExperiment(experiment: string): string {
  return experiment.replaceAll('_', '');
}

export function locationPattern(key: SelectionKey, vocabulary: Vocabulary): string {
  return [key.index, key.product, key.timestep, key.experiment, publishedModel(vocabulary, key.model)].join('/');
}

/** Filename pattern in the shape of the index's own family unless `family` is given. */
export function filenamePattern(
  key: SelectionKey,
  extension: string,
  vocabulary: Vocabulary,
  family: FilenameFamily = indexDefinition(key.index).family
): string {
  const idx = key.index.toUpperCase();
  const exp = key.experiment === WILDCARD ? WILDCARD : filenameExperiment(key.experiment);

  if (family === 'product-coded') {
    const pr = key.product === WILDCARD ? WILDCARD : filenameProductCode(key.product);
    return `${WILDCARD}${idx}_${key.timestep}_${WILDCARD}_${exp}_${WILDCARD}_${pr}_${WILDCARD}_v1-0.${extension}`;
  }

  return `${WILDCARD}_${idx}_${key.timestep}_${publishedModel(vocabulary, key.model)}_${exp}_${WILDCARD}.${extension}`;
}

export function selectionPatterns(key: SelectionKey, vocabulary: Vocabulary, extension: string): SelectionPatterns {
  return {
    location: locationPattern(key, vocabulary),
    filename: filenamePattern(key, extension, vocabulary),
  };
}

/** Location pattern as a filesystem glob. */
export function toFsGlob(pattern: string): string {
  return pattern.replaceAll(WILDCARD, '*');
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function regexSource(pattern: string): string {
  return pattern.split(/[%*]/).map(escapeRegex).join('(.*)');
}

/**
 * `%`/`*` become `(.*)`, every other character matches itself (including the
 * dot before the extension) and the whole name must match.
 */
export function wildcardToRegex(pattern: string): RegExp {
  return new RegExp(`^${regexSource(pattern)}$`);
}

function hasWildcard(segment: string): boolean {
  return segment.includes('%') || segment.includes('*');
}

/**
 * One regex per variable: the first wildcard segment of the filename pattern
 * takes the variable's short code and the model segment the published model name.
 */
export function expectedFilenames(
  pattern: string,
  index: IndexType,
  model: string,
  variables: string[],
  vocabulary: Vocabulary,
  family: FilenameFamily = indexDefinition(index).family
): ExpectedFile[] {
  const segments = pattern.split('_');
  const first = segments.findIndex(hasWildcard);
  const modelAt = MODEL_SEGMENT[family];

  return variables.map((variable) => {
    const code = variableCode(vocabulary, index, variable);
    const concrete = segments.map((segment, i) => {
      if (i === modelAt && model !== WILDCARD) return publishedModel(vocabulary, model);
      if (i === first) return segment.replace(/[%*]/, code);
      return segment;
    });
    return { variable, regex: new RegExp(`^${concrete.map(regexSource).join('_')}$`) };
  });
}
