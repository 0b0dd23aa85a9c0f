import fs from 'node:fs';
import path from 'node:path';

import type { AppConfig } from './config.js';
import { modelDir, type Vocabulary } from './datasets.js';
import type { ArchiveFormat, SelectionKey } from './types.js';

export interface DatasetPaths {
  stagingDir: string;
  destinationDir: string;
  archiveName: string;
  stagingPath: string;
}

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

/** Staging and data directories share the catalog's index/product/timestep/experiment/model layout. */
export function datasetPaths(
  config: AppConfig,
  vocabulary: Vocabulary,
  key: SelectionKey,
  format: ArchiveFormat
): DatasetPaths {
  const rel = [key.index, key.product, key.timestep, key.experiment, modelDir(vocabulary, key.model)];
  const stagingDir = path.join(config.storage.staging, ...rel);
  const archiveName = `${key.index}_${key.product}_${key.timestep}_${key.experiment}_${key.model}.${format}`;
  return {
    stagingDir,
    destinationDir: path.join(config.storage.datadir, ...rel),
    archiveName,
    stagingPath: path.join(stagingDir, archiveName),
  };
}

export function timestamp(date = new Date()): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export function requestDir(config: AppConfig, priority?: string): string {
  return priority ? path.join(config.storage.requestdir, priority) : config.storage.requestdir;
}

/** `seq` > 0 adds `_001`, `_002`, ... so requests queued in the same second sort in queue order. */
export function requestFilePath(config: AppConfig, urgent: boolean, date = new Date(), seq = 0): string {
  const suffix = seq > 0 ? `_${String(seq).padStart(3, '0')}` : '';
  return path.join(requestDir(config, urgent ? 'Urgent' : undefined), `cds_request_${timestamp(date)}${suffix}.json`);
}

export function completedDir(config: AppConfig): string {
  return path.join(config.storage.requestdir, 'Completed');
}

/** Size of a staged file, 0 while it does not exist yet. */
export function stagedSize(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}
