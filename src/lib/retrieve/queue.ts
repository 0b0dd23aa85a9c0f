import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import type { AppConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { SelectionRequest } from '../selection.js';
import { completedDir, ensureDir, requestDir, requestFilePath } from '../storage.js';

const names = z.array(z.string().min(1));

const QueuedSelectionSchema = z.object({
  format: z.enum(['tgz', 'zip']),
  index: z.enum(['etccdi', 'hsi']),
  timestep: z.enum(['yr', 'mon', 'day']),
  products: names.min(1),
  experiments: names,
  models: names,
  variables: names,
});

export interface QueueOptions {
  urgent?: boolean;
  now?: Date;
}

function isFileExists(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'EEXIST';
}

/**
 * Writes the selection for a later `scan`; returns the request file path.
 * A name already taken in the same second gets the next sequence suffix.
 */
export function queueSelection(config: AppConfig, selection: SelectionRequest, opts: QueueOptions = {}): string {
  const now = opts.now ?? new Date();
  const body = JSON.stringify(selection, null, 2) + '\n';

  for (let seq = 0; ; seq++) {
    const file = requestFilePath(config, opts.urgent ?? false, now, seq);
    ensureDir(path.dirname(file));
    try {
      fs.writeFileSync(file, body, { flag: 'wx' });
      return file;
    } catch (e) {
      if (!isFileExists(e)) throw e;
    }
  }
}

export function loadQueuedSelection(file: string): SelectionRequest {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return QueuedSelectionSchema.parse(raw);
}

export function listQueuedRequests(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.startsWith('cds_request') && f.endsWith('.json'))
    .sort()
    .map((f) => path.join(dir, f));
}

export interface DrainedRequest {
  file: string;
  selection: SelectionRequest;
}

export interface DrainResult {
  /** Another drain held the lock; nothing was done. */
  locked: boolean;
  processed: DrainedRequest[];
  failed: { file: string; error: string }[];
}

export function lockPath(config: AppConfig): string {
  return path.join(config.storage.requestdir, '.lock');
}

/**
 * Replays every queued request in `<requestdir>/<priority>` in name order under
 * an exclusive lock. Each file is moved to `Completed/` after its run, whether
 * the run succeeded or not.
 */
export async function drainQueue(
  config: AppConfig,
  priority: string | undefined,
  replay: (selection: SelectionRequest, file: string) => Promise<void>,
  logger: Logger
): Promise<DrainResult> {
  const result: DrainResult = { locked: false, processed: [], failed: [] };
  const lock = lockPath(config);
  ensureDir(path.dirname(lock));

  let fd: number;
  try {
    fd = fs.openSync(lock, 'wx');
  } catch (e) {
    if (isFileExists(e)) {
      logger.warn(`Queue is locked by ${lock}, exiting`);
      return { ...result, locked: true };
    }
    throw e;
  }

  try {
    fs.writeSync(fd, String(process.pid));
    const done = completedDir(config);
    ensureDir(done);

    for (const file of listQueuedRequests(requestDir(config, priority))) {
      logger.info(`Replaying ${file}`);
      try {
        const selection = loadQueuedSelection(file);
        await replay(selection, file);
        result.processed.push({ file, selection });
      } catch (e) {
        logger.error(`Queued request ${file} failed: ${errorMessage(e)}`);
        result.failed.push({ file, error: errorMessage(e) });
      }
      fs.renameSync(file, path.join(done, path.basename(file)));
    }
  } finally {
    fs.closeSync(fd);
    fs.rmSync(lock, { force: true });
  }

  return result;
}
