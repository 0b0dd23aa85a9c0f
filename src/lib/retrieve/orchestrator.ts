import pLimit from 'p-limit';

import { checkSelection } from '../catalog/existence.js';
import type { AppContext } from '../context.js';
import { loadDatasetMetadata, type DatasetMetadata } from '../datasets.js';
import type { Db } from '../db.js';
import { errorMessage, TransferError } from '../errors.js';
import { postProcess, type Archiver } from '../extract.js';
import type { Logger } from '../logger.js';
import { resolveSelection, type SelectionRequest } from '../selection.js';
import { ensureDir, stagedSize } from '../storage.js';
import type { SelectionKey } from '../types.js';
import type { Fetcher } from './fetcher.js';
import { buildPayload, buildTarget, type RequestPayload } from './request.js';

export interface TransferTask {
  /** Position in construction order; drives endpoint/credential rotation. */
  id: number;
  /** `<index>/<product>/<timestep>/<experiment>/<model>` */
  label: string;
  datasetId: string;
  payload: RequestPayload;
  stagingPath: string;
  destinationDir: string;
  endpoint: string;
  credentialId: string;
}

export interface SkippedCombination {
  label: string;
  location: string;
  present: number;
}

export interface DownloadPlan {
  tasks: TransferTask[];
  skipped: SkippedCombination[];
}

export type TaskState = 'post-processed' | 'transferred' | 'failed';

export interface TaskOutcome {
  id: number;
  label: string;
  state: TaskState;
  stagingPath: string;
  resumes: number;
  error?: string;
}

export interface DownloadCounts {
  postProcessed: number;
  transferred: number;
  failed: number;
}

export interface DownloadDeps {
  fetcher: Fetcher;
  archiver: Archiver;
  logger: Logger;
  /** Resume ceiling per task. */
  retry: number;
  slowEndpoints: string[];
  concurrency: number;
}

export function downloadDeps(ctx: AppContext, fetcher: Fetcher, archiver: Archiver): DownloadDeps {
  const { download } = ctx.config;
  return {
    fetcher,
    archiver,
    logger: ctx.logger,
    retry: download.retry,
    slowEndpoints: download.slowEndpoints,
    concurrency: download.concurrency,
  };
}

function rotate<T>(values: readonly T[], i: number): T {
  const v = values[i % values.length];
  if (v === undefined) throw new TransferError('Empty rotation list');
  return v;
}

/**
 * One task per product × experiment × model still missing files. Variables
 * already cataloged are left out of the request; a combination with nothing
 * missing is skipped.
 */
export function planDownloads(db: Db, ctx: AppContext, selection: SelectionRequest, metadata?: DatasetMetadata): DownloadPlan {
  const { config, logger } = ctx;
  const meta = metadata ?? loadDatasetMetadata(config.datasets.dir, selection.index, selection.timestep);
  const tasks: TransferTask[] = [];
  const skipped: SkippedCombination[] = [];

  for (const resolved of resolveSelection(selection, meta, config.datasets.dir)) {
    for (const experiment of resolved.experiments) {
      for (const model of resolved.models) {
        const key: SelectionKey = {
          index: selection.index,
          product: resolved.product,
          timestep: selection.timestep,
          experiment,
          model,
        };
        const label = [key.index, key.product, key.timestep, key.experiment, key.model].join('/');
        const check = checkSelection(db, ctx, key, resolved.variables);

        if (check.missing.length === 0) {
          logger.info(`All ${check.present.length} files present for ${label}, skipping`);
          skipped.push({ label, location: check.location, present: check.present.length });
          continue;
        }

        const variables = check.missing.map((m) => m.variable);
        logger.debug(`Missing for ${label}: ${variables.join(', ')}`);

        const target = buildTarget(ctx, key, variables, selection.format);
        ensureDir(target.stagingDir);
        ensureDir(target.destinationDir);

        const id = tasks.length;
        tasks.push({
          id,
          label,
          datasetId: meta.dsid,
          payload: buildPayload(meta, key.product, experiment, model, variables, selection.format),
          stagingPath: target.stagingPath,
          destinationDir: target.destinationDir,
          endpoint: rotate(config.download.altEndpoints, id),
          credentialId: rotate(config.download.credentials, id),
        });
      }
    }
  }

  return { tasks, skipped };
}

/** Swaps a slow download host (`.<slow>/`) for the task's endpoint. */
export function rewriteEndpoint(location: string, slowEndpoints: string[], endpoint: string): string {
  for (const slow of slowEndpoints) {
    const needle = `.${slow}/`;
    if (location.includes(needle)) return location.replace(needle, `.${endpoint}/`);
  }
  return location;
}

/**
 * Full fetch, then Range resumes until the staged file reaches `expectedSize`.
 * Throws once `retry` resumes have not got there. Returns the resume count.
 */
export async function transferWithResume(
  fetcher: Fetcher,
  url: string,
  stagingPath: string,
  expectedSize: number,
  retry: number,
  logger: Logger
): Promise<number> {
  try {
    await fetcher.fetch(url, stagingPath);
  } catch (e) {
    logger.warn(`Transfer of ${stagingPath} interrupted: ${errorMessage(e)}`);
  }

  let resumes = 0;
  let size = stagedSize(stagingPath);
  while (size < expectedSize && resumes < retry) {
    resumes += 1;
    logger.info(`Resuming ${stagingPath} at ${size}/${expectedSize} bytes (attempt ${resumes}/${retry})`);
    try {
      await fetcher.resume(url, stagingPath);
    } catch (e) {
      logger.warn(`Resume of ${stagingPath} failed: ${errorMessage(e)}`);
    }
    size = stagedSize(stagingPath);
  }

  if (size !== expectedSize) {
    throw new TransferError(`Staged ${size} of ${expectedSize} bytes after ${resumes} resumes`, {
      path: stagingPath,
      size,
      expectedSize,
      resumes,
    });
  }
  return resumes;
}

/** Runs one task to a terminal state. Never rejects. */
export async function runTask(deps: DownloadDeps, task: TransferTask): Promise<TaskOutcome> {
  const { fetcher, archiver, logger } = deps;
  const outcome = (state: TaskState, resumes: number, error?: string): TaskOutcome => ({
    id: task.id,
    label: task.label,
    state,
    stagingPath: task.stagingPath,
    resumes,
    ...(error === undefined ? {} : { error }),
  });

  let resumes: number;
  try {
    logger.info(`Requesting ${task.stagingPath}`);
    logger.debug(`Request ${task.datasetId}: ${JSON.stringify(task.payload)}`);
    const resource = await fetcher.retrieve(task.datasetId, task.payload, task.credentialId);
    const url = rewriteEndpoint(resource.location, deps.slowEndpoints, task.endpoint);
    logger.debug(`Download url ${url} (${resource.contentLength} bytes)`);
    resumes = await transferWithResume(fetcher, url, task.stagingPath, resource.contentLength, deps.retry, logger);
  } catch (e) {
    logger.error(`Download of ${task.label} failed: ${errorMessage(e)}`);
    return outcome('failed', 0, errorMessage(e));
  }

  try {
    const done = await postProcess(archiver, task.stagingPath, task.destinationDir);
    if (!done) logger.info(`Nothing to post-process for ${task.stagingPath}`);
    logger.info(`Download success: ${task.label}`);
    return outcome('post-processed', resumes);
  } catch (e) {
    // Staged file stays where it is for manual inspection.
    logger.error(`Post-processing of ${task.stagingPath} failed: ${errorMessage(e)}`);
    return outcome('transferred', resumes, errorMessage(e));
  }
}

export function countOutcomes(outcomes: TaskOutcome[]): DownloadCounts {
  return {
    postProcessed: outcomes.filter((o) => o.state === 'post-processed').length,
    transferred: outcomes.filter((o) => o.state === 'transferred').length,
    failed: outcomes.filter((o) => o.state === 'failed').length,
  };
}

/** Bounded pool; tasks start in construction order, outcomes come back in task order. */
export async function runDownloads(
  deps: DownloadDeps,
  tasks: TransferTask[]
): Promise<{ outcomes: TaskOutcome[]; counts: DownloadCounts }> {
  const limit = pLimit(deps.concurrency);
  const outcomes = await Promise.all(tasks.map((task) => limit(() => runTask(deps, task))));
  return { outcomes, counts: countOutcomes(outcomes) };
}

export interface DownloadSummary {
  queued: number;
  skipped: SkippedCombination[];
  outcomes: TaskOutcome[];
  counts: DownloadCounts;
}

/** Plans and runs a selection. The catalog is read for existence checks only. */
export async function downloadSelection(
  db: Db,
  ctx: AppContext,
  deps: DownloadDeps,
  selection: SelectionRequest,
  metadata?: DatasetMetadata
): Promise<DownloadSummary> {
  const { tasks, skipped } = planDownloads(db, ctx, selection, metadata);
  ctx.logger.info(`${tasks.length} requests to submit, ${skipped.length} combinations already complete`);
  const { outcomes, counts } = await runDownloads(deps, tasks);
  return { queued: tasks.length, skipped, outcomes, counts };
}
