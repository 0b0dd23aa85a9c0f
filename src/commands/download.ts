import { Option, type Command } from 'commander';
import { z } from 'zod';

import type { AppContext } from '../lib/context.js';
import type { Db } from '../lib/db.js';
import { ShellArchiver } from '../lib/extract.js';
import { CdsFetcher } from '../lib/retrieve/fetcher.js';
import { downloadDeps, downloadSelection, type DownloadSummary } from '../lib/retrieve/orchestrator.js';
import { queueSelection } from '../lib/retrieve/queue.js';
import { createSelection, validateSelection, type SelectionRequest } from '../lib/selection.js';
import { listOption, loadContext, withDb } from './runtime.js';

const DownloadOptionsSchema = z.object({
  index: z.string(),
  tstep: z.string(),
  productType: z.array(z.string()).min(1),
  model: listOption,
  experiment: listOption,
  param: listOption,
  format: z.string().default('tgz'),
  queue: z.boolean().default(false),
  urgent: z.boolean().default(false),
});

/** Runs a validated selection against the data store with the production fetcher and archiver. */
export async function runSelection(db: Db, ctx: AppContext, selection: SelectionRequest): Promise<DownloadSummary> {
  const { config, logger } = ctx;
  const metadata = validateSelection(selection, config.datasets.dir, ctx.vocabulary);
  const fetcher = new CdsFetcher({
    credentialsDir: config.storage.credentialsDir,
    pollIntervalMs: config.download.pollIntervalMs,
    logger,
  });
  const deps = downloadDeps(ctx, fetcher, new ShellArchiver(config.commands));
  return downloadSelection(db, ctx, deps, selection, metadata);
}

export function printSummary(summary: DownloadSummary) {
  console.log(`Combinations already complete: ${summary.skipped.length}`);
  console.log(`Requests submitted: ${summary.queued}`);
  console.log(
    `Post-processed: ${summary.counts.postProcessed}, transferred only: ${summary.counts.transferred}, failed: ${summary.counts.failed}`
  );
  for (const o of summary.outcomes) {
    if (o.state !== 'post-processed') console.log(`  ${o.state} ${o.label}${o.error ? `: ${o.error}` : ''}`);
  }
}

export function registerDownloadCommand(program: Command): void {
  program
    .command('download')
    .description('Request missing files for a selection, or queue the selection for a later scan')
    .requiredOption('-i, --index <index>', 'index type (etccdi, hsi)')
    .requiredOption('-t, --tstep <tstep>', 'timestep (yr, mon, day)')
    .requiredOption('-P, --product-type <code...>', 'product codes (bias_adj, raw, b1961_1990, b1981_2010, no-base)')
    .option('-m, --model <model...>', 'models (default: all published for the product)')
    .option('-e, --experiment <experiment...>', 'experiments (default: all)')
    .option('-p, --param <variable...>', 'variables (default: all published for the product)')
    .addOption(new Option('-f, --format <format>', 'archive format').choices(['tgz', 'zip']).default('tgz'))
    .option('-q, --queue', 'write a request file instead of downloading', false)
    .option('-u, --urgent', 'with --queue, put the request in the Urgent queue', false)
    .action(async (_opts: unknown, cmd: Command) => {
      const opts = DownloadOptionsSchema.parse(cmd.opts());
      const ctx = loadContext(cmd);
      const selection = createSelection(
        {
          format: opts.format,
          index: opts.index,
          timestep: opts.tstep,
          products: opts.productType,
          experiments: opts.experiment,
          models: opts.model,
          variables: opts.param,
        },
        ctx.config.datasets.dir,
        ctx.vocabulary
      );

      if (opts.queue) {
        const file = queueSelection(ctx.config, selection, { urgent: opts.urgent });
        console.log(`Queued request ${file}`);
        return;
      }
      if (opts.urgent) ctx.logger.warn('--urgent has no effect without --queue');

      const summary = await withDb(ctx, (db) => runSelection(db, ctx, selection));
      printSummary(summary);
      if (summary.counts.failed > 0) process.exitCode = 1;
    });
}
