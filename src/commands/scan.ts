import type { Command } from 'commander';
import { z } from 'zod';

import { updateCatalog } from '../lib/catalog/update.js';
import { SelectionError } from '../lib/errors.js';
import { drainQueue, loadQueuedSelection } from '../lib/retrieve/queue.js';
import { printSummary, runSelection } from './download.js';
import { loadContext, withDb } from './runtime.js';

const ScanOptionsSchema = z.object({
  file: z.string().optional(),
  queue: z.union([z.string().min(1), z.literal(true)]).optional(),
});

export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Replay a queued request file, or drain a queue directory')
    .option('-f, --file <path>', 'queued request file to replay')
    .option('-Q, --queue [priority]', 'drain <requestdir>/<priority> (the request dir itself without a value)')
    .action(async (_opts: unknown, cmd: Command) => {
      const opts = ScanOptionsSchema.parse(cmd.opts());
      if (opts.file === undefined && opts.queue === undefined) {
        throw new SelectionError('scan needs --file or --queue');
      }
      if (opts.file !== undefined && opts.queue !== undefined) {
        throw new SelectionError('scan takes either --file or --queue, not both');
      }

      const ctx = loadContext(cmd);

      await withDb(ctx, async (db) => {
        if (opts.file !== undefined) {
          const selection = loadQueuedSelection(opts.file);
          printSummary(await runSelection(db, ctx, selection));
          return;
        }

        const priority = opts.queue === true ? undefined : opts.queue;
        const drained = await drainQueue(
          ctx.config,
          priority,
          async (selection, file) => {
            console.log(`Replaying ${file}`);
            printSummary(await runSelection(db, ctx, selection));
          },
          ctx.logger
        );
        if (drained.locked) {
          console.log('Another scan holds the queue lock; nothing done.');
          return;
        }

        // Make the new files visible to the next existence check.
        const seen = new Set<string>();
        for (const { selection } of drained.processed) {
          const key = `${selection.index}/${selection.timestep}`;
          if (seen.has(key)) continue;
          seen.add(key);
          const res = updateCatalog(db, ctx, {
            index: selection.index,
            timestep: selection.timestep,
            products: [],
            experiments: [],
            models: [],
          });
          console.log(`Catalog ${key}: ${res.inserted} records inserted`);
        }

        console.log(`Replayed ${drained.processed.length} requests, ${drained.failed.length} failed`);
        if (drained.failed.length > 0) process.exitCode = 1;
      });
    });
}
