import path from 'node:path';
import readline from 'node:readline/promises';
import { Option, type Command } from 'commander';
import { z } from 'zod';

import { deleteRecords, type ConfirmFn } from '../lib/catalog/delete.js';
import { writeIntake } from '../lib/catalog/intake.js';
import { modelStats } from '../lib/catalog/stats.js';
import { countRecords } from '../lib/catalog/store.js';
import { updateCatalog } from '../lib/catalog/update.js';
import { intakeBaseDir } from '../lib/config.js';
import type { AppContext } from '../lib/context.js';
import { loadDatasetMetadata } from '../lib/datasets.js';
import type { Db } from '../lib/db.js';
import { SelectionError } from '../lib/errors.js';
import { expandProduct } from '../lib/naming/products.js';
import type { IndexType, Timestep } from '../lib/types.js';
import { listOption, loadContext, parseIndexTimestep, withDb } from './runtime.js';

export const DB_ACTIONS = ['update', 'delete', 'list', 'intake'] as const;

const DbOptionsSchema = z.object({
  index: z.string(),
  tstep: z.string(),
  productType: listOption,
  experiment: listOption,
  model: listOption,
  param: listOption,
  action: z.enum(DB_ACTIONS).default('update'),
  verbose: z.boolean().default(false),
});

interface DbArgs {
  index: IndexType;
  timestep: Timestep;
  products: string[];
  experiments: string[];
  models: string[];
  variables: string[];
  verbose: boolean;
}

async function askYes(prompt: string, selected: string[]): Promise<boolean> {
  console.log('Selected records in db:');
  for (const f of selected) console.log(`  ${f}`);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(prompt);
    return answer.trim() === 'Y';
  } finally {
    rl.close();
  }
}

function runUpdate(db: Db, ctx: AppContext, args: DbArgs) {
  const res = updateCatalog(db, ctx, args);
  console.log(`Files already in db: ${res.alreadyCataloged}`);
  console.log(`New files found: ${res.newFiles}`);
  console.log(`Records inserted: ${res.inserted}`);
  if (res.rejected.length > 0) console.log(`Files skipped: ${res.rejected.length}`);
}

async function runDelete(db: Db, ctx: AppContext, args: DbArgs, confirm: ConfirmFn) {
  const [product, ...rest] = args.products;
  if (product === undefined || rest.length > 0) {
    throw new SelectionError('delete needs exactly one product');
  }
  const results = await deleteRecords(db, ctx, { ...args, product }, confirm);
  for (const r of results) {
    const what = r.confirmed ? `deleted ${r.deleted}` : `kept ${r.selected.length}`;
    console.log(`${r.location}: ${what} records`);
  }
}

function runList(db: Db, ctx: AppContext, args: DbArgs) {
  const products =
    args.products.length > 0
      ? args.products
      : loadDatasetMetadata(ctx.config.datasets.dir, args.index, args.timestep).product_type;

  console.log(`Catalog holds ${countRecords(db)} records`);
  for (const p of modelStats(db, ctx, { ...args, products })) {
    console.log(`${p.product}: ${p.variables.length} variables, about ${p.expectedPerEnsemble} files per model`);
    for (const m of p.models) {
      console.log(`  ${m.model}: ${m.cataloged.length} files, ${m.missing.length} variables missing`);
      if (!args.verbose) continue;
      for (const f of m.cataloged) console.log(`    ${f}`);
      for (const miss of m.missing) console.log(`    missing ${miss.variable}`);
    }
  }
}

function runIntake(db: Db, ctx: AppContext) {
  const out = path.resolve(ctx.config.intake.output);
  const rows = writeIntake(db, intakeBaseDir(ctx.config), out);
  console.log(`Wrote ${rows} rows to ${out}`);
}

export function registerDbCommand(program: Command): void {
  program
    .command('db')
    .description('Update, list, delete or export catalog records')
    .requiredOption('-i, --index <index>', 'index type (etccdi, hsi)')
    .requiredOption('-t, --tstep <tstep>', 'timestep (yr, mon, day)')
    .option('-P, --product-type <code...>', 'product codes')
    .option('-e, --experiment <experiment...>', 'experiments')
    .option('-m, --model <model...>', 'models')
    .option('-p, --param <variable...>', 'variables (list only)')
    .addOption(new Option('-a, --action <action>', 'what to do').choices(DB_ACTIONS).default('update'))
    .option('-v, --verbose', 'list filenames', false)
    .action(async (_opts: unknown, cmd: Command) => {
      const opts = DbOptionsSchema.parse(cmd.opts());
      const { index, timestep } = parseIndexTimestep(opts.index, opts.tstep);
      const ctx = loadContext(cmd);
      const args: DbArgs = {
        index,
        timestep,
        products: opts.productType.map(expandProduct),
        experiments: opts.experiment,
        models: opts.model,
        variables: opts.param,
        verbose: opts.verbose,
      };

      await withDb(ctx, async (db) => {
        switch (opts.action) {
          case 'update':
            runUpdate(db, ctx, args);
            break;
          case 'delete':
            await runDelete(db, ctx, args, askYes);
            break;
          case 'list':
            runList(db, ctx, args);
            break;
          case 'intake':
            runIntake(db, ctx);
            break;
        }
      });
    });
}
