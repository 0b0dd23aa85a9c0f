import path from 'node:path';
import type { Command } from 'commander';
import { z } from 'zod';

import { loadConfig } from '../lib/config.js';
import { createContext, type AppContext } from '../lib/context.js';
import { indexDefinition, isTimestep } from '../lib/datasets.js';
import { ensureSchema, openDb, type Db } from '../lib/db.js';
import { SelectionError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { IndexType, Timestep } from '../lib/types.js';

const GlobalOptionsSchema = z.object({ debug: z.boolean().default(false) }).passthrough();

/** Config, vocabulary and logger for one command run, from `config.yml` in the cwd. */
export function loadContext(cmd: Command): AppContext {
  const { debug } = GlobalOptionsSchema.parse(cmd.optsWithGlobals());
  const config = loadConfig(path.resolve(process.cwd()));
  const logger = createLogger({ debug, logDir: config.storage.logdir });
  return createContext(config, logger);
}

export async function withDb<T>(ctx: AppContext, fn: (db: Db) => Promise<T>): Promise<T> {
  const db = openDb(ctx.config.storage.db);
  try {
    ensureSchema(db);
    return await fn(db);
  } finally {
    db.sqlite.close();
  }
}

/** Index and timestep from the command line, rejected before any work is done. */
export function parseIndexTimestep(index: string, timestep: string): { index: IndexType; timestep: Timestep } {
  const def = indexDefinition(index);
  if (!isTimestep(timestep) || !def.timesteps.includes(timestep)) {
    throw new SelectionError(`Timestep ${timestep} not available for ${index} product`);
  }
  return { index: def.name, timestep };
}

export const listOption = z.array(z.string().min(1)).default([]);
