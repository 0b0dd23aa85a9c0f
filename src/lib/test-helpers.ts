import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { parseConfig, type AppConfig } from './config.js';
import { createContext, type AppContext } from './context.js';
import { ensureSchema, openDb, type Db } from './db.js';
import { silentLogger } from './logger.js';

/** The dataset tables shipped in `data/`. */
export const DATA_DIR = fileURLToPath(new URL('../../data', import.meta.url));

export function mkTmpDir() {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'cds-index-fetch-test-'));
}

export function testConfig(root: string): AppConfig {
  return parseConfig(
    {
      storage: {
        datadir: path.join(root, 'data'),
        staging: path.join(root, 'staging'),
        requestdir: path.join(root, 'requests'),
        db: path.join(root, 'catalog.sqlite'),
        logdir: path.join(root, 'log'),
        credentialsDir: path.join(root, 'creds'),
      },
      datasets: { dir: DATA_DIR },
      download: {
        concurrency: 2,
        retry: 3,
        pollIntervalMs: 0,
        altEndpoints: ['110', '111'],
        slowEndpoints: ['105'],
        credentials: ['1', '2'],
      },
    },
    root
  );
}

export function testContext(root: string, config = testConfig(root)): AppContext {
  return createContext(config, silentLogger());
}

export function testDb(root: string): Db {
  const db = openDb(path.join(root, 'catalog.sqlite'));
  ensureSchema(db);
  return db;
}

/** Writes a file under `<datadir>/<location>/` and returns its path. */
export function writeDataFile(config: AppConfig, location: string, filename: string, content = 'netcdf'): string {
  const dir = path.join(config.storage.datadir, ...location.split('/'));
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, filename);
  fs.writeFileSync(file, content);
  return file;
}

/** A monthly ETCCDI filename in the layout the data store publishes. */
export function etccdiFilename(code: string, model: string, experiment: string, product: string, timestep = 'mon'): string {
  return `${code}ETCCDI_${timestep}_${model}_${experiment}_r1i1p1f1_${product}_v20191108_201501-210012_v1-0.nc`;
}
