import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

const argv = z.array(z.string().min(1)).min(1);
const endpoint = z.union([z.string().min(1), z.number()]).transform((v) => String(v));

const AppConfigSchema = z.object({
  storage: z.object({
    datadir: z.string().min(1),
    staging: z.string().min(1),
    requestdir: z.string().min(1),
    db: z.string().min(1),
    logdir: z.string().min(1),
    credentialsDir: z.string().min(1),
  }),
  datasets: z
    .object({
      dir: z.string().min(1).default('data'),
    })
    .default({}),
  download: z.object({
    concurrency: z.number().int().min(1).max(32).default(4),
    retry: z.number().int().min(0).default(5),
    pollIntervalMs: z.number().int().min(0).default(30_000),
    fileExtension: z.string().regex(/^[A-Za-z0-9]+$/, 'extension without the dot').default('nc'),
    altEndpoints: z.array(endpoint).min(1),
    slowEndpoints: z.array(endpoint).default([]),
    credentials: z.array(endpoint).min(1),
  }),
  commands: z
    .object({
      compress: argv.default(['nccopy', '-d', '5', '-s']),
      untar: argv.default(['tar', '-xzf']),
      unzip: argv.default(['unzip', '-o']),
    })
    .default({}),
  intake: z
    .object({
      basedir: z.string().min(1).optional(),
      output: z.string().min(1).default('catalog_intake.csv'),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return YAML.parse(raw);
}

export function parseConfig(raw: unknown, repoRoot: string): AppConfig {
  const config = AppConfigSchema.parse(raw);
  return {
    ...config,
    datasets: { dir: path.resolve(repoRoot, config.datasets.dir) },
  };
}

export function loadConfig(repoRoot: string): AppConfig {
  const configPath = path.join(repoRoot, 'config.yml');
  if (!fs.existsSync(configPath)) {
    throw new Error(`Missing config.yml at ${configPath}. Copy config.example.yml → config.yml and edit.`);
  }
  return parseConfig(loadYamlFile(configPath), repoRoot);
}

/** Root written in front of each catalog location in the intake export. */
export function intakeBaseDir(config: AppConfig): string {
  return config.intake.basedir ?? config.storage.datadir;
}
