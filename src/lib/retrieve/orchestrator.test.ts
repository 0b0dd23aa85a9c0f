import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';

import { countRecords } from '../catalog/store.js';
import { updateCatalog } from '../catalog/update.js';
import type { AppContext } from '../context.js';
import type { Db } from '../db.js';
import { ProviderError, TransferError } from '../errors.js';
import type { Archiver } from '../extract.js';
import { silentLogger } from '../logger.js';
import type { SelectionRequest } from '../selection.js';
import { etccdiFilename, mkTmpDir, testContext, testDb, writeDataFile } from '../test-helpers.js';
import type { Fetcher, RemoteResource } from './fetcher.js';
import {
  downloadSelection,
  planDownloads,
  rewriteEndpoint,
  runDownloads,
  runTask,
  transferWithResume,
  type DownloadDeps,
  type TransferTask,
} from './orchestrator.js';
import type { RequestPayload } from './request.js';

const SLOW_URL = 'https://136.156.133.105/cache-compute-0001/result.tgz';

interface FakePlan {
  size: number;
  firstChunk: number;
  resumeChunk: number;
  rejects?: (payload: RequestPayload) => boolean;
  delayMs?: number;
}

class FakeFetcher implements Fetcher {
  readonly retrieved: { datasetId: string; credentialId: string; payload: RequestPayload }[] = [];
  readonly fetched: string[] = [];
  resumes = 0;
  active = 0;
  maxActive = 0;

  constructor(private readonly plan: FakePlan) {}

  async retrieve(datasetId: string, payload: RequestPayload, credentialId: string): Promise<RemoteResource> {
    this.retrieved.push({ datasetId, credentialId, payload });
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.plan.delayMs) await new Promise((r) => setTimeout(r, this.plan.delayMs));
      if (this.plan.rejects?.(payload)) throw new ProviderError('request rejected');
      return { location: SLOW_URL, contentLength: this.plan.size };
    } finally {
      this.active -= 1;
    }
  }

  async fetch(url: string, outPath: string): Promise<void> {
    this.fetched.push(url);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, Buffer.alloc(this.plan.firstChunk));
  }

  async resume(_url: string, outPath: string): Promise<void> {
    this.resumes += 1;
    fs.appendFileSync(outPath, Buffer.alloc(this.plan.resumeChunk));
  }
}

class FakeArchiver implements Archiver {
  readonly calls: string[] = [];

  constructor(private readonly fails = false) {}

  async compress(src: string, destFile: string) {
    this.record(`compress ${path.basename(src)} ${path.basename(destFile)}`);
  }

  async untar(archive: string) {
    this.record(`untar ${path.basename(archive)}`);
  }

  async unzip(archive: string) {
    this.record(`unzip ${path.basename(archive)}`);
  }

  private record(call: string) {
    this.calls.push(call);
    if (this.fails) throw new Error('tar: unexpected end of file');
  }
}

function deps(fetcher: Fetcher, archiver: Archiver, overrides: Partial<DownloadDeps> = {}): DownloadDeps {
  return {
    fetcher,
    archiver,
    logger: silentLogger(),
    retry: 3,
    slowEndpoints: ['105'],
    concurrency: 2,
    ...overrides,
  };
}

describe('download orchestrator', () => {
  let root: string;

  beforeEach(() => {
    root = mkTmpDir();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function task(id: number, name = `task${id}.tgz`, model = 'canesm5'): TransferTask {
    return {
      id,
      label: `etccdi/base_independent/yr/historical/${model}`,
      datasetId: 'sis-extreme-indices-cmip6',
      payload: {
        format: 'tgz',
        variable: ['frost_days'],
        product_type: 'base_independent',
        model,
        experiment: 'historical',
        period: '1850_2014',
        ensemble_member: 'r1i1p1f1',
        temporal_aggregation: 'yearly',
        version: '2_0',
      },
      stagingPath: path.join(root, 'staging', name),
      destinationDir: path.join(root, 'data'),
      endpoint: id % 2 === 0 ? '110' : '111',
      credentialId: id % 2 === 0 ? '1' : '2',
    };
  }

  describe('rewriteEndpoint', () => {
    it('swaps a slow host for the task endpoint', () => {
      expect(rewriteEndpoint(SLOW_URL, ['105'], '111')).toBe('https://136.156.133.111/cache-compute-0001/result.tgz');
    });

    it('leaves other hosts alone', () => {
      expect(rewriteEndpoint('https://136.156.133.107/x.tgz', ['105'], '111')).toBe('https://136.156.133.107/x.tgz');
    });
  });

  describe('transferWithResume', () => {
    it('stops at exactly the retry ceiling when the size is never reached', async () => {
      const fetcher = new FakeFetcher({ size: 10, firstChunk: 3, resumeChunk: 0 });
      const staged = path.join(root, 'never.tgz');

      await expect(transferWithResume(fetcher, SLOW_URL, staged, 10, 4, silentLogger())).rejects.toThrow(
        new TransferError('Staged 3 of 10 bytes after 4 resumes')
      );
      expect(fetcher.resumes).toBe(4);
    });

    it('resumes until the size matches', async () => {
      const fetcher = new FakeFetcher({ size: 10, firstChunk: 4, resumeChunk: 3 });
      const staged = path.join(root, 'partial.tgz');

      expect(await transferWithResume(fetcher, SLOW_URL, staged, 10, 5, silentLogger())).toBe(2);
      expect(fs.statSync(staged).size).toBe(10);
    });

    it('does not resume a complete first transfer', async () => {
      const fetcher = new FakeFetcher({ size: 10, firstChunk: 10, resumeChunk: 1 });
      expect(await transferWithResume(fetcher, SLOW_URL, path.join(root, 'full.tgz'), 10, 5, silentLogger())).toBe(0);
      expect(fetcher.resumes).toBe(0);
    });

    it('fails without resuming when the retry ceiling is zero', async () => {
      const fetcher = new FakeFetcher({ size: 10, firstChunk: 2, resumeChunk: 8 });
      await expect(transferWithResume(fetcher, SLOW_URL, path.join(root, 'zero.tgz'), 10, 0, silentLogger())).rejects.toThrow(
        TransferError
      );
      expect(fetcher.resumes).toBe(0);
    });
  });

  describe('runTask', () => {
    it('transfers, rewrites the slow endpoint and post-processes', async () => {
      const fetcher = new FakeFetcher({ size: 8, firstChunk: 8, resumeChunk: 0 });
      const archiver = new FakeArchiver();

      const outcome = await runTask(deps(fetcher, archiver), task(1));

      expect(outcome).toEqual({
        id: 1,
        label: 'etccdi/base_independent/yr/historical/canesm5',
        state: 'post-processed',
        stagingPath: path.join(root, 'staging', 'task1.tgz'),
        resumes: 0,
      });
      expect(fetcher.retrieved[0]?.credentialId).toBe('2');
      expect(fetcher.fetched).toEqual(['https://136.156.133.111/cache-compute-0001/result.tgz']);
      expect(archiver.calls).toEqual(['untar task1.tgz']);
    });

    it('keeps the transferred state and the staged file when post-processing fails', async () => {
      const fetcher = new FakeFetcher({ size: 8, firstChunk: 8, resumeChunk: 0 });

      const outcome = await runTask(deps(fetcher, new FakeArchiver(true)), task(0, 'broken.zip'));

      expect(outcome.state).toBe('transferred');
      expect(outcome.error).toBe('tar: unexpected end of file');
      expect(fs.existsSync(outcome.stagingPath)).toBe(true);
    });

    it('fails the task when the request is rejected', async () => {
      const fetcher = new FakeFetcher({ size: 8, firstChunk: 8, resumeChunk: 0, rejects: () => true });
      const archiver = new FakeArchiver();

      const outcome = await runTask(deps(fetcher, archiver), task(0));

      expect(outcome).toMatchObject({ state: 'failed', error: 'request rejected', resumes: 0 });
      expect(fetcher.fetched).toEqual([]);
      expect(archiver.calls).toEqual([]);
    });

    it('skips post-processing for unknown extensions', async () => {
      const fetcher = new FakeFetcher({ size: 1, firstChunk: 1, resumeChunk: 0 });
      const archiver = new FakeArchiver();

      const outcome = await runTask(deps(fetcher, archiver), task(0, 'result.grib'));

      expect(outcome.state).toBe('post-processed');
      expect(archiver.calls).toEqual([]);
    });
  });

  describe('runDownloads', () => {
    it('keeps going after a failed task and reports outcomes in task order', async () => {
      const fetcher = new FakeFetcher({
        size: 4,
        firstChunk: 4,
        resumeChunk: 0,
        rejects: (p) => p.model === 'miroc6',
        delayMs: 5,
      });
      const tasks = [task(0), task(1, 'task1.tgz', 'miroc6'), task(2), task(3), task(4)];

      const { outcomes, counts } = await runDownloads(deps(fetcher, new FakeArchiver()), tasks);

      expect(outcomes.map((o) => [o.id, o.state])).toEqual([
        [0, 'post-processed'],
        [1, 'failed'],
        [2, 'post-processed'],
        [3, 'post-processed'],
        [4, 'post-processed'],
      ]);
      expect(counts).toEqual({ postProcessed: 4, transferred: 0, failed: 1 });
      expect(fetcher.maxActive).toBe(2);
      expect(fetcher.retrieved.map((r) => r.credentialId)).toEqual(['1', '2', '1', '2', '1']);
    });
  });

  describe('planning against the catalog', () => {
    let ctx: AppContext;
    let db: Db;

    const selection: SelectionRequest = {
      format: 'tgz',
      index: 'etccdi',
      timestep: 'mon',
      products: ['base_period_1981_2010'],
      experiments: ['historical', 'ssp5_8_5'],
      models: ['bcc_csm2_mr', 'canesm5'],
      variables: ['warm_nights', 'cold_nights'],
    };

    beforeEach(() => {
      ctx = testContext(root);
      db = testDb(root);
      const loc = (exp: string) => `etccdi/base_period_1981_2010/mon/${exp}/BCC-CSM2-MR`;
      writeDataFile(ctx.config, loc('historical'), etccdiFilename('tn90p', 'BCC-CSM2-MR', 'historical', 'b1981-2010'));
      writeDataFile(ctx.config, loc('historical'), etccdiFilename('tn10p', 'BCC-CSM2-MR', 'historical', 'b1981-2010'));
      writeDataFile(ctx.config, loc('ssp5_8_5'), etccdiFilename('tn90p', 'BCC-CSM2-MR', 'ssp585', 'b1981-2010'));
      updateCatalog(db, ctx);
    });

    afterEach(() => {
      db.sqlite.close();
    });

    it('skips complete combinations and requests only missing variables', () => {
      const { tasks, skipped } = planDownloads(db, ctx, selection);

      expect(skipped.map((s) => s.label)).toEqual(['etccdi/base_period_1981_2010/mon/historical/bcc_csm2_mr']);
      expect(tasks.map((t) => [t.id, t.label, t.payload.variable, t.endpoint, t.credentialId])).toEqual([
        [0, 'etccdi/base_period_1981_2010/mon/historical/canesm5', ['warm_nights', 'cold_nights'], '110', '1'],
        [1, 'etccdi/base_period_1981_2010/mon/ssp5_8_5/bcc_csm2_mr', ['cold_nights'], '111', '2'],
        [2, 'etccdi/base_period_1981_2010/mon/ssp5_8_5/canesm5', ['warm_nights', 'cold_nights'], '110', '1'],
      ]);
      expect(tasks[1]?.datasetId).toBe('sis-extreme-indices-cmip6');
      expect(tasks[1]?.payload.period).toBe('2015_2100');
      expect(tasks[0]?.payload.period).toBe('1850_2014');
    });

    it('creates staging and destination directories before dispatch', () => {
      const { tasks } = planDownloads(db, ctx, selection);
      for (const t of tasks) {
        expect(fs.statSync(path.dirname(t.stagingPath)).isDirectory()).toBe(true);
        expect(fs.statSync(t.destinationDir).isDirectory()).toBe(true);
      }
      expect(tasks[0]?.stagingPath).toBe(
        path.join(
          root,
          'staging',
          'etccdi',
          'base_period_1981_2010',
          'mon',
          'historical',
          'CanESM5',
          'etccdi_base_period_1981_2010_mon_historical_canesm5.tgz'
        )
      );
    });

    it('downloads a selection without touching the catalog', async () => {
      const fetcher = new FakeFetcher({ size: 6, firstChunk: 2, resumeChunk: 2 });
      const archiver = new FakeArchiver();

      const summary = await downloadSelection(db, ctx, deps(fetcher, archiver), selection);

      expect(summary.queued).toBe(3);
      expect(summary.skipped).toHaveLength(1);
      expect(summary.counts).toEqual({ postProcessed: 3, transferred: 0, failed: 0 });
      expect(summary.outcomes.map((o) => o.resumes)).toEqual([2, 2, 2]);
      expect(archiver.calls).toHaveLength(3);
      expect(countRecords(db)).toBe(3);
    });
  });
});
