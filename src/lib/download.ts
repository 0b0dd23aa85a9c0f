import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { request, type Dispatcher } from 'undici';

import { ProviderError } from './errors.js';
import { ensureDir, stagedSize } from './storage.js';

export interface DownloadOptions {
  /** Continue from the current size of `outPath` with a Range request. */
  resume?: boolean;
  dispatcher?: Dispatcher;
  timeoutMs?: number;
}

export interface DownloadResult {
  bytesWritten: number;
  resumedFrom: number;
}

export async function downloadToFile(url: string, outPath: string, opts: DownloadOptions = {}): Promise<DownloadResult> {
  const { resume = false, dispatcher, timeoutMs = 10 * 60_000 } = opts;
  ensureDir(path.dirname(outPath));

  const offset = resume ? stagedSize(outPath) : 0;
  const headers: Record<string, string> = {
    'User-Agent': 'cds-index-fetch',
  };
  if (offset > 0) headers.range = `bytes=${offset}-`;

  const { body, statusCode } = await request(url, {
    method: 'GET',
    headers,
    dispatcher,
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
  });

  // Range starts at or past the end: nothing left to fetch.
  if (statusCode === 416 && offset > 0) {
    await body.dump();
    return { bytesWritten: 0, resumedFrom: offset };
  }

  if (statusCode < 200 || statusCode >= 300) {
    await body.dump();
    throw new ProviderError(`Download failed: ${statusCode} for ${url}`, statusCode);
  }

  // A 200 to a ranged request means the server ignored the range; start over.
  const append = offset > 0 && statusCode === 206;
  await pipeline(body, fs.createWriteStream(outPath, { flags: append ? 'a' : 'w' }));

  const resumedFrom = append ? offset : 0;
  return { bytesWritten: stagedSize(outPath) - resumedFrom, resumedFrom };
}
