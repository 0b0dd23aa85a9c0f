import type { Dispatcher } from 'undici';

import { downloadToFile } from '../download.js';
import type { Logger } from '../logger.js';
import { CdsApiClient, loadCredentials, type CdsCredentials, type RemoteResource } from './cds.js';
import type { RequestPayload } from './request.js';

export type { RemoteResource };

/** Remote side of a transfer: submit a request, then pull the result in one or more pieces. */
export interface Fetcher {
  retrieve(datasetId: string, payload: RequestPayload, credentialId: string): Promise<RemoteResource>;
  fetch(url: string, outPath: string): Promise<void>;
  /** Appends the bytes missing from `outPath`. */
  resume(url: string, outPath: string): Promise<void>;
}

export interface CdsFetcherOptions {
  credentialsDir: string;
  pollIntervalMs: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export class CdsFetcher implements Fetcher {
  private readonly clients = new Map<string, CdsApiClient>();

  constructor(private readonly opts: CdsFetcherOptions) {}

  async retrieve(datasetId: string, payload: RequestPayload, credentialId: string): Promise<RemoteResource> {
    return this.client(credentialId).retrieve(datasetId, payload);
  }

  async fetch(url: string, outPath: string): Promise<void> {
    await downloadToFile(url, outPath, { dispatcher: this.opts.dispatcher });
  }

  async resume(url: string, outPath: string): Promise<void> {
    const { bytesWritten, resumedFrom } = await downloadToFile(url, outPath, {
      resume: true,
      dispatcher: this.opts.dispatcher,
    });
    this.opts.logger?.debug(`Resumed ${outPath} at ${resumedFrom} bytes, wrote ${bytesWritten}`);
  }

  private client(credentialId: string): CdsApiClient {
    let client = this.clients.get(credentialId);
    if (!client) {
      const creds: CdsCredentials = loadCredentials(this.opts.credentialsDir, credentialId);
      client = new CdsApiClient(creds, {
        pollIntervalMs: this.opts.pollIntervalMs,
        dispatcher: this.opts.dispatcher,
        logger: this.opts.logger,
      });
      this.clients.set(credentialId, client);
    }
    return client;
  }
}
