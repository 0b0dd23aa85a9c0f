import fs from 'node:fs';
import path from 'node:path';
import { request, type Dispatcher } from 'undici';
import { z } from 'zod';

import { loadYamlFile } from '../config.js';
import { errorMessage, LookupError, ProviderError } from '../errors.js';
import type { Logger } from '../logger.js';
import { backoffMs, sleep } from '../sleep.js';
import type { RequestPayload } from './request.js';

const CredentialsSchema = z.object({
  url: z.string().url(),
  key: z.string().regex(/^[^:]+:.+$/, 'expected <uid>:<api-key>'),
});

export type CdsCredentials = z.infer<typeof CredentialsSchema>;

/** Reads `<dir>/.cdsapirc<id>`, the per-account credential file. */
export function loadCredentials(dir: string, id: string): CdsCredentials {
  const file = path.join(dir, `.cdsapirc${id}`);
  if (!fs.existsSync(file)) throw new LookupError('credential file', file);
  return CredentialsSchema.parse(loadYamlFile(file));
}

const TaskReplySchema = z
  .object({
    state: z.string(),
    request_id: z.string().optional(),
    location: z.string().optional(),
    content_length: z.number().int().nonnegative().optional(),
    error: z
      .object({
        message: z.string().optional(),
        reason: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type TaskReply = z.infer<typeof TaskReplySchema>;

/** Where the finished result can be fetched and how big it is. */
export interface RemoteResource {
  location: string;
  contentLength: number;
}

export interface CdsClientOptions {
  pollIntervalMs: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
  /** Attempts per HTTP call on network errors and 5xx replies. */
  maxAttempts?: number;
  backoffBaseMs?: number;
}

/**
 * Minimal client for the data store's task API: submit a request, poll the
 * task until it completes, hand back the result location.
 */
export class CdsApiClient {
  private readonly baseUrl: string;
  private readonly auth: string;

  constructor(
    credentials: CdsCredentials,
    private readonly opts: CdsClientOptions
  ) {
    this.baseUrl = credentials.url.replace(/\/+$/, '');
    this.auth = `Basic ${Buffer.from(credentials.key).toString('base64')}`;
  }

  async retrieve(datasetId: string, payload: RequestPayload): Promise<RemoteResource> {
    let reply = await this.call('POST', `/resources/${encodeURIComponent(datasetId)}`, payload);

    while (reply.state === 'queued' || reply.state === 'running') {
      const id = reply.request_id;
      if (!id) throw new ProviderError(`Task reply without request_id (state ${reply.state})`);
      this.opts.logger?.debug(`Request ${id} is ${reply.state}`);
      await sleep(this.opts.pollIntervalMs);
      reply = await this.call('GET', `/tasks/${encodeURIComponent(id)}`);
    }

    if (reply.state === 'completed') {
      if (!reply.location || reply.content_length === undefined) {
        throw new ProviderError('Completed task reply is missing location or content_length');
      }
      return {
        location: new URL(reply.location, `${this.baseUrl}/`).toString(),
        contentLength: reply.content_length,
      };
    }

    const why = [reply.error?.message, reply.error?.reason].filter(Boolean).join(': ');
    throw new ProviderError(`Request ${reply.request_id ?? ''} ${reply.state}${why ? `: ${why}` : ''}`.trim());
  }

  private async call(method: 'GET' | 'POST', route: string, body?: unknown): Promise<TaskReply> {
    const maxAttempts = this.opts.maxAttempts ?? 3;
    const url = `${this.baseUrl}${route}`;

    for (let attempt = 1; ; attempt += 1) {
      let statusCode: number;
      let text: string;
      try {
        const res = await request(url, {
          method,
          dispatcher: this.opts.dispatcher,
          headers: {
            authorization: this.auth,
            'content-type': 'application/json',
          },
          body: body === undefined ? undefined : JSON.stringify(body),
        });
        statusCode = res.statusCode;
        text = await res.body.text();
      } catch (err) {
        if (attempt >= maxAttempts) {
          throw new ProviderError(`${method} ${url} failed (attempt ${attempt}): ${errorMessage(err)}`);
        }
        await sleep(backoffMs(attempt, this.opts.backoffBaseMs));
        continue;
      }

      if (statusCode >= 500 && attempt < maxAttempts) {
        await sleep(backoffMs(attempt, this.opts.backoffBaseMs));
        continue;
      }
      if (statusCode >= 400) {
        throw new ProviderError(`${method} ${url} returned ${statusCode}: ${errorText(text)}`, statusCode);
      }
      return TaskReplySchema.parse(JSON.parse(text));
    }
  }
}

function errorText(text: string): string {
  try {
    const parsed = TaskReplySchema.partial().parse(JSON.parse(text));
    return parsed.error?.message ?? text;
  } catch {
    return text;
  }
}
