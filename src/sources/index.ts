// src/sources/index.ts
/**
 * Source Client Registry
 *
 * Builds the channel clients that have endpoints configured, each with its
 * own token bucket so every stream of a channel shares one rate limit.
 */

import type { AppConfig } from '../config.js';
import type { SourceTag } from '../types/lot.js';
import { TokenBucket } from '../lib/rate-limit.js';
import type { Logger } from '../lib/run-logger.js';
import { RenderedPageClient } from './rendered-page-client.js';
import { SearchClient } from './search-client.js';
import { SummaryClient } from './summary-client.js';

export type SourceClients = {
  summary: SummaryClient | null;
  search: SearchClient | null;
  rendered: RenderedPageClient | null;
};

export function createSourceClients(c: AppConfig, logger?: Logger): SourceClients {
  const summary = c.summary.baseUrl
    ? new SummaryClient({
        baseUrl: c.summary.baseUrl,
        pageSize: c.summary.pageSize,
        maxPages: c.summary.maxPages,
        limiter: new TokenBucket({ ratePerSec: c.summary.ratePerSec, burst: c.summary.burst }),
        http: c.http,
        logger,
      })
    : null;

  const search =
    c.search.host && c.search.apiKey
      ? new SearchClient({
          host: c.search.host,
          apiKey: c.search.apiKey,
          collection: c.search.collection,
          pageSize: c.search.pageSize,
          maxDepth: c.search.maxDepth,
          locations: c.search.locations,
          limiter: new TokenBucket({ ratePerSec: c.search.ratePerSec, burst: c.search.burst }),
          http: c.http,
          logger,
        })
      : null;

  const rendered = c.rendered.baseUrl
    ? new RenderedPageClient({
        baseUrl: c.rendered.baseUrl,
        limiter: new TokenBucket({ ratePerSec: c.rendered.ratePerSec, burst: c.rendered.burst }),
        http: c.http,
        logger,
      })
    : null;

  return { summary, search, rendered };
}

/**
 * List channels with a client
 */
export function enabledSources(clients: SourceClients): SourceTag[] {
  const out: SourceTag[] = [];
  if (clients.summary) out.push('summary');
  if (clients.search) out.push('search');
  if (clients.rendered) out.push('rendered');
  return out;
}
