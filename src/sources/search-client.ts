/**
 * Search service client (Typesense multi_search).
 *
 * One cursor stream per search term. Offsets are converted to Typesense's
 * 1-based page numbers; the service stops serving results past maxDepth.
 */

import { z } from 'zod';
import type { RawRecord } from '../types/lot.js';
import type { TokenBucket } from '../lib/rate-limit.js';
import { requestJson, type HttpPolicy } from '../lib/source-http.js';
import type { Logger } from '../lib/run-logger.js';
import { SourceError, SourceErrorCode, type SourceClient, type SourcePage } from './types.js';

export type SearchTerm = {
  /** Stream name in logs and run stats */
  label: string;
  q: string;
  sortBy?: string;
  filterBy?: string;
};

export type SearchCursor = {
  term: SearchTerm;
  offset: number;
  limit: number;
};

export type SearchClientOptions = {
  host: string;
  apiKey: string;
  collection: string;
  pageSize: number;
  maxDepth: number;
  /** Warehouse locations to scope every query to; empty = all */
  locations: string[];
  limiter: TokenBucket;
  http: HttpPolicy;
  logger?: Logger;
};

const QUERY_BY = 'product_name,category,brand,auction_title';
const DEFAULT_SORT = 'ranking_weight:desc';

const MultiSearchResponse = z.object({
  results: z
    .array(
      z.object({
        found: z.number().optional(),
        hits: z.array(z.object({ document: z.record(z.unknown()) })).optional(),
        error: z.string().optional(),
        code: z.number().optional(),
      }),
    )
    .min(1),
});

function quoteValue(value: string): string {
  return '`' + value.replace(/`/g, '') + '`';
}

export function buildFilter(locations: readonly string[], extra?: string): string {
  const parts = ['is_open:=1'];
  if (locations.length > 0) {
    parts.push(`auction_location:=[${locations.map(quoteValue).join(',')}]`);
  }
  if (extra?.trim()) parts.push(extra.trim());
  return parts.join(' && ');
}

export class SearchClient implements SourceClient<SearchCursor> {
  readonly source = 'search' as const;
  private readonly host: string;

  constructor(private readonly options: SearchClientOptions) {
    this.host = options.host.replace(/\/$/, '');
  }

  firstCursor(term: SearchTerm): SearchCursor {
    return { term, offset: 0, limit: this.options.pageSize };
  }

  async fetchPage(cursor: SearchCursor, signal?: AbortSignal): Promise<SourcePage<SearchCursor>> {
    const { term, offset, limit } = cursor;
    const page = Math.floor(offset / limit) + 1;
    const url = `${this.host}/multi_search`;

    const body = await requestJson({
      source: this.source,
      url,
      init: {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-TYPESENSE-API-KEY': this.options.apiKey,
        },
        body: JSON.stringify({
          searches: [
            {
              collection: this.options.collection,
              q: term.q,
              query_by: QUERY_BY,
              filter_by: buildFilter(this.options.locations, term.filterBy),
              sort_by: term.sortBy ?? DEFAULT_SORT,
              page,
              per_page: limit,
            },
          ],
        }),
      },
      limiter: this.options.limiter,
      policy: this.options.http,
      signal,
      logger: this.options.logger,
    });

    const parsed = MultiSearchResponse.safeParse(body);
    if (!parsed.success) {
      throw new SourceError(SourceErrorCode.DEGRADED, `search returned an unexpected body for "${term.label}"`, {
        source: this.source,
        url,
      });
    }

    const result = parsed.data.results[0];
    if (result.error) {
      throw new SourceError(SourceErrorCode.PERMANENT, `search rejected "${term.label}": ${result.error}`, {
        source: this.source,
        status: result.code,
        url,
      });
    }

    const records: RawRecord[] = (result.hits ?? []).map((hit) => hit.document);
    const found = result.found ?? 0;
    const nextOffset = offset + limit;
    const hasMore = records.length === limit && nextOffset < found && nextOffset < this.options.maxDepth;

    return {
      records,
      hasMore,
      nextCursor: hasMore ? { term, offset: nextOffset, limit } : null,
    };
  }
}
