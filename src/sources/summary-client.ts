/**
 * Summary API client.
 *
 * Page-number pagination (`?pg=&ppg=`). The API doesn't say how many pages
 * exist, so findLastPage() tries pages 1, 2, 4, 8... until a page comes back empty
 * and then bisects between the last full and first empty page.
 */

import type { RawRecord } from '../types/lot.js';
import type { TokenBucket } from '../lib/rate-limit.js';
import { requestJson, type HttpPolicy } from '../lib/source-http.js';
import type { Logger } from '../lib/run-logger.js';
import type { SourceClient, SourcePage } from './types.js';

export type SummaryCursor = {
  page: number;
  pageSize: number;
};

export type SummaryClientOptions = {
  baseUrl: string;
  pageSize: number;
  maxPages: number;
  limiter: TokenBucket;
  http: HttpPolicy;
  logger?: Logger;
};

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `{ data: [...] }`, `{ lots: [...] }` or a bare array */
export function extractSummaryRecords(body: unknown): RawRecord[] {
  let list: unknown = body;
  if (isRecord(body)) list = body.data ?? body.lots ?? [];
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

export class SummaryClient implements SourceClient<SummaryCursor> {
  readonly source = 'summary' as const;

  private lastPage: number | null = null;
  private readonly baseUrl: string;

  constructor(private readonly options: SummaryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  /** Last non-empty page found by the most recent findLastPage(), if any */
  get knownLastPage(): number | null {
    return this.lastPage;
  }

  firstCursor(): SummaryCursor {
    return { page: 1, pageSize: this.options.pageSize };
  }

  private async fetchRecords(cursor: SummaryCursor, signal?: AbortSignal): Promise<RawRecord[]> {
    const url = `${this.baseUrl}/lots?pg=${cursor.page}&ppg=${cursor.pageSize}`;
    const body = await requestJson({
      source: this.source,
      url,
      init: { method: 'GET', headers: { Accept: 'application/json' } },
      limiter: this.options.limiter,
      policy: this.options.http,
      signal,
      logger: this.options.logger,
    });
    return extractSummaryRecords(body);
  }

  async fetchPage(cursor: SummaryCursor, signal?: AbortSignal): Promise<SourcePage<SummaryCursor>> {
    const records = await this.fetchRecords(cursor, signal);

    const belowLast =
      this.lastPage !== null ? cursor.page < this.lastPage : records.length >= cursor.pageSize;
    const hasMore = records.length > 0 && belowLast && cursor.page < this.options.maxPages;

    return {
      records,
      hasMore,
      nextCursor: hasMore ? { page: cursor.page + 1, pageSize: cursor.pageSize } : null,
    };
  }

  /**
   * Highest page number that still returns records, 0 when page 1 is empty.
   * Never requests a page past maxPages.
   */
  async findLastPage(pageSize = this.options.pageSize, signal?: AbortSignal): Promise<number> {
    const maxPages = this.options.maxPages;
    const isEmpty = async (page: number) => (await this.fetchRecords({ page, pageSize }, signal)).length === 0;

    if (await isEmpty(1)) {
      this.lastPage = 0;
      return 0;
    }

    // lo: known non-empty, hi: known empty (or past the cap)
    let lo = 1;
    let hi = 2;
    while (hi <= maxPages && !(await isEmpty(hi))) {
      lo = hi;
      hi *= 2;
    }

    if (hi > maxPages) {
      if (lo === maxPages || !(await isEmpty(maxPages))) {
        this.lastPage = maxPages;
        return maxPages;
      }
      hi = maxPages;
    }

    while (hi - lo > 1) {
      const mid = Math.floor((lo + hi) / 2);
      if (await isEmpty(mid)) hi = mid;
      else lo = mid;
    }

    this.options.logger?.debug(`last page is ${lo}`, { pageSize });
    this.lastPage = lo;
    return lo;
  }
}
