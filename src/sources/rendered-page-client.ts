/**
 * Rendered lot page client.
 *
 * Lot pages are server-rendered; the live lot (bids, open state) sits in the
 * page's `__NEXT_DATA__` JSON block. This is the most authoritative bid
 * channel and the only one that needs an authenticated session.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { RawRecord } from '../types/lot.js';
import type { AuthSession } from '../lib/auth-session.js';
import type { TokenBucket } from '../lib/rate-limit.js';
import { requestText, type HttpPolicy } from '../lib/source-http.js';
import type { Logger } from '../lib/run-logger.js';
import {
  SessionExpiredError,
  SourceError,
  SourceErrorCode,
  errorMessage,
  isSourceError,
  type SourceClient,
  type SourcePage,
} from './types.js';

export type RenderedCursor = {
  ids: string[];
  index: number;
  session?: AuthSession | null;
};

export type RenderedPageClientOptions = {
  baseUrl: string;
  limiter: TokenBucket;
  http: HttpPolicy;
  logger?: Logger;
};

const LotBlock = z.record(z.unknown()).nullish();

const NextData = z.object({
  props: z.object({
    pageProps: z.object({
      activeLot: LotBlock,
      currentLot: LotBlock,
      lot: LotBlock,
    }),
  }),
});

/**
 * Pull the embedded lot out of a rendered page.
 * Null when the block is missing, not JSON, or carries no lot.
 */
export function extractEmbeddedLot(html: string): RawRecord | null {
  const $ = cheerio.load(html);
  const raw = $('script#__NEXT_DATA__').first().text().trim();
  if (!raw) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = NextData.safeParse(json);
  if (!parsed.success) return null;
  const props = parsed.data.props.pageProps;
  return props.activeLot ?? props.currentLot ?? props.lot ?? null;
}

export class RenderedPageClient implements SourceClient<RenderedCursor> {
  readonly source = 'rendered' as const;
  private readonly baseUrl: string;

  constructor(private readonly options: RenderedPageClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  firstCursor(ids: string[], session?: AuthSession | null): RenderedCursor {
    return { ids, index: 0, session };
  }

  lotUrl(lotId: string): string {
    return `${this.baseUrl}/lot/${encodeURIComponent(lotId)}`;
  }

  async fetchLot(lotId: string, session?: AuthSession | null, signal?: AbortSignal): Promise<RawRecord> {
    const url = this.lotUrl(lotId);
    let html: string;
    try {
      html = await requestText({
        source: this.source,
        url,
        init: { method: 'GET', headers: { Accept: 'text/html', ...(session?.requestHeaders() ?? {}) } },
        limiter: this.options.limiter,
        policy: this.options.http,
        signal,
        logger: this.options.logger,
      });
    } catch (err) {
      const status = isSourceError(err) ? err.details.status : undefined;
      if (session && (status === 401 || status === 403)) {
        throw new SessionExpiredError(`lot ${lotId}: session rejected (HTTP ${status})`, {
          source: this.source,
          status,
          url,
        });
      }
      throw err;
    }

    const lot = extractEmbeddedLot(html);
    if (!lot) {
      throw new SourceError(SourceErrorCode.DEGRADED, `lot ${lotId}: no embedded lot data`, {
        source: this.source,
        url,
      });
    }
    return lot;
  }

  /**
   * One seeded lot per page. A lot that is gone or unparseable is skipped;
   * anything else ends the stream.
   */
  async fetchPage(cursor: RenderedCursor, signal?: AbortSignal): Promise<SourcePage<RenderedCursor>> {
    if (cursor.index >= cursor.ids.length) {
      return { records: [], hasMore: false, nextCursor: null };
    }

    const lotId = cursor.ids[cursor.index];
    const next: RenderedCursor = { ...cursor, index: cursor.index + 1 };
    const hasMore = next.index < cursor.ids.length;
    let records: RawRecord[] = [];

    try {
      records = [await this.fetchLot(lotId, cursor.session, signal)];
    } catch (err) {
      const skippable =
        isSourceError(err, SourceErrorCode.PERMANENT) || isSourceError(err, SourceErrorCode.DEGRADED);
      if (!skippable) throw err;
      this.options.logger?.warn(`skipping lot ${lotId}: ${errorMessage(err)}`);
    }

    return { records, hasMore, nextCursor: hasMore ? next : null };
  }
}
