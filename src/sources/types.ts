// src/sources/types.ts
/**
 * Source Client System
 *
 * Every upstream channel (summary API, search service, rendered lot pages)
 * exposes the same catalog with its own pagination contract. Clients fetch
 * one page at a time and hand back raw records; canonicalization happens
 * downstream.
 */

import type { RawRecord, SourceTag } from '../types/lot.js';

export interface SourcePage<C> {
  records: RawRecord[];
  /** Cursor for the following page, null when the stream is exhausted */
  nextCursor: C | null;
  hasMore: boolean;
}

/**
 * Client interface - all channels implement this
 */
export interface SourceClient<C> {
  readonly source: SourceTag;

  /**
   * Fetch one page for the given cursor.
   * Pages of one cursor stream must be requested in order.
   */
  fetchPage(cursor: C, signal?: AbortSignal): Promise<SourcePage<C>>;
}

/**
 * Error types for source failures
 */
export enum SourceErrorCode {
  /** Transient network failure, 429, 5xx, timeout */
  RETRYABLE = 'RETRYABLE',
  /** Not found, auth rejected at the channel level */
  PERMANENT = 'PERMANENT',
  /** Payload fetched but only partly usable */
  DEGRADED = 'DEGRADED',
  /** Authenticated session rejected by the server */
  SESSION_EXPIRED = 'SESSION_EXPIRED',
  /** Record without a derivable identity */
  UNMAPPABLE = 'UNMAPPABLE',
  /** Run cancelled or timed out */
  CANCELLED = 'CANCELLED',
}

export type SourceErrorDetails = {
  source?: SourceTag;
  status?: number;
  url?: string;
  cause?: unknown;
};

export class SourceError extends Error {
  constructor(
    public code: SourceErrorCode,
    message: string,
    public details: SourceErrorDetails = {}
  ) {
    super(message);
    this.name = 'SourceError';
  }

  get retryable(): boolean {
    return this.code === SourceErrorCode.RETRYABLE;
  }
}

export class SessionExpiredError extends SourceError {
  constructor(message = 'Authenticated session was rejected', details: SourceErrorDetails = {}) {
    super(SourceErrorCode.SESSION_EXPIRED, message, details);
    this.name = 'SessionExpiredError';
  }
}

/**
 * Map an HTTP status outside 200/204 to an error code.
 */
export function classifyStatus(status: number): SourceErrorCode {
  if (status === 429 || status === 408) return SourceErrorCode.RETRYABLE;
  if (status >= 500 && status < 600) return SourceErrorCode.RETRYABLE;
  return SourceErrorCode.PERMANENT;
}

export function isSourceError(err: unknown, code?: SourceErrorCode): err is SourceError {
  return err instanceof SourceError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
