// src/types/lot.ts
/**
 * Canonical lot model shared by every stage of the discovery pipeline.
 *
 * Timestamps are epoch milliseconds. Prices are plain dollar amounts
 * (the marketplace never reports sub-cent values).
 */

export type SourceTag = 'summary' | 'search' | 'rendered';

export const SOURCE_TAGS: readonly SourceTag[] = ['summary', 'search', 'rendered'];

export type SourceSighting = {
  lastSeen: number;
};

export type SourceFlags = Partial<Record<SourceTag, SourceSighting>>;

export type DealRating = 'EXCEPTIONAL' | 'EXCELLENT' | 'VERY_GOOD' | 'GOOD';

export interface Lot {
  /** Native lot identifier as a trimmed string. Never changes once assigned. */
  id: string;

  title: string | null;
  category: string | null;
  brand: string | null;
  condition: string | null;
  /** Pickup / warehouse location */
  location: string | null;
  auctionId: string | null;

  /** List price. Once known it is never cleared. */
  retailPrice: number | null;

  currentBid: number;
  bidCount: number;
  uniqueBidders: number;
  /** Channel whose bid state is currently held (null = no channel reported bids) */
  bidSource: SourceTag | null;
  bidSeenAt: number | null;

  /** Terminal once false */
  isOpen: boolean;
  closesAt: number | null;
  closesAtSeenAt: number | null;

  sourceFlags: SourceFlags;
  /** Most recent observation of any field */
  seenAt: number;

  // Derived
  qualityScore: number;
  opportunityScore: number;
  discountPercent: number;
  dealRating: DealRating;
  scoredAt: number | null;
}

/** Untyped record as returned by one upstream channel */
export type RawRecord = Record<string, unknown>;
