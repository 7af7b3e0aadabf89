/**
 * Field-level merge of two observations of the same lot.
 *
 * This is the only place the channel trust order is applied. mergeLots is
 * idempotent (merging the same observation twice changes nothing) and
 * monotonic for bid state (currentBid, bidCount and uniqueBidders never go down).
 */

import { SOURCE_TAGS, type Lot, type SourceFlags, type SourceTag } from "../types/lot.js";

/** Bid-state trust: rendered pages > summary API > search index */
export const SOURCE_TRUST: Record<SourceTag, number> = {
  search: 1,
  summary: 2,
  rendered: 3,
};

export function trustOf(source: SourceTag | null): number {
  return source ? SOURCE_TRUST[source] : 0;
}

type DescriptiveField = "title" | "category" | "brand" | "condition" | "location" | "auctionId";

const DESCRIPTIVE_FIELDS: readonly DescriptiveField[] = [
  "title",
  "category",
  "brand",
  "condition",
  "location",
  "auctionId",
];

function copyLot(lot: Lot): Lot {
  return { ...lot, sourceFlags: { ...lot.sourceFlags } };
}

function mergeRetail(existing: number | null, incoming: number | null): number | null {
  if (!incoming || incoming <= 0) return existing;
  if (existing === null) return incoming;
  return Math.max(existing, incoming);
}

function acceptsBidState(existing: Lot, incoming: Lot): boolean {
  if (!incoming.bidSource || incoming.bidSeenAt === null) return false;
  if (trustOf(incoming.bidSource) < trustOf(existing.bidSource)) return false;
  return existing.bidSeenAt === null || incoming.bidSeenAt >= existing.bidSeenAt;
}

function mergeFlags(a: SourceFlags, b: SourceFlags): SourceFlags {
  const out: SourceFlags = {};
  for (const tag of SOURCE_TAGS) {
    const left = a[tag];
    const right = b[tag];
    const lastSeen = Math.max(left?.lastSeen ?? -Infinity, right?.lastSeen ?? -Infinity);
    if (left || right) out[tag] = { lastSeen };
  }
  return out;
}

function closeOut(lot: Lot): Lot {
  if (!lot.isOpen) lot.opportunityScore = 0;
  return lot;
}

export function mergeLots(existing: Lot | null, incoming: Lot): Lot {
  if (!existing) return closeOut(copyLot(incoming));
  // different lots never merge; keep what is stored
  if (existing.id !== incoming.id) return copyLot(existing);

  const merged = copyLot(existing);
  const incomingIsNewer = incoming.seenAt >= existing.seenAt;

  for (const field of DESCRIPTIVE_FIELDS) {
    const value = incoming[field];
    if (value && (incomingIsNewer || !existing[field])) merged[field] = value;
  }

  merged.retailPrice = mergeRetail(existing.retailPrice, incoming.retailPrice);

  if (acceptsBidState(existing, incoming)) {
    merged.currentBid = Math.max(existing.currentBid, incoming.currentBid);
    merged.bidCount = Math.max(existing.bidCount, incoming.bidCount);
    merged.uniqueBidders = Math.max(existing.uniqueBidders, incoming.uniqueBidders);
    merged.bidSource = incoming.bidSource;
    merged.bidSeenAt = incoming.bidSeenAt;
  }

  merged.isOpen = existing.isOpen && incoming.isOpen;

  if (incoming.closesAt !== null) {
    const incomingAt = incoming.closesAtSeenAt ?? incoming.seenAt;
    if (existing.closesAt === null || incomingAt >= (existing.closesAtSeenAt ?? 0)) {
      merged.closesAt = incoming.closesAt;
      merged.closesAtSeenAt = incomingAt;
    }
  }

  merged.sourceFlags = mergeFlags(existing.sourceFlags, incoming.sourceFlags);
  merged.seenAt = Math.max(existing.seenAt, incoming.seenAt);

  if (incoming.scoredAt !== null && (existing.scoredAt === null || incoming.scoredAt >= existing.scoredAt)) {
    merged.qualityScore = incoming.qualityScore;
    merged.opportunityScore = incoming.opportunityScore;
    merged.discountPercent = incoming.discountPercent;
    merged.dealRating = incoming.dealRating;
    merged.scoredAt = incoming.scoredAt;
  }

  return closeOut(merged);
}
