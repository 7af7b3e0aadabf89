/**
 * Channel record → canonical Lot.
 *
 * Each channel has one fixed mapping. Every field is validated on its own,
 * so a bad value drops that field instead of the whole record; only a
 * missing identity makes a record unmappable.
 */

import { z } from "zod";
import type { Lot, RawRecord, SourceFlags, SourceTag } from "../types/lot.js";

const text = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).replace(/\s+/g, " ").trim())
  .optional()
  .catch(undefined);

// null, "" and booleans mean "not reported", never zero
function reported(v: unknown): unknown {
  if (typeof v === "number") return v;
  if (typeof v === "string" && v.trim() !== "") return v;
  return undefined;
}

const amount = z.preprocess(reported, z.coerce.number().finite().nonnegative().optional()).catch(undefined);

const count = z.preprocess(reported, z.coerce.number().int().nonnegative().optional()).catch(undefined);

const flag = z
  .union([z.boolean(), z.number(), z.string()])
  .transform(toFlag)
  .optional()
  .catch(undefined);

const timestamp = z
  .union([z.number(), z.string()])
  .transform(parseTimestamp)
  .optional()
  .catch(undefined);

const SummaryRecord = z.object({
  lot_id: z.unknown(),
  id: z.unknown(),
  mac_lot_id: z.unknown(),
  product_name: text,
  category_name: text,
  brand_name: text,
  condition_name: text,
  retail_price: amount,
  current_bid: amount,
  total_bids: count,
  unique_bidders: count,
  location_name: text,
  expected_close_date: timestamp,
  is_open: flag,
  auction_id: text,
});

const SearchRecord = z.object({
  lot_id: z.unknown(),
  id: z.unknown(),
  mac_lot_id: z.unknown(),
  product_name: text,
  category: text,
  brand: text,
  condition_name: text,
  retail_price: amount,
  current_bid: amount,
  auction_location: text,
  expected_close_date: timestamp,
  is_open: flag,
  auction_id: text,
});

const RenderedRecord = z.object({
  lot_id: z.unknown(),
  id: z.unknown(),
  product_name: text,
  title: text,
  category: text,
  brand: text,
  condition_name: text,
  retail_price: amount,
  winning_bid_amount: amount,
  total_bids: count,
  unique_bidders: count,
  is_open: flag,
  expected_close_date: timestamp,
  auction_location: text,
  location: text,
  auction_id: text,
});

/** Channel-neutral view of one record, before merge bookkeeping is attached */
type ChannelFields = {
  id: string | null;
  title?: string;
  category?: string;
  brand?: string;
  condition?: string;
  location?: string;
  auctionId?: string;
  retailPrice?: number;
  currentBid?: number;
  bidCount?: number;
  uniqueBidders?: number;
  isOpen?: boolean;
  closesAt?: number | null;
};

function toFlag(v: boolean | number | string): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  const s = v.trim().toLowerCase();
  if (["1", "true", "yes", "open"].includes(s)) return true;
  if (["0", "false", "no", "closed"].includes(s)) return false;
  return undefined;
}

/**
 * ISO strings, epoch seconds or epoch milliseconds → epoch ms.
 * Values below 1e12 are taken as seconds.
 */
export function parseTimestamp(v: number | string): number | null {
  if (typeof v === "number") {
    if (!Number.isFinite(v) || v <= 0) return null;
    return v < 1e12 ? Math.round(v * 1000) : Math.round(v);
  }
  const s = v.trim();
  if (!s) return null;
  if (/^\d+(\.\d+)?$/.test(s)) return parseTimestamp(Number(s));
  const ms = Date.parse(s);
  return Number.isNaN(ms) ? null : ms;
}

/** Native id as a trimmed string; numbers keep their integer form. */
export function resolveId(...candidates: unknown[]): string | null {
  for (const v of candidates) {
    if (typeof v === "number" && Number.isFinite(v)) return String(v);
    if (typeof v === "string" && v.trim()) return v.trim();
  }
  return null;
}

function mapSummary(raw: RawRecord): ChannelFields | null {
  const r = SummaryRecord.safeParse(raw);
  if (!r.success) return null;
  const d = r.data;
  return {
    id: resolveId(d.lot_id, d.id, d.mac_lot_id),
    title: d.product_name,
    category: d.category_name,
    brand: d.brand_name,
    condition: d.condition_name,
    location: d.location_name,
    auctionId: d.auction_id,
    retailPrice: d.retail_price,
    currentBid: d.current_bid,
    bidCount: d.total_bids,
    uniqueBidders: d.unique_bidders,
    isOpen: d.is_open,
    closesAt: d.expected_close_date,
  };
}

function mapSearch(raw: RawRecord): ChannelFields | null {
  const r = SearchRecord.safeParse(raw);
  if (!r.success) return null;
  const d = r.data;
  return {
    id: resolveId(d.lot_id, d.id, d.mac_lot_id),
    title: d.product_name,
    category: d.category,
    brand: d.brand,
    condition: d.condition_name,
    location: d.auction_location,
    auctionId: d.auction_id,
    retailPrice: d.retail_price,
    currentBid: d.current_bid,
    isOpen: d.is_open,
    closesAt: d.expected_close_date,
  };
}

function mapRendered(raw: RawRecord): ChannelFields | null {
  const r = RenderedRecord.safeParse(raw);
  if (!r.success) return null;
  const d = r.data;
  return {
    id: resolveId(d.lot_id, d.id),
    title: d.product_name ?? d.title,
    category: d.category,
    brand: d.brand,
    condition: d.condition_name,
    location: d.auction_location ?? d.location,
    auctionId: d.auction_id,
    retailPrice: d.retail_price,
    currentBid: d.winning_bid_amount,
    bidCount: d.total_bids,
    uniqueBidders: d.unique_bidders,
    isOpen: d.is_open,
    closesAt: d.expected_close_date,
  };
}

const MAPPERS: Record<SourceTag, (raw: RawRecord) => ChannelFields | null> = {
  summary: mapSummary,
  search: mapSearch,
  rendered: mapRendered,
};

function orNull(value: string | undefined): string | null {
  return value ? value : null;
}

/**
 * Map one raw record from `source` into a canonical Lot observed at `seenAt`.
 * Returns null when no identity can be derived.
 */
export function canonicalize(raw: RawRecord, source: SourceTag, seenAt: number): Lot | null {
  const fields = MAPPERS[source](raw);
  if (!fields || !fields.id) return null;

  const reportsBids =
    fields.currentBid !== undefined || fields.bidCount !== undefined || fields.uniqueBidders !== undefined;
  const closesAt = fields.closesAt ?? null;
  const sourceFlags: SourceFlags = {};
  sourceFlags[source] = { lastSeen: seenAt };

  return {
    id: fields.id,
    title: orNull(fields.title),
    category: orNull(fields.category),
    brand: orNull(fields.brand),
    condition: orNull(fields.condition),
    location: orNull(fields.location),
    auctionId: orNull(fields.auctionId),
    retailPrice: fields.retailPrice && fields.retailPrice > 0 ? fields.retailPrice : null,
    currentBid: fields.currentBid ?? 0,
    bidCount: fields.bidCount ?? 0,
    uniqueBidders: fields.uniqueBidders ?? 0,
    bidSource: reportsBids ? source : null,
    bidSeenAt: reportsBids ? seenAt : null,
    // absent means "not reported"; open is the neutral value for the AND merge
    isOpen: fields.isOpen ?? true,
    closesAt,
    closesAtSeenAt: closesAt !== null ? seenAt : null,
    sourceFlags,
    seenAt,
    qualityScore: 0,
    opportunityScore: 0,
    discountPercent: 0,
    dealRating: "GOOD",
    scoredAt: null,
  };
}

export type CanonicalBatch = {
  lots: Lot[];
  unmappable: number;
};

export function canonicalizeBatch(records: readonly RawRecord[], source: SourceTag, seenAt: number): CanonicalBatch {
  const lots: Lot[] = [];
  let unmappable = 0;
  for (const raw of records) {
    const lot = canonicalize(raw, source, seenAt);
    if (lot) lots.push(lot);
    else unmappable++;
  }
  return { lots, unmappable };
}
