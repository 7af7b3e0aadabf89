/**
 * Lot persistence.
 *
 * upsert is read → merge → write under a per-id lock, so two writers for the
 * same lot never lose each other's fields while unrelated lots proceed in
 * parallel. Lots are never deleted, only marked closed.
 */

import { z } from "zod";
import type { Lot } from "../types/lot.js";
import { KeyedLock } from "./keyed-lock.js";
import { mergeLots } from "./reconcile.js";
import { compareByOpportunity } from "./scoring.js";
import { resultList, resultString, type UpstashClient } from "./upstash.js";

export interface LotQuery {
  open?: boolean;
  /** Case-insensitive location allow-list */
  locations?: string[];
  closesAfter?: number;
  closesBefore?: number;
  /** Drop lots closing on the UTC calendar day of `now` */
  excludeSameDay?: boolean;
  minScore?: number;
  limit?: number;
  now?: number;
}

export interface LotStore {
  upsert(lot: Lot): Promise<Lot>;
  get(id: string): Promise<Lot | null>;
  query(filter?: LotQuery): Promise<Lot[]>;
}

const Sighting = z.object({ lastSeen: z.number() });
const SourceTagSchema = z.enum(["summary", "search", "rendered"]);

export const StoredLotSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullable(),
  category: z.string().nullable(),
  brand: z.string().nullable(),
  condition: z.string().nullable(),
  location: z.string().nullable(),
  auctionId: z.string().nullable(),
  retailPrice: z.number().nullable(),
  currentBid: z.number(),
  bidCount: z.number(),
  uniqueBidders: z.number(),
  bidSource: SourceTagSchema.nullable(),
  bidSeenAt: z.number().nullable(),
  isOpen: z.boolean(),
  closesAt: z.number().nullable(),
  closesAtSeenAt: z.number().nullable(),
  sourceFlags: z.object({
    summary: Sighting.optional(),
    search: Sighting.optional(),
    rendered: Sighting.optional(),
  }),
  seenAt: z.number(),
  qualityScore: z.number(),
  opportunityScore: z.number(),
  discountPercent: z.number(),
  dealRating: z.enum(["EXCEPTIONAL", "EXCELLENT", "VERY_GOOD", "GOOD"]),
  scoredAt: z.number().nullable(),
});

export function sameUtcDay(a: number, b: number): boolean {
  return new Date(a).toISOString().slice(0, 10) === new Date(b).toISOString().slice(0, 10);
}

export function matchesQuery(lot: Lot, filter: LotQuery, now: number): boolean {
  const closed = !lot.isOpen || (lot.closesAt !== null && lot.closesAt <= now);
  if (filter.open === true && closed) return false;
  if (filter.open === false && !closed) return false;

  if (filter.locations && filter.locations.length > 0) {
    const wanted = new Set(filter.locations.map((l) => l.trim().toLowerCase()));
    if (!lot.location || !wanted.has(lot.location.toLowerCase())) return false;
  }

  if (filter.closesAfter !== undefined && (lot.closesAt === null || lot.closesAt < filter.closesAfter)) return false;
  if (filter.closesBefore !== undefined && (lot.closesAt === null || lot.closesAt > filter.closesBefore)) return false;
  if (filter.excludeSameDay && lot.closesAt !== null && sameUtcDay(lot.closesAt, now)) return false;
  if (filter.minScore !== undefined && lot.opportunityScore < filter.minScore) return false;

  return true;
}

export function applyLotQuery(lots: readonly Lot[], filter: LotQuery = {}): Lot[] {
  const now = filter.now ?? Date.now();
  const matched = lots.filter((lot) => matchesQuery(lot, filter, now)).sort(compareByOpportunity);
  return filter.limit !== undefined ? matched.slice(0, Math.max(0, filter.limit)) : matched;
}

abstract class LockedLotStore implements LotStore {
  private readonly lock = new KeyedLock();

  protected abstract read(id: string): Promise<Lot | null>;
  protected abstract write(lot: Lot): Promise<void>;
  protected abstract readAll(): Promise<Lot[]>;

  upsert(lot: Lot): Promise<Lot> {
    return this.lock.run(lot.id, async () => {
      const existing = await this.read(lot.id);
      const merged = mergeLots(existing, lot);
      await this.write(merged);
      return merged;
    });
  }

  get(id: string): Promise<Lot | null> {
    return this.read(id);
  }

  async query(filter: LotQuery = {}): Promise<Lot[]> {
    return applyLotQuery(await this.readAll(), filter);
  }
}

export class MemoryLotStore extends LockedLotStore {
  private readonly lots = new Map<string, Lot>();

  get size(): number {
    return this.lots.size;
  }

  protected async read(id: string): Promise<Lot | null> {
    const lot = this.lots.get(id);
    return lot ? structuredClone(lot) : null;
  }

  protected async write(lot: Lot): Promise<void> {
    this.lots.set(lot.id, structuredClone(lot));
  }

  protected async readAll(): Promise<Lot[]> {
    return Array.from(this.lots.values(), (lot) => structuredClone(lot));
  }
}

export type RedisLotStoreOptions = {
  keyPrefix?: string;
  indexKey?: string;
  /** Keys per MGET when reading the whole table */
  batchSize?: number;
};

/**
 * Upstash-backed store: each lot is one JSON value under `lot:{id}`, ids are
 * tracked in the `lots:index` set.
 */
export class RedisLotStore extends LockedLotStore {
  private readonly keyPrefix: string;
  private readonly indexKey: string;
  private readonly batchSize: number;

  constructor(
    private readonly redis: UpstashClient,
    opts: RedisLotStoreOptions = {},
  ) {
    super();
    this.keyPrefix = opts.keyPrefix ?? "lot:";
    this.indexKey = opts.indexKey ?? "lots:index";
    this.batchSize = opts.batchSize ?? 50;
  }

  private key(id: string): string {
    return `${this.keyPrefix}${id}`;
  }

  private parse(raw: string | null): Lot | null {
    if (!raw) return null;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn("[lot-store] skipping unparseable lot value");
      return null;
    }
    const parsed = StoredLotSchema.safeParse(json);
    if (!parsed.success) {
      console.warn("[lot-store] skipping invalid lot value:", parsed.error.issues[0]?.message);
      return null;
    }
    return parsed.data;
  }

  protected async read(id: string): Promise<Lot | null> {
    return this.parse(resultString(await this.redis.call("GET", this.key(id))));
  }

  protected async write(lot: Lot): Promise<void> {
    await this.redis.call("SET", this.key(lot.id), JSON.stringify(lot));
    await this.redis.call("SADD", this.indexKey, lot.id);
  }

  protected async readAll(): Promise<Lot[]> {
    const ids = resultList(await this.redis.call("SMEMBERS", this.indexKey)).filter(
      (id): id is string => id !== null,
    );

    const lots: Lot[] = [];
    for (let i = 0; i < ids.length; i += this.batchSize) {
      const keys = ids.slice(i, i + this.batchSize).map((id) => this.key(id));
      const values = resultList(await this.redis.call("MGET", ...keys));
      for (const value of values) {
        const lot = this.parse(value);
        if (lot) lots.push(lot);
      }
    }
    return lots;
  }
}
