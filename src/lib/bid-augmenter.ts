/**
 * Refreshes bid state for open lots from their rendered pages.
 *
 * The augmenter only reads the session. When the server rejects it a
 * SessionExpiredError is thrown so the caller can renew and retry.
 */

import type { Lot, RawRecord } from "../types/lot.js";
import type { AuthSession } from "./auth-session.js";
import { canonicalize } from "./canonicalize.js";
import type { LotStore } from "./lot-store.js";
import type { Logger } from "./run-logger.js";
import { SessionExpiredError, SourceErrorCode, errorMessage, isSourceError } from "../sources/types.js";

export type AugmentStatus = "updated" | "unchanged" | "degraded" | "failed";

export type AugmentOutcome = {
  status: AugmentStatus;
  /** Stored lot after the refresh (the input lot when nothing was written) */
  lot: Lot;
  error?: string;
};

export type AugmentCounters = {
  attempted: number;
  updated: number;
  unchanged: number;
  degradedFetch: number;
  failed: number;
};

/** The piece of RenderedPageClient the augmenter needs */
export interface LotPageFetcher {
  fetchLot(lotId: string, session?: AuthSession | null, signal?: AbortSignal): Promise<RawRecord>;
}

export type BidAugmenterOptions = {
  freshnessMs: number;
  logger?: Logger;
  now?: () => number;
};

function bidStateChanged(before: Lot, after: Lot): boolean {
  return (
    before.currentBid !== after.currentBid ||
    before.bidCount !== after.bidCount ||
    before.uniqueBidders !== after.uniqueBidders ||
    before.isOpen !== after.isOpen
  );
}

export class BidAugmenter {
  readonly counters: AugmentCounters = { attempted: 0, updated: 0, unchanged: 0, degradedFetch: 0, failed: 0 };

  private readonly now: () => number;

  constructor(
    private readonly client: LotPageFetcher,
    private readonly store: LotStore,
    private readonly options: BidAugmenterOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Open lots whose bid state isn't from a rendered page, or is older than the freshness window */
  needsAugment(lot: Lot, now = this.now()): boolean {
    if (!lot.isOpen) return false;
    if (lot.bidSource !== "rendered" || lot.bidSeenAt === null) return true;
    return now - lot.bidSeenAt > this.options.freshnessMs;
  }

  private degraded(lot: Lot, reason: string): AugmentOutcome {
    this.counters.degradedFetch++;
    this.options.logger?.warn(`lot ${lot.id}: degraded fetch, ${reason}`);
    return { status: "degraded", lot, error: reason };
  }

  private failed(lot: Lot, reason: string): AugmentOutcome {
    this.counters.failed++;
    this.options.logger?.warn(`lot ${lot.id}: augmentation failed, ${reason}`);
    return { status: "failed", lot, error: reason };
  }

  async augment(lot: Lot, session: AuthSession, signal?: AbortSignal): Promise<AugmentOutcome> {
    if (!session.isValid()) {
      throw new SessionExpiredError("Session is no longer valid", { source: "rendered" });
    }

    this.counters.attempted++;

    let raw: RawRecord;
    try {
      raw = await this.client.fetchLot(lot.id, session, signal);
    } catch (err) {
      if (err instanceof SessionExpiredError || isSourceError(err, SourceErrorCode.CANCELLED)) throw err;
      if (isSourceError(err, SourceErrorCode.DEGRADED)) return this.degraded(lot, errorMessage(err));
      return this.failed(lot, errorMessage(err));
    }

    const incoming = canonicalize(raw, "rendered", this.now());
    if (!incoming) return this.degraded(lot, "page has no lot id");
    if (incoming.id !== lot.id) return this.degraded(lot, `page is for lot ${incoming.id}`);

    let stored: Lot;
    try {
      stored = await this.store.upsert(incoming);
    } catch (err) {
      return this.failed(lot, `store write failed: ${errorMessage(err)}`);
    }

    if (bidStateChanged(lot, stored)) {
      this.counters.updated++;
      this.options.logger?.debug(`lot ${lot.id}: bid ${lot.currentBid} → ${stored.currentBid}`, {
        bidCount: stored.bidCount,
        uniqueBidders: stored.uniqueBidders,
        isOpen: stored.isOpen,
      });
      return { status: "updated", lot: stored };
    }

    this.counters.unchanged++;
    return { status: "unchanged", lot: stored };
  }
}
