import type { AuthSession } from '../../src/lib/auth-session.js';
import { BidAugmenter, type LotPageFetcher } from '../../src/lib/bid-augmenter.js';
import { MemoryLotStore } from '../../src/lib/lot-store.js';
import type { RawRecord } from '../../src/types/lot.js';
import { SessionExpiredError, SourceError, SourceErrorCode } from '../../src/sources/types.js';
import { makeLot } from '../helpers/lots.js';

const NOW = 2_000_000;

function session(valid = true): AuthSession {
  return { isValid: () => valid, renew: async () => undefined, requestHeaders: () => ({ Cookie: 'sid=test' }) };
}

function fetcher(impl: (lotId: string) => Promise<RawRecord>) {
  const fetchLot = jest.fn(impl);
  const client: LotPageFetcher = { fetchLot };
  return { client, fetchLot };
}

describe('BidAugmenter', () => {
  let store: MemoryLotStore;

  beforeEach(() => {
    store = new MemoryLotStore();
  });

  it('stores fresher bid state from the rendered page', async () => {
    const lot = await store.upsert(
      makeLot({ currentBid: 10, bidCount: 2, bidSource: 'search', bidSeenAt: 1000, retailPrice: 120 }),
    );
    const { client, fetchLot } = fetcher(async () => ({
      lot_id: 1001,
      winning_bid_amount: 25,
      total_bids: 5,
      unique_bidders: 3,
    }));
    const augmenter = new BidAugmenter(client, store, { freshnessMs: 60_000, now: () => NOW });

    const outcome = await augmenter.augment(lot, session());

    expect(fetchLot).toHaveBeenCalledWith('1001', expect.anything(), undefined);
    expect(outcome.status).toBe('updated');
    expect(outcome.lot).toMatchObject({
      currentBid: 25,
      bidCount: 5,
      uniqueBidders: 3,
      bidSource: 'rendered',
      bidSeenAt: NOW,
      retailPrice: 120,
    });
    expect((await store.get('1001'))?.currentBid).toBe(25);
    expect(augmenter.counters).toEqual({ attempted: 1, updated: 1, unchanged: 0, degradedFetch: 0, failed: 0 });
  });

  it('reports unchanged when the page matches the stored bid state', async () => {
    const lot = await store.upsert(
      makeLot({ currentBid: 25, bidCount: 5, uniqueBidders: 3, bidSource: 'rendered', bidSeenAt: 1000 }),
    );
    const { client } = fetcher(async () => ({ lot_id: '1001', winning_bid_amount: 25, total_bids: 5, unique_bidders: 3 }));
    const augmenter = new BidAugmenter(client, store, { freshnessMs: 60_000, now: () => NOW });

    const outcome = await augmenter.augment(lot, session());

    expect(outcome.status).toBe('unchanged');
    expect(outcome.lot.bidSeenAt).toBe(NOW);
  });

  it('counts a lot that closed as updated', async () => {
    const lot = await store.upsert(makeLot({ currentBid: 5, bidSource: 'summary', bidSeenAt: 1000 }));
    const { client } = fetcher(async () => ({ lot_id: 1001, winning_bid_amount: 5, is_open: false }));
    const augmenter = new BidAugmenter(client, store, { freshnessMs: 60_000, now: () => NOW });

    const outcome = await augmenter.augment(lot, session());

    expect(outcome.status).toBe('updated');
    expect(outcome.lot.isOpen).toBe(false);
  });

  it('marks degraded fetches without touching the store', async () => {
    const lot = await store.upsert(makeLot({ currentBid: 7 }));
    const { client } = fetcher(async () => {
      throw new SourceError(SourceErrorCode.DEGRADED, 'lot 1001: no embedded lot data');
    });
    const augmenter = new BidAugmenter(client, store, { freshnessMs: 60_000, now: () => NOW });

    const outcome = await augmenter.augment(lot, session());

    expect(outcome).toEqual({ status: 'degraded', lot, error: 'lot 1001: no embedded lot data' });
    expect(await store.get('1001')).toEqual(lot);
    expect(augmenter.counters.degradedFetch).toBe(1);
  });

  it('treats a page for another lot as degraded', async () => {
    const lot = await store.upsert(makeLot());
    const { client } = fetcher(async () => ({ lot_id: 999, winning_bid_amount: 40 }));
    const augmenter = new BidAugmenter(client, store, { freshnessMs: 60_000, now: () => NOW });

    const outcome = await augmenter.augment(lot, session());

    expect(outcome.status).toBe('degraded');
    expect(outcome.error).toBe('page is for lot 999');
    expect(await store.get('999')).toBeNull();
  });

  it('reports other fetch errors as failed', async () => {
    const lot = await store.upsert(makeLot());
    const { client } = fetcher(async () => {
      throw new SourceError(SourceErrorCode.PERMANENT, 'rendered HTTP 404: gone');
    });
    const augmenter = new BidAugmenter(client, store, { freshnessMs: 60_000, now: () => NOW });

    await expect(augmenter.augment(lot, session())).resolves.toMatchObject({
      status: 'failed',
      error: 'rendered HTTP 404: gone',
    });
    expect(augmenter.counters.failed).toBe(1);
  });

  it('throws SessionExpiredError for an invalid or rejected session', async () => {
    const lot = makeLot();
    const rejected = fetcher(async () => {
      throw new SessionExpiredError('lot 1001: session rejected (HTTP 401)');
    });
    const augmenter = new BidAugmenter(rejected.client, store, { freshnessMs: 60_000, now: () => NOW });

    await expect(augmenter.augment(lot, session(false))).rejects.toBeInstanceOf(SessionExpiredError);
    expect(rejected.fetchLot).not.toHaveBeenCalled();

    await expect(augmenter.augment(lot, session())).rejects.toBeInstanceOf(SessionExpiredError);
    expect(rejected.fetchLot).toHaveBeenCalledTimes(1);
  });

  it('rethrows cancellation', async () => {
    const { client } = fetcher(async () => {
      throw new SourceError(SourceErrorCode.CANCELLED, 'Run cancelled');
    });
    const augmenter = new BidAugmenter(client, store, { freshnessMs: 60_000, now: () => NOW });

    await expect(augmenter.augment(makeLot(), session())).rejects.toMatchObject({ code: SourceErrorCode.CANCELLED });
  });

  describe('needsAugment', () => {
    const augmenter = new BidAugmenter(fetcher(async () => ({})).client, new MemoryLotStore(), {
      freshnessMs: 1000,
      now: () => NOW,
    });

    it('skips closed lots and fresh rendered bid state', () => {
      expect(augmenter.needsAugment(makeLot({ isOpen: false }))).toBe(false);
      expect(augmenter.needsAugment(makeLot({ bidSource: 'rendered', bidSeenAt: NOW - 500 }))).toBe(false);
    });

    it('selects lots with index or stale bid state', () => {
      expect(augmenter.needsAugment(makeLot({ bidSource: 'search', bidSeenAt: NOW }))).toBe(true);
      expect(augmenter.needsAugment(makeLot({ bidSource: 'rendered', bidSeenAt: NOW - 5000 }))).toBe(true);
      expect(augmenter.needsAugment(makeLot())).toBe(true);
    });
  });
});
