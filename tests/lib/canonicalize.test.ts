import { canonicalize, canonicalizeBatch, parseTimestamp, resolveId } from '../../src/lib/canonicalize.js';

const SEEN = 1_760_000_000_000;

describe('canonicalize', () => {
  it('maps a summary record', () => {
    const lot = canonicalize(
      {
        lot_id: 1001,
        product_name: '  Sony   WH-1000XM4 Headphones ',
        category_name: 'Electronics',
        brand_name: 'Sony',
        condition_name: 'Like New',
        retail_price: '349.99',
        current_bid: 12,
        total_bids: 3,
        unique_bidders: 2,
        location_name: 'Warehouse A',
        expected_close_date: '2026-10-20T18:00:00Z',
        is_open: 1,
        auction_id: 77,
      },
      'summary',
      SEEN,
    );

    expect(lot).toEqual({
      id: '1001',
      title: 'Sony WH-1000XM4 Headphones',
      category: 'Electronics',
      brand: 'Sony',
      condition: 'Like New',
      location: 'Warehouse A',
      auctionId: '77',
      retailPrice: 349.99,
      currentBid: 12,
      bidCount: 3,
      uniqueBidders: 2,
      bidSource: 'summary',
      bidSeenAt: SEEN,
      isOpen: true,
      closesAt: Date.parse('2026-10-20T18:00:00Z'),
      closesAtSeenAt: SEEN,
      sourceFlags: { summary: { lastSeen: SEEN } },
      seenAt: SEEN,
      qualityScore: 0,
      opportunityScore: 0,
      discountPercent: 0,
      dealRating: 'GOOD',
      scoredAt: null,
    });
  });

  it('maps a search document', () => {
    const lot = canonicalize(
      {
        lot_id: '2002',
        product_name: 'Gaming Monitor',
        category: 'Electronics',
        brand: 'Acme',
        retail_price: 299,
        current_bid: 0,
        auction_location: 'Warehouse B',
        expected_close_date: 1_761_000_000,
        is_open: true,
      },
      'search',
      SEEN,
    );

    expect(lot).toMatchObject({
      id: '2002',
      title: 'Gaming Monitor',
      location: 'Warehouse B',
      retailPrice: 299,
      currentBid: 0,
      bidCount: 0,
      bidSource: 'search',
      closesAt: 1_761_000_000_000,
      sourceFlags: { search: { lastSeen: SEEN } },
    });
  });

  it('maps a rendered lot using fallback keys', () => {
    const lot = canonicalize(
      {
        id: 3003,
        title: 'Cordless Drill',
        winning_bid_amount: '41.50',
        total_bids: 7,
        unique_bidders: 4,
        is_open: 'false',
        location: 'Warehouse C',
      },
      'rendered',
      SEEN,
    );

    expect(lot).toMatchObject({
      id: '3003',
      title: 'Cordless Drill',
      location: 'Warehouse C',
      currentBid: 41.5,
      bidCount: 7,
      uniqueBidders: 4,
      bidSource: 'rendered',
      isOpen: false,
      closesAt: null,
      closesAtSeenAt: null,
    });
  });

  it('prefers lot_id over id on rendered lots', () => {
    expect(canonicalize({ lot_id: 'L-1', id: 99 }, 'rendered', SEEN)?.id).toBe('L-1');
  });

  it('returns null when no identity can be derived', () => {
    expect(canonicalize({ product_name: 'No id' }, 'summary', SEEN)).toBeNull();
    expect(canonicalize({ lot_id: '   ' }, 'search', SEEN)).toBeNull();
    expect(canonicalize({ lot_id: null }, 'rendered', SEEN)).toBeNull();
  });

  it('derives the same id for the same lot from every channel', () => {
    const ids = [
      canonicalize({ lot_id: 4004 }, 'summary', SEEN)?.id,
      canonicalize({ lot_id: ' 4004 ' }, 'search', SEEN)?.id,
      canonicalize({ id: '4004' }, 'rendered', SEEN)?.id,
    ];
    expect(ids).toEqual(['4004', '4004', '4004']);
  });

  it('drops invalid numbers instead of the record', () => {
    const lot = canonicalize(
      { lot_id: 5, retail_price: 'n/a', current_bid: 'abc', total_bids: -2, product_name: 'Lamp' },
      'summary',
      SEEN,
    );

    expect(lot).toMatchObject({
      id: '5',
      title: 'Lamp',
      retailPrice: null,
      currentBid: 0,
      bidCount: 0,
      bidSource: null,
      bidSeenAt: null,
    });
  });

  it('treats null, empty and boolean bid fields as not reported', () => {
    const lot = canonicalize({ lot_id: 7, current_bid: null, total_bids: '', unique_bidders: true }, 'summary', SEEN);

    expect(lot).toMatchObject({ currentBid: 0, bidCount: 0, uniqueBidders: 0, bidSource: null, bidSeenAt: null });
    expect(canonicalize({ lot_id: 8, current_bid: '12.50' }, 'search', SEEN)).toMatchObject({
      currentBid: 12.5,
      bidSource: 'search',
      bidSeenAt: SEEN,
    });
  });

  it('falls back to id and mac_lot_id on index records', () => {
    expect(canonicalize({ id: 301 }, 'summary', SEEN)?.id).toBe('301');
    expect(canonicalize({ mac_lot_id: 'M-302' }, 'search', SEEN)?.id).toBe('M-302');
    expect(canonicalize({ lot_id: 303, id: 'other' }, 'search', SEEN)?.id).toBe('303');
  });

  it('treats a missing open flag as open and a zero retail price as unknown', () => {
    const lot = canonicalize({ lot_id: 6, retail_price: 0 }, 'search', SEEN);
    expect(lot?.isOpen).toBe(true);
    expect(lot?.retailPrice).toBeNull();
  });
});

describe('canonicalizeBatch', () => {
  it('counts records without identity as unmappable', () => {
    const batch = canonicalizeBatch([{ lot_id: 1 }, { product_name: 'orphan' }, { lot_id: 2 }], 'summary', SEEN);
    expect(batch.lots.map((l) => l.id)).toEqual(['1', '2']);
    expect(batch.unmappable).toBe(1);
  });
});

describe('parseTimestamp', () => {
  it('reads epoch seconds, epoch milliseconds and ISO strings', () => {
    expect(parseTimestamp(1_700_000_000)).toBe(1_700_000_000_000);
    expect(parseTimestamp(1_700_000_000_123)).toBe(1_700_000_000_123);
    expect(parseTimestamp('1700000000')).toBe(1_700_000_000_000);
    expect(parseTimestamp('2026-10-20T18:00:00.000Z')).toBe(Date.parse('2026-10-20T18:00:00.000Z'));
  });

  it('returns null for unusable values', () => {
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp('next tuesday')).toBeNull();
    expect(parseTimestamp(0)).toBeNull();
  });
});

describe('resolveId', () => {
  it('takes the first usable candidate', () => {
    expect(resolveId(undefined, '', 42)).toBe('42');
    expect(resolveId(' abc ')).toBe('abc');
    expect(resolveId(NaN, null)).toBeNull();
  });
});
