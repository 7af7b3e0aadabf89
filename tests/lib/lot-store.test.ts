import { MemoryLotStore, RedisLotStore, applyLotQuery, sameUtcDay } from '../../src/lib/lot-store.js';
import { FakeRedis } from '../helpers/fake-redis.js';
import { makeLot } from '../helpers/lots.js';

const NOW = Date.parse('2026-10-18T09:00:00Z');
const TOMORROW = Date.parse('2026-10-19T15:00:00Z');
const TONIGHT = Date.parse('2026-10-18T22:00:00Z');

describe('MemoryLotStore', () => {
  it('merges upserts of the same lot', async () => {
    const store = new MemoryLotStore();
    await store.upsert(makeLot({ id: '7', title: 'Blender', seenAt: 10 }));
    const merged = await store.upsert(
      makeLot({ id: '7', currentBid: 14, bidSource: 'rendered', bidSeenAt: 20, seenAt: 20 }),
    );

    expect(merged.title).toBe('Blender');
    expect(merged.currentBid).toBe(14);
    expect(await store.get('7')).toEqual(merged);
    expect(store.size).toBe(1);
  });

  it('keeps both writers\' fields when the same lot is upserted concurrently', async () => {
    const store = new MemoryLotStore();
    await Promise.all([
      store.upsert(makeLot({ id: '8', title: 'Desk', retailPrice: 300, seenAt: 10 })),
      store.upsert(makeLot({ id: '8', brand: 'Acme', currentBid: 25, bidSource: 'summary', bidSeenAt: 11, seenAt: 11 })),
      store.upsert(makeLot({ id: '8', uniqueBidders: 2, bidSource: 'rendered', bidSeenAt: 12, seenAt: 12 })),
    ]);

    const lot = await store.get('8');
    expect(lot).toMatchObject({
      title: 'Desk',
      brand: 'Acme',
      retailPrice: 300,
      currentBid: 25,
      uniqueBidders: 2,
      bidSource: 'rendered',
    });
  });

  it('hands out copies', async () => {
    const store = new MemoryLotStore();
    await store.upsert(makeLot({ id: '9', title: 'Lamp' }));

    const copy = await store.get('9');
    if (copy) copy.title = 'Changed';

    expect((await store.get('9'))?.title).toBe('Lamp');
  });

  it('returns null for unknown ids', async () => {
    expect(await new MemoryLotStore().get('nope')).toBeNull();
  });
});

describe('applyLotQuery', () => {
  const lots = [
    makeLot({ id: 'open-a', location: 'Warehouse A', closesAt: TOMORROW, opportunityScore: 0.6 }),
    makeLot({ id: 'open-b', location: 'warehouse b', closesAt: TOMORROW + 1000, opportunityScore: 0.9 }),
    makeLot({ id: 'tonight', location: 'Warehouse A', closesAt: TONIGHT, opportunityScore: 0.95 }),
    makeLot({ id: 'expired', location: 'Warehouse A', closesAt: NOW - 1000, opportunityScore: 0.7 }),
    makeLot({ id: 'closed', isOpen: false, closesAt: TOMORROW, opportunityScore: 0 }),
    makeLot({ id: 'undated', opportunityScore: 0.2 }),
  ];

  it('returns open lots ranked by opportunity', () => {
    const ids = applyLotQuery(lots, { open: true, now: NOW }).map((l) => l.id);
    expect(ids).toEqual(['tonight', 'open-b', 'open-a', 'undated']);
  });

  it('treats lots past their close time as closed', () => {
    const ids = applyLotQuery(lots, { open: false, now: NOW }).map((l) => l.id);
    expect(ids).toEqual(['expired', 'closed']);
  });

  it('excludes lots closing later on the same UTC day', () => {
    const ids = applyLotQuery(lots, { open: true, excludeSameDay: true, now: NOW }).map((l) => l.id);
    expect(ids).toEqual(['open-b', 'open-a', 'undated']);
  });

  it('filters by location case-insensitively', () => {
    const ids = applyLotQuery(lots, { open: true, locations: ['WAREHOUSE B'], now: NOW }).map((l) => l.id);
    expect(ids).toEqual(['open-b']);
  });

  it('filters by close window, minimum score and limit', () => {
    expect(applyLotQuery(lots, { open: true, closesAfter: TOMORROW, now: NOW }).map((l) => l.id)).toEqual(['open-b', 'open-a']);
    expect(applyLotQuery(lots, { open: true, closesBefore: TOMORROW, now: NOW }).map((l) => l.id)).toEqual(['tonight', 'open-a']);
    expect(applyLotQuery(lots, { minScore: 0.65, now: NOW }).map((l) => l.id)).toEqual(['tonight', 'open-b', 'expired']);
    expect(applyLotQuery(lots, { open: true, limit: 2, now: NOW }).map((l) => l.id)).toEqual(['tonight', 'open-b']);
  });
});

describe('sameUtcDay', () => {
  it('compares UTC calendar days', () => {
    expect(sameUtcDay(NOW, TONIGHT)).toBe(true);
    expect(sameUtcDay(NOW, TOMORROW)).toBe(false);
  });
});

describe('RedisLotStore', () => {
  it('stores lots as JSON and indexes their ids', async () => {
    const redis = new FakeRedis();
    const store = new RedisLotStore(redis);

    await store.upsert(makeLot({ id: '42', title: 'Speaker', closesAt: TOMORROW }));

    const raw = redis.strings.get('lot:42');
    expect(raw && JSON.parse(raw).title).toBe('Speaker');
    expect(Array.from(redis.sets.get('lots:index') ?? [])).toEqual(['42']);
  });

  it('merges with the stored value and queries across batches', async () => {
    const redis = new FakeRedis();
    const store = new RedisLotStore(redis, { batchSize: 2 });

    await store.upsert(makeLot({ id: '1', title: 'One', closesAt: TOMORROW, opportunityScore: 0.1 }));
    await store.upsert(makeLot({ id: '2', closesAt: TOMORROW, opportunityScore: 0.3 }));
    await store.upsert(makeLot({ id: '3', closesAt: TOMORROW, opportunityScore: 0.2 }));
    await store.upsert(makeLot({ id: '1', currentBid: 9, bidSource: 'summary', bidSeenAt: 2000, seenAt: 2000 }));

    expect(await store.get('1')).toMatchObject({ title: 'One', currentBid: 9 });
    expect((await store.query({ open: true, now: NOW })).map((l) => l.id)).toEqual(['2', '3', '1']);

    const mgets = redis.calls.filter((c) => c[0] === 'MGET');
    expect(mgets).toHaveLength(2);
  });

  it('skips values that are not valid lots', async () => {
    const redis = new FakeRedis();
    const store = new RedisLotStore(redis);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    await store.upsert(makeLot({ id: 'good' }));
    redis.strings.set('lot:bad', '{"id":"bad"}');
    redis.strings.set('lot:junk', 'not json');
    redis.sets.get('lots:index')?.add('bad').add('junk');

    expect((await store.query()).map((l) => l.id)).toEqual(['good']);
    expect(await store.get('bad')).toBeNull();
    expect(warn).toHaveBeenCalled();
    warn.mockRestore();
  });
});
