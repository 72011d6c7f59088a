import express from 'express';
import request from 'supertest';
import { invalidateCache } from '../src/lib/invalidate';
import { errorHandler } from '../src/lib/auth';
import { TierCache } from '../src/lib/tierCache';
import { MemoryStore } from '../src/stores/memoryStore';
import { ManualClock } from '../src/lib/clock';
import { silentLogger } from '../src/lib/logger';
import { InvalidCacheKeyError } from '../src/lib/errors';
import type { PersistentEntry } from '../src/types';

async function seeded() {
  const clock = new ManualClock(0);
  const store = new MemoryStore();
  const tierCache = new TierCache({
    persistent: store,
    memorySize: 10,
    memoryTtl: 900,
    diskTtl: 3600,
    diskMaxEntries: 100,
    clock,
  });
  await tierCache.init();
  await tierCache.set('meter:42:unit', 17.5);
  await tierCache.set('meter:42:credit', 3);
  await tierCache.set('meter:420:unit', 1);
  await tierCache.set('meter:7:unit', 2);
  return { clock, store, tierCache };
}

function gate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe('cache invalidation', () => {
  test('a prefix pattern removes matching keys from both tiers and keeps the rest', async () => {
    const { store, tierCache } = await seeded();

    expect(await tierCache.invalidate('meter:42:*')).toBe(4);

    expect(await tierCache.get('meter:42:unit')).toEqual({ hit: false });
    expect(await tierCache.get('meter:42:credit')).toEqual({ hit: false });
    expect(await tierCache.get('meter:420:unit')).toEqual({ hit: true, value: 1, tier: 1 });
    expect(await tierCache.get('meter:7:unit')).toEqual({ hit: true, value: 2, tier: 1 });
    expect(store.keys()).toEqual(['meter:420:unit', 'meter:7:unit']);
  });

  test('an exact key removes just that key', async () => {
    const { tierCache } = await seeded();
    expect(await tierCache.invalidate('meter:7:unit')).toBe(2);
    expect(await tierCache.invalidate('meter:7:unit')).toBe(0);
    expect(await tierCache.get('meter:42:unit')).toMatchObject({ hit: true });
  });

  test('a namespace-wide pattern clears the namespace', async () => {
    const { tierCache } = await seeded();
    await tierCache.set('account:1:info', 'x');
    expect(await tierCache.invalidate('meter:*')).toBe(8);
    expect(await tierCache.get('account:1:info')).toMatchObject({ hit: true });
  });

  test('a read overlapping a prefix invalidation does not repopulate the fast tier', async () => {
    const { store, tierCache } = await seeded();
    const { opened, open } = gate();
    const innerDelete = store.deleteByPrefix.bind(store);
    store.deleteByPrefix = async (prefix: string) => {
      await opened;
      return innerDelete(prefix);
    };

    const invalidating = tierCache.invalidate('meter:42:*');
    // the fast copy is already gone; the persistent one is still there
    expect(await tierCache.get('meter:42:unit')).toEqual({ hit: true, value: 17.5, tier: 2 });

    open();
    expect(await invalidating).toBe(4);
    expect(await tierCache.get('meter:42:unit')).toEqual({ hit: false });
    expect((await tierCache.stats()).promotions).toBe(0);
  });

  test('a set overlapping a prefix invalidation does not survive it in the fast tier', async () => {
    const { store, tierCache } = await seeded();
    const { opened, open } = gate();
    const innerDelete = store.deleteByPrefix.bind(store);
    store.deleteByPrefix = async (prefix: string) => {
      await opened;
      return innerDelete(prefix);
    };

    const invalidating = tierCache.invalidate('meter:42:*');
    await tierCache.set('meter:42:unit', 99);
    await tierCache.set('meter:420:unit', 5);

    open();
    expect(await invalidating).toBe(4);
    expect(await tierCache.get('meter:42:unit')).toEqual({ hit: false });
    expect(await tierCache.get('meter:420:unit')).toEqual({ hit: true, value: 5, tier: 1 });
  });

  test('a set whose persistent write lands after the delete keeps its value', async () => {
    const { store, tierCache } = await seeded();
    const { opened, open } = gate();
    const innerSet = store.set.bind(store);
    store.set = async (key: string, entry: PersistentEntry) => {
      await opened;
      return innerSet(key, entry);
    };

    const setting = tierCache.set('meter:42:unit', 99);
    expect(await tierCache.invalidate('meter:42:*')).toBe(4);
    open();
    await setting;

    // the write landed after the delete, so the persistent tier holds it
    expect(await tierCache.get('meter:42:unit')).toEqual({ hit: true, value: 99, tier: 2 });
    expect(await tierCache.get('meter:42:unit')).toEqual({ hit: true, value: 99, tier: 1 });
  });

  test('an exact invalidation waits for a read of the same key', async () => {
    const { clock, store, tierCache } = await seeded();
    clock.advance(900_000);
    const { opened, open } = gate();
    const innerGet = store.get.bind(store);
    store.get = async (key: string) => {
      await opened;
      return innerGet(key);
    };

    const reading = tierCache.get('meter:42:unit');
    const invalidating = tierCache.invalidate('meter:42:unit');
    open();

    expect(await reading).toEqual({ hit: true, value: 17.5, tier: 2 });
    expect(await invalidating).toBe(2);
    expect(await tierCache.get('meter:42:unit')).toEqual({ hit: false });
  });

  test('rejects wildcards anywhere but the final segment', async () => {
    const { tierCache } = await seeded();
    await expect(tierCache.invalidate('meter:*:unit')).rejects.toThrow(InvalidCacheKeyError);
    await expect(tierCache.invalidate('meter:4*')).rejects.toThrow(InvalidCacheKeyError);
    await expect(tierCache.invalidate('*')).rejects.toThrow(InvalidCacheKeyError);
  });

  test('middleware invalidates before the handler runs', async () => {
    const { tierCache } = await seeded();
    const app = express();
    const seen: Array<{ patterns: string[]; count: number }> = [];

    app.post(
      '/meters/:id/refresh',
      invalidateCache({
        cache: tierCache,
        resolvePatterns: (req) => [`meter:${req.params.id}:*`],
        hooks: { onInvalidated: ({ patterns, count }) => seen.push({ patterns, count }) },
      }),
      async (req, res) => {
        const after = await tierCache.get(`meter:${req.params.id}:unit`);
        res.json({ cached: after.hit });
      },
    );

    const res = await request(app).post('/meters/42/refresh');

    expect(res.body).toEqual({ cached: false });
    expect(seen).toEqual([{ patterns: ['meter:42:*'], count: 4 }]);
  });

  test('middleware reports a bad pattern as a 400 envelope', async () => {
    const { clock, tierCache } = await seeded();
    const app = express();
    const errors: unknown[] = [];
    app.post(
      '/bad',
      invalidateCache({ cache: tierCache, patterns: ['meter:*:unit'], hooks: { onError: ({ error }) => errors.push(error) } }),
      (_req, res) => {
        res.json({ ok: true });
      },
    );
    app.use(errorHandler({ clock, logger: silentLogger }));

    const res = await request(app).post('/bad');

    expect(res.status).toBe(400);
    expect(res.body.error_code).toBe('INVALID_CACHE_KEY');
    expect(errors).toHaveLength(1);
  });
});
