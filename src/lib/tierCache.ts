import { Lifecycle } from './lifecycle';
import { FastTier } from './fastTier';
import { KeyedMutex } from './keyedMutex';
import { CacheBackendUnavailable } from './errors';
import { assertCacheKey, matchesInvalidation, parseInvalidation, type Invalidation } from './keys';
import { systemClock, type Clock } from './clock';
import { silentLogger, type Logger } from './logger';
import type { CacheReadResult, CacheStats, JsonValue, PersistentStore } from '../types';

export type TierCacheOptions = {
  persistent: PersistentStore;
  memorySize: number;
  memoryTtl: number; // seconds
  diskTtl: number; // seconds
  diskMaxEntries: number;
  clock?: Clock;
  logger?: Logger;
  hooks?: {
    onHit?: (info: { key: string; tier: 1 | 2 }) => void;
    onMiss?: (info: { key: string }) => void;
    onBackendUnavailable?: (error: CacheBackendUnavailable) => void;
  };
};

export type SweepResult = {
  fastExpired: number;
  persistentCulled: number;
};

// A prefix invalidation that may overlap an in-flight read or write.
type PrefixInvalidation = {
  seq: number;
  target: Invalidation;
  active: boolean;
};

type Counters = {
  hitsTier1: number;
  hitsTier2: number;
  misses: number;
  promotions: number;
  evictions: number;
  sets: number;
  backendErrors: number;
};

/**
 * Two-level cache: a bounded in-process fast tier in front of a larger
 * persistent store. Reads fall through and promote; writes go to both tiers
 * under the key's lock. A failing persistent store degrades the cache to
 * fast-tier only and is reported through the logger, never to the caller.
 */
export class TierCache extends Lifecycle {
  private readonly fast: FastTier;
  private readonly persistent: PersistentStore;
  private readonly locks = new KeyedMutex();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly memoryTtlMs: number;
  private readonly diskTtlMs: number;
  private readonly diskMaxEntries: number;
  private readonly hooks: TierCacheOptions['hooks'];
  private readonly counters: Counters = {
    hitsTier1: 0,
    hitsTier2: 0,
    misses: 0,
    promotions: 0,
    evictions: 0,
    sets: 0,
    backendErrors: 0,
  };
  private invalidationSeq = 0;
  private prefixInvalidations: PrefixInvalidation[] = [];
  private guardedWrites = 0;

  constructor(options: TierCacheOptions) {
    super('TierCache');
    this.fast = new FastTier(options.memorySize);
    this.persistent = options.persistent;
    this.memoryTtlMs = options.memoryTtl * 1000;
    this.diskTtlMs = options.diskTtl * 1000;
    this.diskMaxEntries = options.diskMaxEntries;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.hooks = options.hooks;
  }

  async get(key: string): Promise<CacheReadResult> {
    this.assertReady();
    assertCacheKey(key);

    // Fast path: no lock, no I/O.
    const hot = this.readFast(key);
    if (hot) return this.recordFastHit(key, hot.value);

    return this.locks.runExclusive(key, async () => {
      // A set may have completed while we waited.
      const fresh = this.readFast(key);
      if (fresh) return this.recordFastHit(key, fresh.value);

      const since = this.beginGuardedWrite();
      try {
        const stored = await this.persistentCall('get', () => this.persistent.get(key));
        if (stored && stored.expiresAt > this.clock.now()) {
          this.counters.hitsTier2++;
          if (this.invalidatedSince(key, since)) {
            this.logger.debug('Skipped promotion of invalidated key', { key });
          } else {
            this.counters.promotions++;
            this.counters.evictions += this.fast.set(key, stored.value, this.clock.now(), this.memoryTtlMs);
          }
          this.logger.debug('Cache L2 hit', { key });
          this.hooks?.onHit?.({ key, tier: 2 });
          return { hit: true, value: stored.value, tier: 2 };
        }
      } finally {
        this.endGuardedWrite();
      }

      this.counters.misses++;
      this.logger.debug('Cache miss', { key });
      this.hooks?.onMiss?.({ key });
      return { hit: false };
    });
  }

  /** Writes both tiers. TTLs in seconds; defaults come from the cache config. */
  async set(key: string, value: JsonValue, memoryTtl?: number, diskTtl?: number): Promise<void> {
    this.assertReady();
    assertCacheKey(key);
    const memoryTtlMs = memoryTtl !== undefined ? memoryTtl * 1000 : this.memoryTtlMs;
    const diskTtlMs = diskTtl !== undefined ? diskTtl * 1000 : this.diskTtlMs;

    await this.locks.runExclusive(key, async () => {
      const createdAt = this.clock.now();
      const since = this.beginGuardedWrite();
      try {
        await this.persistentCall('set', () =>
          this.persistent.set(key, { value, createdAt, expiresAt: createdAt + diskTtlMs }),
        );
        // Visible to lock-free readers only once the persistent write has settled.
        if (!this.invalidatedSince(key, since)) {
          this.counters.evictions += this.fast.set(key, value, createdAt, memoryTtlMs);
        }
      } finally {
        this.endGuardedWrite();
      }
      this.counters.sets++;
      this.logger.debug('Cache set', { key, memoryTtlMs, diskTtlMs });
    });
  }

  /** Exact key or `prefix:*` pattern; returns entries removed across both tiers. */
  async invalidate(pattern: string): Promise<number> {
    this.assertReady();
    const target = parseInvalidation(pattern);

    if (target.kind === 'exact') {
      return this.locks.runExclusive(target.key, async () => {
        const fastRemoved = this.fast.delete(target.key) ? 1 : 0;
        const persistentRemoved = await this.persistentCall('invalidate', () =>
          this.persistent.delete(target.key),
        );
        const count = fastRemoved + (persistentRemoved ? 1 : 0);
        this.logger.info('Invalidated cache key', { key: target.key, count });
        return count;
      });
    }

    // Prefix invalidation takes no key locks; overlapping reads and writes
    // check the log below before touching the fast tier.
    const record: PrefixInvalidation = { seq: ++this.invalidationSeq, target, active: true };
    this.prefixInvalidations.push(record);
    let count: number;
    try {
      const fastRemoved = this.fast.deleteByPrefix(target.prefix);
      const persistentRemoved =
        (await this.persistentCall('invalidate', () => this.persistent.deleteByPrefix(target.prefix))) ?? 0;
      count = fastRemoved + persistentRemoved;
    } finally {
      record.active = false;
      this.prunePrefixInvalidations();
    }
    this.logger.info('Invalidated cache keys matching pattern', { pattern, count });
    return count;
  }

  async clear(): Promise<void> {
    this.assertReady();
    this.fast.clear();
    await this.persistentCall('clear', () => this.persistent.clear());
    this.logger.info('Cache cleared');
  }

  /**
   * Expires the fast tier and culls the persistent tier down to its budget.
   * The signal is checked between keys, never in the middle of one.
   */
  async sweep(signal?: AbortSignal): Promise<SweepResult> {
    this.assertReady();
    const now = this.clock.now();
    const fastExpired = this.fast.purgeExpired(now);
    this.counters.evictions += fastExpired;

    let persistentCulled = 0;
    if (!signal?.aborted) {
      persistentCulled =
        (await this.persistentCall('cull', () =>
          this.persistent.cull({ now, maxEntries: this.diskMaxEntries, signal }),
        )) ?? 0;
      this.counters.evictions += persistentCulled;
    }
    if (persistentCulled > 0) this.logger.info('Culled persistent cache entries', { count: persistentCulled });
    return { fastExpired, persistentCulled };
  }

  async stats(): Promise<CacheStats> {
    const persistentTierSize =
      this.state === 'ready' ? ((await this.persistentCall('size', () => this.persistent.size())) ?? null) : null;
    const { hitsTier1, hitsTier2, misses } = this.counters;
    const totalRequests = hitsTier1 + hitsTier2 + misses;
    const hitRatePercent =
      totalRequests > 0 ? Math.round(((hitsTier1 + hitsTier2) / totalRequests) * 10_000) / 100 : 0;
    return {
      ...this.counters,
      fastTierSize: this.fast.size,
      persistentTierSize,
      totalRequests,
      hitRatePercent,
    };
  }

  protected async onClose(): Promise<void> {
    this.fast.clear();
    try {
      await this.persistent.close?.();
    } catch (error) {
      this.logger.error('Error closing persistent cache tier', { error });
    }
  }

  private readFast(key: string) {
    const { entry, expired } = this.fast.get(key, this.clock.now());
    if (expired) this.counters.evictions++;
    return entry;
  }

  private beginGuardedWrite(): number {
    this.guardedWrites++;
    return this.invalidationSeq;
  }

  private endGuardedWrite(): void {
    this.guardedWrites--;
    this.prunePrefixInvalidations();
  }

  /**
   * True when a prefix invalidation matching `key` was running at `since` or
   * started after it. A fast-tier write from such an operation is dropped.
   */
  private invalidatedSince(key: string, since: number): boolean {
    return this.prefixInvalidations.some(
      (inv) => (inv.active || inv.seq > since) && matchesInvalidation(key, inv.target),
    );
  }

  // Finished invalidations only matter to reads and writes that overlapped them.
  private prunePrefixInvalidations(): void {
    if (this.guardedWrites > 0) return;
    this.prefixInvalidations = this.prefixInvalidations.filter((inv) => inv.active);
  }

  private recordFastHit(key: string, value: JsonValue): CacheReadResult {
    this.counters.hitsTier1++;
    this.logger.debug('Cache L1 hit', { key });
    this.hooks?.onHit?.({ key, tier: 1 });
    return { hit: true, value, tier: 1 };
  }

  private async persistentCall<T>(operation: string, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (cause) {
      const error = new CacheBackendUnavailable(operation, cause);
      this.counters.backendErrors++;
      this.logger.warn('Persistent cache tier unavailable; serving from memory only', {
        error_code: error.code,
        operation,
        error: cause,
      });
      this.hooks?.onBackendUnavailable?.(error);
      return undefined;
    }
  }
}
