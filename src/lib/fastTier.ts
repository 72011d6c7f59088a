import { matchesInvalidation, type Invalidation } from './keys';
import type { JsonValue } from '../types';

export type FastEntry = {
  value: JsonValue;
  createdAt: number;
  expiresAt: number;
};

export type FastLookup = {
  entry: FastEntry | undefined;
  expired: boolean; // an entry was present but past its expiry, and is now gone
};

/**
 * Bounded in-process map with per-entry expiry. When full, the
 * oldest-inserted entry goes first; reads do not reorder.
 */
export class FastTier {
  private readonly store = new Map<string, FastEntry>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError('capacity must be a positive integer');
    }
  }

  /** Looks up the live entry, dropping it first if it has expired. */
  get(key: string, now: number): FastLookup {
    const entry = this.store.get(key);
    if (!entry) return { entry: undefined, expired: false };
    if (entry.expiresAt <= now) {
      this.store.delete(key);
      return { entry: undefined, expired: true };
    }
    return { entry, expired: false };
  }

  /** Inserts at the back; returns how many entries were evicted for room. */
  set(key: string, value: JsonValue, now: number, ttlMs: number): number {
    // Re-insertion counts as a new insertion.
    this.store.delete(key);
    let evicted = 0;
    while (this.store.size >= this.capacity) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
      evicted++;
    }
    this.store.set(key, { value, createdAt: now, expiresAt: now + ttlMs });
    return evicted;
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  deleteByPrefix(prefix: string): number {
    const target: Invalidation = { kind: 'prefix', prefix };
    let removed = 0;
    for (const key of Array.from(this.store.keys())) {
      if (matchesInvalidation(key, target)) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  purgeExpired(now: number): number {
    let removed = 0;
    for (const [key, entry] of Array.from(this.store)) {
      if (entry.expiresAt <= now) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
