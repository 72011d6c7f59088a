import { matchesInvalidation, type Invalidation } from '../lib/keys';
import type { CullOptions, PersistentEntry, PersistentStore } from '../types';

/**
 * In-process persistent tier. Used when no Redis URL is configured and as
 * the stand-in store in tests; contents do not survive a restart.
 */
export class MemoryStore implements PersistentStore {
  private readonly entries = new Map<string, PersistentEntry>();

  async get(key: string): Promise<PersistentEntry | undefined> {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  async set(key: string, entry: PersistentEntry): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, { ...entry });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const target: Invalidation = { kind: 'prefix', prefix };
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (matchesInvalidation(key, target)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async cull({ now, maxEntries, signal }: CullOptions): Promise<number> {
    let removed = 0;
    for (const [key, entry] of Array.from(this.entries)) {
      if (signal?.aborted) return removed;
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    // Map iteration order is insertion order.
    while (this.entries.size > maxEntries) {
      if (signal?.aborted) return removed;
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      removed++;
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
