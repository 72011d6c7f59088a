import type Redis from 'ioredis';
import type { CullOptions, JsonValue, PersistentEntry, PersistentStore } from '../types';

const SCAN_COUNT = 200;
const INDEX_SUFFIX = '__index'; // no ':' so it can never collide with a cache key

type ExecResult = [error: Error | null, result: unknown][] | null;

function assertExec(results: ExecResult): [Error | null, unknown][] {
  if (!results) throw new Error('Redis transaction aborted');
  for (const [error] of results) {
    if (error) throw error;
  }
  return results;
}

function escapeGlob(input: string): string {
  return input.replace(/[*?[\]\\]/g, '\\$&');
}

function isPersistentEntry(value: unknown): value is PersistentEntry {
  if (typeof value !== 'object' || value === null) return false;
  const rec: Record<string, unknown> = { ...value };
  return 'value' in rec && typeof rec.createdAt === 'number' && typeof rec.expiresAt === 'number';
}

/**
 * Persistent tier on Redis. Each entry is a JSON string with a PX expiry at
 * `<namespace><key>`; a sorted set scored by insertion time tracks every
 * stored key for sizing, culling by age and prefix invalidation.
 */
export class RedisStore implements PersistentStore {
  private readonly indexKey: string;

  constructor(
    private readonly client: Redis,
    private readonly namespace: string = 'tg:',
  ) {
    this.indexKey = `${namespace}${INDEX_SUFFIX}`;
  }

  async get(key: string): Promise<PersistentEntry | undefined> {
    const raw = await this.client.get(this.entryKey(key));
    if (!raw) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return undefined;
    }
    return isPersistentEntry(parsed) ? parsed : undefined;
  }

  async set(key: string, entry: PersistentEntry): Promise<void> {
    const ttlMs = Math.max(1, Math.ceil(entry.expiresAt - entry.createdAt));
    const payload: { value: JsonValue; createdAt: number; expiresAt: number } = {
      value: entry.value,
      createdAt: entry.createdAt,
      expiresAt: entry.expiresAt,
    };
    const results = await this.client
      .multi()
      .set(this.entryKey(key), JSON.stringify(payload), 'PX', ttlMs)
      .zadd(this.indexKey, entry.createdAt, key)
      .exec();
    assertExec(results);
  }

  async delete(key: string): Promise<boolean> {
    return this.removeOne(key);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const match = `${escapeGlob(this.namespace)}${escapeGlob(prefix)}*`;
    let removed = 0;
    let cursor = '0';
    do {
      const [next, found] = await this.client.scan(cursor, 'MATCH', match, 'COUNT', SCAN_COUNT);
      cursor = next;
      for (const fullKey of found) {
        removed += (await this.removeOne(fullKey.slice(this.namespace.length))) ? 1 : 0;
      }
    } while (cursor !== '0');
    return removed;
  }

  async size(): Promise<number> {
    return this.client.zcard(this.indexKey);
  }

  async cull({ maxEntries, signal }: CullOptions): Promise<number> {
    let removed = 0;

    // Redis expires values on its own; drop index members whose value is gone.
    const members = await this.client.zrange(this.indexKey, 0, -1);
    for (let i = 0; i < members.length; i += SCAN_COUNT) {
      if (signal?.aborted) return removed;
      const batch = members.slice(i, i + SCAN_COUNT);
      const pipeline = this.client.pipeline();
      for (const member of batch) pipeline.exists(this.entryKey(member));
      const results = assertExec(await pipeline.exec());
      for (let j = 0; j < batch.length; j++) {
        if (signal?.aborted) return removed;
        if (Number(results[j][1]) === 0) {
          await this.client.zrem(this.indexKey, batch[j]);
          removed++;
        }
      }
    }

    const excess = (await this.client.zcard(this.indexKey)) - maxEntries;
    if (excess > 0) {
      const oldest = await this.client.zrange(this.indexKey, 0, excess - 1);
      for (const member of oldest) {
        if (signal?.aborted) return removed;
        await this.removeOne(member);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    let cursor = '0';
    do {
      const [next, found] = await this.client.scan(cursor, 'MATCH', `${escapeGlob(this.namespace)}*`, 'COUNT', SCAN_COUNT);
      cursor = next;
      if (found.length > 0) await this.client.del(...found);
    } while (cursor !== '0');
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private entryKey(key: string): string {
    return `${this.namespace}${key}`;
  }

  // Value and index entry leave together.
  private async removeOne(key: string): Promise<boolean> {
    const results = assertExec(
      await this.client.multi().del(this.entryKey(key)).zrem(this.indexKey, key).exec(),
    );
    return Number(results[0][1]) > 0 || Number(results[1][1]) > 0;
  }
}
