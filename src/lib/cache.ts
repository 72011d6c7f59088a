import type { Request, Response, NextFunction } from 'express';
import { describeError } from './errors';
import type { TierCache } from './tierCache';
import type { JsonValue } from '../types';

export type CacheOptions = {
  cache: TierCache;
  // Must return a key in the namespace:identifier[:subfield[:parameter]] grammar.
  keyGenerator: (req: Request) => string;
  memoryTtl?: number; // seconds
  diskTtl?: number; // seconds
  shouldBypass?: (req: Request) => boolean;
  hooks?: {
    onHit?: (info: { key: string; tier: 1 | 2; req: Request }) => void;
    onMiss?: (info: { key: string; req: Request }) => void;
    onCacheSet?: (info: { key: string; req: Request; statusCode: number }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Cache-aside for JSON GET routes. A hit answers straight from the cache with
 * `X-Cache: HIT-L1` or `HIT-L2`; a miss lets the handler run and stores the
 * body it sends with `res.json` when the status is 2xx.
 */
export function cache(options: CacheOptions) {
  const { cache: tierCache, keyGenerator, memoryTtl, diskTtl, shouldBypass, hooks } = options;

  return async function cacheMiddleware(req: Request, res: Response, next: NextFunction) {
    if (req.method !== 'GET') return next();
    if (shouldBypass && shouldBypass(req)) return next();

    let key = '';
    try {
      key = keyGenerator(req);
      const cached = await tierCache.get(key);
      if (cached.hit) {
        res.setHeader('X-Cache', cached.tier === 1 ? 'HIT-L1' : 'HIT-L2');
        hooks?.onHit?.({ key, tier: cached.tier, req });
        res.status(200).json(cached.value);
        return;
      }
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
      return;
    }

    hooks?.onMiss?.({ key, req });
    res.setHeader('X-Cache', 'MISS');
    const originalJson = res.json.bind(res);
    res.json = (body: unknown) => {
      if (res.statusCode >= 200 && res.statusCode < 300 && isJsonValue(body)) {
        const statusCode = res.statusCode;
        tierCache
          .set(key, body, memoryTtl, diskTtl)
          .then(() => hooks?.onCacheSet?.({ key, req, statusCode }))
          .catch((error: unknown) => {
            req.log?.error('Cache write failed', { key, error: describeError(error) });
            hooks?.onError?.({ error, req });
          });
      }
      return originalJson(body);
    };
    next();
  };
}
