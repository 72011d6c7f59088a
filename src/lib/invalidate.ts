import type { Request, Response, NextFunction } from 'express';
import type { TierCache } from './tierCache';

export type InvalidateOptions = {
  cache: TierCache;
  // Exact keys or `prefix:*` patterns.
  patterns?: string[];
  resolvePatterns?: (req: Request) => string[] | Promise<string[]>;
  hooks?: {
    onInvalidated?: (info: { patterns: string[]; count: number; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

/**
 * Drops matching entries from both tiers before the route handler runs, so
 * the next read recomputes.
 */
export function invalidateCache(options: InvalidateOptions) {
  const { cache, patterns, resolvePatterns, hooks } = options;

  return async function invalidateMiddleware(req: Request, _res: Response, next: NextFunction) {
    try {
      const resolved = [...(patterns ?? []), ...((await resolvePatterns?.(req)) ?? [])].filter(Boolean);
      if (resolved.length === 0) return next();

      let count = 0;
      for (const pattern of resolved) {
        count += await cache.invalidate(pattern);
      }
      hooks?.onInvalidated?.({ patterns: resolved, count, req });
      next();
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
    }
  };
}
