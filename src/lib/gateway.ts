import { AuthenticationError, RateLimitExceeded } from './errors';
import type { CredentialVault } from './credentialVault';
import type { RateLimiter } from './rateLimiter';
import type { TierCache } from './tierCache';
import type { Clock } from './clock';
import type { Logger } from './logger';
import type { JsonValue, Principal, RateDecision, SessionIssue, UpstreamClient } from '../types';

export type GatewayDeps = {
  vault: CredentialVault;
  limiter: RateLimiter;
  cache: TierCache;
  clock: Clock;
  logger: Logger;
};

export type CachedOptions = {
  memoryTtl?: number; // seconds
  diskTtl?: number; // seconds
  signal?: AbortSignal;
};

export type CachedResult = {
  value: JsonValue;
  source: 'tier1' | 'tier2' | 'computed';
};

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new Error('Request aborted');
  }
}

/**
 * Per-request contract for handlers: authenticate, admit, then read through
 * the cache. Holds no state of its own; everything is delegated.
 */
export class GatewayFacade {
  constructor(private readonly deps: GatewayDeps) {}

  login(principalId: string, secret: string, ttlSeconds?: number): SessionIssue {
    return this.deps.vault.create(principalId, secret, ttlSeconds);
  }

  refresh(token: string): SessionIssue {
    return this.deps.vault.refresh(token);
  }

  authenticate(token: string | undefined): Principal {
    if (!token) throw new AuthenticationError('Missing', 'Missing bearer token');
    return this.deps.vault.verify(token);
  }

  admit(principal: Principal): RateDecision {
    const decision = this.deps.limiter.allow(principal.id);
    if (!decision.allowed) {
      const retryAfterSeconds = Math.max(1, Math.ceil((decision.resetAt - this.deps.clock.now()) / 1000));
      this.deps.logger.warn('Rate limit exceeded', { principalId: principal.id, resetAt: decision.resetAt });
      throw new RateLimitExceeded(decision.limit, decision.resetAt, retryAfterSeconds);
    }
    return decision;
  }

  /**
   * Cache-aside read. `compute` runs only on a miss; its result is written to
   * both tiers. Aborting stops work that has not started yet: a computed value
   * is still committed, and a committed write is never rolled back.
   */
  async cached(
    key: string,
    compute: () => Promise<JsonValue>,
    options: CachedOptions = {},
  ): Promise<CachedResult> {
    const { memoryTtl, diskTtl, signal } = options;
    throwIfAborted(signal);
    const hit = await this.deps.cache.get(key);
    if (hit.hit) return { value: hit.value, source: hit.tier === 1 ? 'tier1' : 'tier2' };

    throwIfAborted(signal);
    const value = await compute();
    await this.deps.cache.set(key, value, memoryTtl, diskTtl);
    return { value, source: 'computed' };
  }

  fetchThrough(
    principal: Principal,
    key: string,
    client: UpstreamClient,
    resource: string,
    options?: CachedOptions,
  ): Promise<CachedResult> {
    return this.cached(key, () => client.request(principal, resource), options);
  }

  invalidate(pattern: string): Promise<number> {
    return this.deps.cache.invalidate(pattern);
  }
}
