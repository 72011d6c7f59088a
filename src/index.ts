export * from './lib/clock';
export * from './lib/config';
export * from './lib/errors';
export * from './lib/logger';
export * from './lib/lifecycle';
export * from './lib/keys';
export * from './lib/keyedMutex';
export * from './lib/credentialVault';
export * from './lib/rateLimiter';
export * from './lib/fastTier';
export * from './lib/tierCache';
export * from './lib/metrics';
export * from './lib/scheduler';
export * from './lib/gateway';
export * from './lib/context';
export * from './lib/auth';
export * from './lib/rateLimit';
export * from './lib/cache';
export * from './lib/invalidate';
export * from './lib/prometheus';
export * from './lib/logEnrichment';
export * from './stores/memoryStore';
export * from './stores/redisStore';
export type {
  JsonValue,
  Tier,
  CacheReadResult,
  CacheStats,
  CullOptions,
  PersistentEntry,
  PersistentStore,
  RateDecision,
  RateLimiterStats,
  Principal,
  SessionIssue,
  GatewaySnapshot,
  UpstreamClient,
} from './types';
