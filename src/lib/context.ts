import Redis from 'ioredis';
import { CredentialVault } from './credentialVault';
import { RateLimiter } from './rateLimiter';
import { TierCache } from './tierCache';
import { MaintenanceScheduler } from './scheduler';
import { MetricsCollector } from './metrics';
import { GatewayFacade } from './gateway';
import { describeConfig, type GatewayConfig } from './config';
import { systemClock, type Clock } from './clock';
import { createLogger, type Logger } from './logger';
import { MemoryStore } from '../stores/memoryStore';
import { RedisStore } from '../stores/redisStore';
import type { GatewaySnapshot, PersistentStore } from '../types';

export type GatewayContextOverrides = {
  clock?: Clock;
  logger?: Logger;
  persistent?: PersistentStore;
  onSnapshot?: (snapshot: GatewaySnapshot) => void;
};

export type GatewayContext = {
  config: GatewayConfig;
  clock: Clock;
  logger: Logger;
  vault: CredentialVault;
  limiter: RateLimiter;
  cache: TierCache;
  metrics: MetricsCollector;
  scheduler: MaintenanceScheduler;
  gateway: GatewayFacade;
  init(): Promise<void>;
  close(): Promise<void>;
};

function createPersistentStore(cfg: GatewayConfig, logger: Logger): PersistentStore {
  if (!cfg.redisUrl) return new MemoryStore();
  const client = new Redis(cfg.redisUrl, { maxRetriesPerRequest: 1 });
  client.on('error', (error: Error) => {
    logger.warn('Redis connection error', { error: error.message });
  });
  return new RedisStore(client, cfg.cacheNamespace);
}

/**
 * Builds every component once, wired by reference. Throws ConfigurationError
 * before anything starts when the session secret fails the production policy.
 */
export function createGatewayContext(
  config: GatewayConfig,
  overrides: GatewayContextOverrides = {},
): GatewayContext {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });

  const vault = new CredentialVault({
    secretKey: config.secretKey,
    production: config.production,
    defaultTtlSeconds: config.sessionTtlSeconds,
    clock,
    logger: logger.child({ component: 'vault' }),
  });
  const limiter = new RateLimiter({
    requests: config.rateLimit,
    window: config.rateWindowSeconds,
    clock,
  });
  const cache = new TierCache({
    persistent: overrides.persistent ?? createPersistentStore(config, logger),
    memorySize: config.cacheMemorySize,
    memoryTtl: config.cacheMemoryTtlSeconds,
    diskTtl: config.cacheDiskTtlSeconds,
    diskMaxEntries: config.cacheDiskMaxEntries,
    clock,
    logger: logger.child({ component: 'cache' }),
  });
  const metrics = new MetricsCollector();
  const scheduler = new MaintenanceScheduler({
    limiter,
    cache,
    sweepInterval: config.sweepIntervalSeconds,
    statsInterval: config.statsIntervalSeconds,
    metrics,
    clock,
    logger: logger.child({ component: 'scheduler' }),
    onSnapshot: overrides.onSnapshot,
  });
  const gateway = new GatewayFacade({ vault, limiter, cache, clock, logger });

  return {
    config,
    clock,
    logger,
    vault,
    limiter,
    cache,
    metrics,
    scheduler,
    gateway,
    async init() {
      await limiter.init();
      await cache.init();
      if (config.enableScheduler) scheduler.start();
      logger.info('Gateway initialized', describeConfig(config));
    },
    async close() {
      await scheduler.stop();
      await cache.close();
      await limiter.close();
      logger.info('Gateway closed');
    },
  };
}
