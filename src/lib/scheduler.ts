import { describeError } from './errors';
import { systemClock, type Clock } from './clock';
import { silentLogger, type Logger } from './logger';
import type { MetricsCollector } from './metrics';
import type { RateLimiter } from './rateLimiter';
import type { SweepResult, TierCache } from './tierCache';
import type { GatewaySnapshot } from '../types';

export type MaintenanceSchedulerOptions = {
  limiter: RateLimiter;
  cache: TierCache;
  sweepInterval: number; // seconds
  statsInterval: number; // seconds
  metrics?: MetricsCollector;
  clock?: Clock;
  logger?: Logger;
  onSnapshot?: (snapshot: GatewaySnapshot) => void;
};

export type MaintenanceSweepResult = SweepResult & { rateWindowsRemoved: number };

/**
 * Two timers: a sweep that expires cache tiers and idle rate windows, and a
 * stats snapshot. Neither job overlaps itself. `stop` lets a running sweep
 * finish the key it is on and starts no further cycles.
 */
export class MaintenanceScheduler {
  private sweepTimer: NodeJS.Timeout | null = null;
  private statsTimer: NodeJS.Timeout | null = null;
  private runningSweep: Promise<MaintenanceSweepResult | undefined> | null = null;
  private runningStats: Promise<GatewaySnapshot | undefined> | null = null;
  private readonly abort = new AbortController();
  private stopped = false;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly options: MaintenanceSchedulerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  get running(): boolean {
    return this.sweepTimer !== null;
  }

  start(): void {
    if (this.sweepTimer || this.stopped) return;
    if (this.options.limiter.state !== 'ready' || this.options.cache.state !== 'ready') {
      throw new Error('MaintenanceScheduler requires an initialized RateLimiter and TierCache');
    }
    this.sweepTimer = setInterval(() => {
      void this.runSweep();
    }, this.options.sweepInterval * 1000);
    this.statsTimer = setInterval(() => {
      void this.runStatsSnapshot();
    }, this.options.statsInterval * 1000);
    this.sweepTimer.unref();
    this.statsTimer.unref();
    this.logger.info('Scheduler started with 2 background jobs', {
      sweepIntervalSeconds: this.options.sweepInterval,
      statsIntervalSeconds: this.options.statsInterval,
    });
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    if (this.statsTimer) clearInterval(this.statsTimer);
    this.sweepTimer = null;
    this.statsTimer = null;
    this.abort.abort();
    await Promise.allSettled([this.runningSweep, this.runningStats]);
    this.logger.info('Scheduler shutdown complete');
  }

  runSweep(): Promise<MaintenanceSweepResult | undefined> {
    if (this.stopped) return Promise.resolve(undefined);
    if (this.runningSweep) return this.runningSweep;
    this.runningSweep = this.sweepOnce().finally(() => {
      this.runningSweep = null;
    });
    return this.runningSweep;
  }

  runStatsSnapshot(): Promise<GatewaySnapshot | undefined> {
    if (this.stopped) return Promise.resolve(undefined);
    if (this.runningStats) return this.runningStats;
    this.runningStats = this.statsOnce().finally(() => {
      this.runningStats = null;
    });
    return this.runningStats;
  }

  private async sweepOnce(): Promise<MaintenanceSweepResult | undefined> {
    this.logger.info('Running cache cleanup job');
    try {
      const rateWindowsRemoved = this.options.limiter.sweep();
      const result = await this.options.cache.sweep(this.abort.signal);
      this.logger.info('Cache cleanup completed', { ...result, rateWindowsRemoved });
      return { ...result, rateWindowsRemoved };
    } catch (error) {
      this.logger.error('Cache cleanup failed', { error: describeError(error) });
      return undefined;
    }
  }

  private async statsOnce(): Promise<GatewaySnapshot | undefined> {
    try {
      const snapshot: GatewaySnapshot = {
        timestamp: this.clock.now(),
        cache: await this.options.cache.stats(),
        rateLimit: this.options.limiter.stats(),
      };
      this.options.metrics?.record(snapshot);
      this.logger.info('Cache stats', {
        hitRatePercent: snapshot.cache.hitRatePercent,
        l1Size: snapshot.cache.fastTierSize,
        l2Size: snapshot.cache.persistentTierSize,
        totalRequests: snapshot.cache.totalRequests,
        rateLimitBlocks: snapshot.rateLimit.blocked,
      });
      this.options.onSnapshot?.(snapshot);
      return snapshot;
    } catch (error) {
      this.logger.error('Failed to log cache stats', { error: describeError(error) });
      return undefined;
    }
  }
}
