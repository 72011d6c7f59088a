import { Lifecycle } from './lifecycle';
import { systemClock, type Clock } from './clock';
import type { RateDecision, RateLimiterStats } from '../types';

export type RateLimiterOptions = {
  requests: number;
  window: number; // seconds
  clock?: Clock;
};

type RateWindow = {
  timestamps: number[]; // ascending, admitted requests only
  lastSeen: number;
};

/**
 * Exact sliding-log limiter: at most `requests` admissions in any trailing
 * interval of `window` seconds. A timestamp exactly `window` old no longer
 * counts. Memory is one number per admitted request still in the window.
 *
 * `allow` has no await between reading and writing a principal's log, so on
 * the event loop each check is atomic and unrelated principals share nothing.
 */
export class RateLimiter extends Lifecycle {
  readonly limit: number;
  readonly windowMs: number;
  private readonly clock: Clock;
  private readonly windows = new Map<string, RateWindow>();
  private allowedCount = 0;
  private blockedCount = 0;

  constructor(options: RateLimiterOptions) {
    super('RateLimiter');
    if (!Number.isInteger(options.requests) || options.requests <= 0) {
      throw new RangeError('requests must be a positive integer');
    }
    if (!(options.window > 0)) throw new RangeError('window must be positive');
    this.limit = options.requests;
    this.windowMs = options.window * 1000;
    this.clock = options.clock ?? systemClock;
  }

  allow(principalId: string): RateDecision {
    this.assertReady();
    const now = this.clock.now();
    let record = this.windows.get(principalId);
    if (!record) {
      record = { timestamps: [], lastSeen: now };
      this.windows.set(principalId, record);
    }
    record.lastSeen = now;
    this.prune(record, now);

    const count = record.timestamps.length;
    if (count >= this.limit) {
      this.blockedCount++;
      return { allowed: false, limit: this.limit, remaining: 0, resetAt: record.timestamps[0] + this.windowMs };
    }

    record.timestamps.push(now);
    this.allowedCount++;
    return {
      allowed: true,
      limit: this.limit,
      remaining: this.limit - count - 1,
      resetAt: record.timestamps[0] + this.windowMs,
    };
  }

  reset(principalId: string): void {
    this.assertReady();
    this.windows.delete(principalId);
  }

  // Drops windows idle for at least one full window; returns how many.
  sweep(): number {
    this.assertReady();
    const now = this.clock.now();
    let removed = 0;
    for (const [principalId, record] of this.windows) {
      this.prune(record, now);
      if (record.timestamps.length === 0 && now - record.lastSeen >= this.windowMs) {
        this.windows.delete(principalId);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.windows.size;
  }

  stats(): RateLimiterStats {
    return { principals: this.windows.size, allowed: this.allowedCount, blocked: this.blockedCount };
  }

  protected async onClose(): Promise<void> {
    this.windows.clear();
  }

  private prune(record: RateWindow, now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < record.timestamps.length && record.timestamps[drop] <= cutoff) drop++;
    if (drop > 0) record.timestamps.splice(0, drop);
  }
}
