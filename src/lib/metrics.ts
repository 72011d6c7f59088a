import type { GatewaySnapshot } from '../types';

export class MetricsCollector {
  private history: GatewaySnapshot[] = [];

  constructor(
    private readonly maxHistorySize: number = 1000,
    private readonly prefix: string = 'tiergate_',
  ) {}

  record(snapshot: GatewaySnapshot): void {
    this.history.push(snapshot);
    if (this.history.length > this.maxHistorySize) {
      this.history = this.history.slice(-this.maxHistorySize);
    }
  }

  latest(): GatewaySnapshot | undefined {
    return this.history[this.history.length - 1];
  }

  getMetricsHistory(): GatewaySnapshot[] {
    return [...this.history];
  }

  getPrometheusMetrics(): string {
    const current = this.latest();
    if (!current) return '';
    const p = this.prefix;
    const { cache, rateLimit } = current;

    const lines: string[] = [];
    const metric = (name: string, type: 'counter' | 'gauge', help: string, value: number, labels = '') => {
      if (!lines.some((l) => l === `# TYPE ${p}${name} ${type}`)) {
        lines.push(`# HELP ${p}${name} ${help}`, `# TYPE ${p}${name} ${type}`);
      }
      lines.push(`${p}${name}${labels} ${value}`);
    };

    metric('cache_hits_total', 'counter', 'Cache hits by tier', cache.hitsTier1, '{tier="1"}');
    metric('cache_hits_total', 'counter', 'Cache hits by tier', cache.hitsTier2, '{tier="2"}');
    metric('cache_misses_total', 'counter', 'Cache misses', cache.misses);
    metric('cache_promotions_total', 'counter', 'Persistent-tier hits copied into the fast tier', cache.promotions);
    metric('cache_evictions_total', 'counter', 'Entries evicted from either tier', cache.evictions);
    metric('cache_backend_errors_total', 'counter', 'Persistent-tier operations that failed', cache.backendErrors);
    metric('cache_items', 'gauge', 'Items held per tier', cache.fastTierSize, '{tier="1"}');
    if (cache.persistentTierSize !== null) {
      metric('cache_items', 'gauge', 'Items held per tier', cache.persistentTierSize, '{tier="2"}');
    }
    metric('cache_hit_ratio', 'gauge', 'Cache hit ratio (0-1)', cache.hitRatePercent / 100);
    metric('rate_limit_allowed_total', 'counter', 'Admitted rate-limit checks', rateLimit.allowed);
    metric('rate_limit_blocks_total', 'counter', 'Rejected rate-limit checks', rateLimit.blocked);
    metric('rate_limit_principals', 'gauge', 'Principals with a live rate window', rateLimit.principals);

    return lines.join('\n') + '\n';
  }
}
