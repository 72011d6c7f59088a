import express from 'express';
import request from 'supertest';
import { MetricsCollector } from '../src/lib/metrics';
import { prometheusMetrics } from '../src/lib/prometheus';
import type { GatewaySnapshot } from '../src/types';

function snapshot(timestamp: number, persistentTierSize: number | null = 40): GatewaySnapshot {
  return {
    timestamp,
    cache: {
      hitsTier1: 6,
      hitsTier2: 2,
      misses: 2,
      promotions: 2,
      evictions: 1,
      sets: 4,
      backendErrors: 0,
      fastTierSize: 3,
      persistentTierSize,
      totalRequests: 10,
      hitRatePercent: 80,
    },
    rateLimit: { principals: 2, allowed: 12, blocked: 1 },
  };
}

describe('MetricsCollector', () => {
  test('keeps a bounded history', () => {
    const metrics = new MetricsCollector(2);
    metrics.record(snapshot(1));
    metrics.record(snapshot(2));
    metrics.record(snapshot(3));
    expect(metrics.getMetricsHistory().map((s) => s.timestamp)).toEqual([2, 3]);
    expect(metrics.latest()?.timestamp).toBe(3);
  });

  test('renders the latest snapshot in exposition format', () => {
    const metrics = new MetricsCollector();
    expect(metrics.getPrometheusMetrics()).toBe('');
    metrics.record(snapshot(1));

    const lines = metrics.getPrometheusMetrics().split('\n');
    expect(lines).toContain('# TYPE tiergate_cache_hits_total counter');
    expect(lines).toContain('tiergate_cache_hits_total{tier="1"} 6');
    expect(lines).toContain('tiergate_cache_hits_total{tier="2"} 2');
    expect(lines).toContain('tiergate_cache_items{tier="2"} 40');
    expect(lines).toContain('tiergate_cache_hit_ratio 0.8');
    expect(lines).toContain('tiergate_rate_limit_blocks_total 1');
    expect(lines.filter((l) => l === '# TYPE tiergate_cache_hits_total counter')).toHaveLength(1);
  });

  test('omits the persistent tier size when it is unknown', () => {
    const metrics = new MetricsCollector();
    metrics.record(snapshot(1, null));
    const text = metrics.getPrometheusMetrics();
    expect(text).toContain('tiergate_cache_items{tier="1"} 3');
    expect(text).not.toContain('tiergate_cache_items{tier="2"}');
  });
});

describe('prometheusMetrics middleware', () => {
  test('serves the metrics path and passes everything else through', async () => {
    const metrics = new MetricsCollector();
    metrics.record(snapshot(1));
    const app = express();
    app.use(prometheusMetrics({ metrics }));
    app.get('/other', (_req, res) => {
      res.json({ ok: true });
    });

    const res = await request(app).get('/metrics');
    const other = await request(app).get('/other');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/plain;/);
    expect(res.headers['content-type']).toContain('version=0.0.4');
    expect(res.text).toBe(metrics.getPrometheusMetrics());
    expect(other.body).toEqual({ ok: true });
  });
});
