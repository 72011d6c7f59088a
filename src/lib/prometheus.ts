import type { Request, Response, NextFunction } from 'express';
import type { MetricsCollector } from './metrics';

export interface PrometheusOptions {
  metrics: MetricsCollector;
  path?: string;
}

// Serves the most recent scheduler snapshot in text exposition format.
export function prometheusMetrics(options: PrometheusOptions) {
  const { metrics, path = '/metrics' } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.path !== path) return next();
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
    res.status(200).send(metrics.getPrometheusMetrics());
  };
}
