import type { Request, Response, NextFunction } from 'express';
import client from 'prom-client';

const requestCounter = new client.Counter({
  name: 'http_requests_total',
  help: 'HTTP requests count',
  labelNames: ['route', 'method', 'code'] as const,
});

const requestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['route', 'method', 'code'] as const,
  buckets: [0.05, 0.1, 0.3, 0.6, 1, 3, 5],
});

const conversionCounter = new client.Counter({
  name: 'http_conversion_requests_total',
  help: 'Conversion requests by source and target format',
  labelNames: ['route', 'from', 'to', 'code'] as const,
});

type FormatPairLabel = { from: string; to: string };

const pairs = new WeakMap<Response, FormatPairLabel>();

/**
 * Tags the response with the requested format pair. Formats that failed to
 * parse are counted as `unknown`.
 */
export function labelConversion(res: Response, from: string | undefined, to: string | undefined) {
  pairs.set(res, { from: from ?? 'unknown', to: to ?? 'unknown' });
}

if (process.env.NODE_ENV !== 'test') client.collectDefaultMetrics();

export function metricsMiddleware(routeLabel: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const code = String(res.statusCode);
      requestCounter.inc({ route: routeLabel, method: req.method, code });
      const elapsed = Number(process.hrtime.bigint() - start) / 1e9;
      requestDuration.observe({ route: routeLabel, method: req.method, code }, elapsed);
      const pair = pairs.get(res);
      if (pair) conversionCounter.inc({ route: routeLabel, ...pair, code });
    });
    next();
  };
}

export const prometheusRegister = client.register;
