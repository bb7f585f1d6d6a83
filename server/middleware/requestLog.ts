import type { Request, Response, NextFunction } from 'express';
import type { IncomingHttpHeaders } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { Logger } from '../core/logger.js';

const SENSITIVE = /^(authorization|cookie|x-api-key|x-auth-token)$/i;

function redactHeaders(h: IncomingHttpHeaders) {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(h)) {
    out[key] = SENSITIVE.test(key) ? '***' : value;
  }
  return out;
}

const QUIET_PATHS = new Set(['/health', '/ready', '/api/version', '/metrics.prom']);

const QUIET_PREFIXES = ['/api/jobs/'];

function isQuietRequest(req: Request, statusCode: number) {
  const method = req.method;
  const path = req.path || req.originalUrl || '';

  if (method === 'OPTIONS') return true;
  if ((method === 'GET' || method === 'HEAD') && QUIET_PATHS.has(path)) return true;

  // polling job status is the common case; keep only the unusual answers
  if (method === 'GET' && QUIET_PREFIXES.some((prefix) => path.startsWith(prefix))) {
    return statusCode === 200 || statusCode === 404 || statusCode === 409;
  }

  return statusCode === 304 && (method === 'GET' || method === 'HEAD');
}

export function createRequestLogger(log: Logger) {
  return function requestLogger(req: Request, res: Response, next: NextFunction) {
    const header = req.headers['x-request-id'];
    const id = typeof header === 'string' && header ? header : randomUUID();
    req.id = id;
    res.setHeader('x-request-id', id);
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      const shouldQuiet = process.env.VERBOSE_REQUEST_LOGS !== '1' && isQuietRequest(req, res.statusCode);
      if (shouldQuiet) return;
      const durMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
      log.info(
        JSON.stringify({
          t: new Date().toISOString(),
          id,
          ip: req.ip,
          m: req.method,
          u: req.originalUrl || req.url,
          s: res.statusCode,
          durMs,
          h: redactHeaders(req.headers),
          tp: req.traceparent,
          trace: req.traceId,
        })
      );
    });

    next();
  };
}
