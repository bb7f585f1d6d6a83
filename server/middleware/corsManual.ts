import type { NextFunction, Request, Response } from 'express';
import type { Logger } from '../core/logger.js';
import { isOriginAllowed } from '../core/corsOrigin.js';

export type CorsOptions = {
  getAllowedOrigins?: () => string | undefined;
};

export function createManualCorsMiddleware(log: Logger, options: CorsOptions = {}) {
  const { getAllowedOrigins } = options;

  return function manualCors(req: Request, res: Response, next: NextFunction) {
    const origin = req.headers.origin;
    const allowed = getAllowedOrigins ? getAllowedOrigins() : process.env.CORS_ORIGIN;

    if (!allowed) {
      res.setHeader('Access-Control-Allow-Origin', origin || '*');
    } else if (origin && isOriginAllowed(origin, allowed)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Credentials', 'true');
    } else if (origin) {
      log.warn('cors_rejected', { origin });
    }

    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS,HEAD');
    res.setHeader(
      'Access-Control-Allow-Headers',
      'Content-Type,Accept,X-Requested-With,Last-Event-ID,X-Request-Id,Traceparent'
    );
    res.setHeader('Access-Control-Expose-Headers', 'Content-Disposition,Content-Length,Content-Type,X-Request-Id,X-Traceparent');
    res.setHeader('Access-Control-Max-Age', '86400');
    res.setHeader('Vary', 'Origin');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  };
}
