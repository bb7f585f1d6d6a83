import type { Request, Response, NextFunction } from 'express';

// version-traceid-parentid-flags, lowercase hex (W3C Trace Context)
const TRACEPARENT = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;
const ZERO_TRACE = '0'.repeat(32);
const ZERO_PARENT = '0'.repeat(16);

/**
 * Returns the trace id of a valid traceparent header, or undefined. Version
 * `ff` and all-zero ids are invalid.
 */
export function parseTraceparent(header: string): string | undefined {
  const match = TRACEPARENT.exec(header.trim());
  if (!match) return undefined;
  const [, version, traceId, parentId] = match;
  if (version === 'ff' || traceId === ZERO_TRACE || parentId === ZERO_PARENT) return undefined;
  return traceId;
}

export function traceContext(req: Request, res: Response, next: NextFunction) {
  const header = req.headers['traceparent'];
  const traceId = typeof header === 'string' ? parseTraceparent(header) : undefined;
  if (typeof header === 'string' && traceId) {
    req.traceparent = header.trim();
    req.traceId = traceId;
    res.setHeader('x-traceparent', req.traceparent);
  }
  next();
}
